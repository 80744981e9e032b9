// SPDX-License-Identifier: Apache-2.0

export interface OutdatedOptions {
  /**
   * Skip releases whose chart no repository serves instead of failing the run.
   */
  readonly ignoreRepo: boolean;

  /**
   * Report single-repository matches. Turning it off leaves only duplicate groups in the report.
   */
  readonly deprecationNotice: boolean;

  /**
   * Accept pre-release candidates.
   */
  readonly devel: boolean;
}

export const DEFAULT_OUTDATED_OPTIONS: OutdatedOptions = Object.freeze({
  ignoreRepo: false,
  deprecationNotice: true,
  devel: false,
});
