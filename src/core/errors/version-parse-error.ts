// SPDX-License-Identifier: Apache-2.0

import {PluginError} from './plugin-error.js';

export class VersionParseError extends PluginError {
  /**
   * @param version - the string that failed to parse
   * @param cause - source error (if any)
   */
  constructor(
    public readonly version: string,
    cause?: unknown,
  ) {
    super(`Invalid Semantic Version: '${version}'`, cause, {version});
  }
}
