// SPDX-License-Identifier: Apache-2.0

import {type ChartVersion} from './chart-version.js';

/**
 * The cached index of one repository. Entries map a chart name to its published versions.
 */
export class IndexFile {
  public constructor(
    public readonly apiVersion: string,
    public readonly generated: string,
    public readonly entries: ReadonlyMap<string, readonly ChartVersion[]>,
  ) {}
}
