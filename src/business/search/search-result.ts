// SPDX-License-Identifier: Apache-2.0

import {type ChartVersion} from '../../data/schema/model/repository/chart-version.js';

export interface SearchResult {
  /**
   * `repository/chart`
   */
  readonly name: string;
  readonly repository: string;
  readonly chart: Readonly<ChartVersion>;
}
