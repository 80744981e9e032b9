// SPDX-License-Identifier: Apache-2.0

import {type ReleaseItem} from './model/release/release-item.js';
import {type ReleaseListOptions} from './model/release/release-list-options.js';

/**
 * The HelmClient is a bridge between TypeScript and the Helm CLI.
 */
export interface HelmClient {
  /**
   * Lists releases as `helm list` reports them.
   *
   * @param options scope, filter, sort order and paging of the listing
   * @returns the releases, in the order helm printed them
   * @throws HelmExecutionException if helm cannot be run or exits with an error
   * @throws HelmParserException if the output is not a JSON list
   */
  listReleases(options: ReleaseListOptions): Promise<ReleaseItem[]>;
}
