// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';
import {type HelmRequest} from '../helm-request.js';
import {type ReleaseListOptions} from '../../model/release/release-list-options.js';

/**
 * A request to list Helm releases as JSON.
 */
export class ReleaseListRequest implements HelmRequest {
  constructor(private readonly options: ReleaseListOptions) {}

  apply(builder: HelmExecutionBuilder): void {
    builder.subcommands('list');
    builder.argument('output', 'json');
    this.options.apply(builder);
  }
}
