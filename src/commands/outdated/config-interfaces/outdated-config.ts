// SPDX-License-Identifier: Apache-2.0

import {type OutdatedOptions} from '../../../business/outdated/outdated-options.js';
import {type ReleaseListOptions} from '../../../integration/helm/model/release/release-list-options.js';
import {type OutputFormat} from '../../../core/output/output-format.js';

export interface OutdatedConfig {
  options: OutdatedOptions;
  releaseListOptions: ReleaseListOptions;
  output: OutputFormat;
}
