// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../execution/helm-execution-builder.js';

/**
 * One helm subcommand, described by the arguments it contributes to an execution.
 */
export interface HelmRequest {
  apply(builder: HelmExecutionBuilder): void;
}
