// SPDX-License-Identifier: Apache-2.0

import {PluginError} from './plugin-error.js';

export class NoRepositoryConfiguredError extends PluginError {
  /**
   * @param repositoryConfig - path of the repositories file that was looked up
   * @param cause - source error (if any)
   */
  constructor(repositoryConfig: string, cause?: unknown) {
    super('no repositories configured', cause, {repositoryConfig});
  }
}
