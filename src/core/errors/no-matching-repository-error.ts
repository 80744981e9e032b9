// SPDX-License-Identifier: Apache-2.0

import {PluginError} from './plugin-error.js';

export class NoMatchingRepositoryError extends PluginError {
  constructor(
    public readonly chartName: string,
    public readonly releaseName: string,
  ) {
    super(`Could not find any Repo which contains ${chartName}`, undefined, {chartName, releaseName});
  }
}
