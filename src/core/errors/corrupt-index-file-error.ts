// SPDX-License-Identifier: Apache-2.0

import {PluginError} from './plugin-error.js';

/**
 * A single repository's cached index could not be read. The index builder recovers from it by leaving the
 * repository out.
 */
export class CorruptIndexFileError extends PluginError {
  constructor(
    public readonly repository: string,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause, {repository});
  }
}
