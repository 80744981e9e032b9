// SPDX-License-Identifier: Apache-2.0

import {PluginError} from './plugin-error.js';

/**
 * Thrown when the plugin cannot reach the cluster through helm or cannot load its own configuration.
 */
export class InitializationError extends PluginError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
