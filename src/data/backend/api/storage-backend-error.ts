// SPDX-License-Identifier: Apache-2.0

import {PluginError} from '../../../core/errors/plugin-error.js';

export class StorageBackendError extends PluginError {
  constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, cause, meta);
  }
}
