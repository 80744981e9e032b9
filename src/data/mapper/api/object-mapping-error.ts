// SPDX-License-Identifier: Apache-2.0

import {PluginError} from '../../../core/errors/plugin-error.js';

/**
 * Thrown by an object mapper when an error occurs during the mapping process. Errors can occur when the object to be
 * mapped is not in the expected format or a type conversion fails.
 */
export class ObjectMappingError extends PluginError {
  constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, cause, meta);
  }
}
