// SPDX-License-Identifier: Apache-2.0

import {PluginError} from '../../core/errors/plugin-error.js';

/**
 * Exception thrown when the output of the Helm executable cannot be parsed.
 */
export class HelmParserException extends PluginError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
