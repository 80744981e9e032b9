// SPDX-License-Identifier: Apache-2.0

import {PluginError} from './plugin-error.js';

export class SilentBreak extends PluginError {
  /**
   * A silent break does not display a message to the user
   *
   * @param message - break message
   */
  constructor(message: string) {
    super(message);
  }
}
