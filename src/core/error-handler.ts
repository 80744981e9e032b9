// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type PluginLogger} from './logging/plugin-logger.js';
import {SilentBreak} from './errors/silent-break.js';

@injectable()
export class ErrorHandler {
  private readonly logger: PluginLogger;

  constructor(@inject(InjectTokens.PluginLogger) logger?: PluginLogger) {
    this.logger = patchInject(logger, InjectTokens.PluginLogger, this.constructor.name);
  }

  public handle(error: unknown): void {
    const silentBreak = this.extractBreak(error);
    if (silentBreak) {
      this.handleSilentBreak(silentBreak);
    } else {
      this.handleError(error);
    }
  }

  private handleSilentBreak(silentBreak: SilentBreak): void {
    this.logger.info(silentBreak.message);
  }

  private handleError(error: unknown): void {
    this.logger.showUserError(error);
    process.exitCode = 1;
  }

  /**
   * Recursively checks if an error is or is caused by a SilentBreak
   * Returns the SilentBreak if found, otherwise false
   * @param error
   */
  private extractBreak(error: unknown): SilentBreak | false {
    if (error instanceof SilentBreak) {
      return error;
    }
    if (error instanceof Error && error.cause !== undefined) {
      return this.extractBreak(error.cause);
    }
    return false;
  }
}
