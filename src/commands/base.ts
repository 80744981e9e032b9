// SPDX-License-Identifier: Apache-2.0

import {inject} from 'tsyringe-neo';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type PluginLogger} from '../core/logging/plugin-logger.js';
import {type YargsCommand} from '../core/yargs-command.js';

export abstract class BaseCommand {
  public readonly logger: PluginLogger;

  protected constructor(@inject(InjectTokens.PluginLogger) logger?: PluginLogger) {
    this.logger = patchInject(logger, InjectTokens.PluginLogger, this.constructor.name);
  }

  public abstract getCommandDefinition(): YargsCommand;
}
