// SPDX-License-Identifier: Apache-2.0

import * as OutdatedFlags from './flags.js';
import {YargsCommand} from '../../core/yargs-command.js';
import {BaseCommand} from '../base.js';
import {type OutdatedCommandHandlers} from './handlers.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type PluginLogger} from '../../core/logging/plugin-logger.js';

/**
 * Defines the 'outdated' command, which is also the default command of the plugin.
 */
export class OutdatedCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'outdated';
  public static readonly COMMAND_ALIASES: readonly string[] = ['od', '$0'];

  private readonly handlers: OutdatedCommandHandlers;

  public constructor(logger?: PluginLogger, handlers?: OutdatedCommandHandlers) {
    super(logger);

    this.handlers = patchInject(handlers, InjectTokens.OutdatedCommandHandlers, this.constructor.name);
  }

  public getCommandDefinition(): YargsCommand {
    return new YargsCommand(
      {
        command: OutdatedCommand.COMMAND_NAME,
        aliases: OutdatedCommand.COMMAND_ALIASES,
        description: 'list outdated releases',
        commandDef: this,
        handler: argv => this.handlers.outdated(argv),
      },
      OutdatedFlags.OUTDATED_FLAGS,
    );
  }
}
