// SPDX-License-Identifier: Apache-2.0

import {type ArgumentsCamelCase, type CommandModule} from 'yargs';
import {Flags as commandFlags} from '../commands/flags.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {PluginError} from './errors/plugin-error.js';
import {type BaseCommand} from '../commands/base.js';
import {type CommandFlags} from '../types/flag-types.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';

export type CommandHandler = (argv: ArgvStruct) => Promise<boolean>;

export class YargsCommand implements CommandModule {
  public readonly command: string;
  public readonly aliases: readonly string[];
  public readonly describe: string;

  private readonly commandDef: BaseCommand;
  private readonly commandHandler: CommandHandler;
  private readonly flags: CommandFlags;

  public constructor(
    options: {command: string; aliases?: readonly string[]; description: string; commandDef: BaseCommand; handler: CommandHandler},
    flags: CommandFlags,
  ) {
    const {command, aliases, description, commandDef, handler} = options;

    if (!command) {
      throw new IllegalArgumentError("A string is required as the 'command' property", command);
    }
    if (!description) {
      throw new IllegalArgumentError("A string is required as the 'description' property", description);
    }

    this.command = command;
    this.aliases = aliases ?? [];
    this.describe = description;
    this.commandDef = commandDef;
    this.commandHandler = handler;
    this.flags = flags;
  }

  public builder = (y: AnyYargs): AnyYargs => {
    commandFlags.setRequiredCommandFlags(y, ...this.flags.required);
    commandFlags.setOptionalCommandFlags(y, ...this.flags.optional);
    return y;
  };

  public handler = async (argv: ArgumentsCamelCase): Promise<void> => {
    const logger = this.commandDef.logger;
    const arguments_: ArgvStruct = {...argv};

    logger.info(`==== Running '${this.command}' ===`);
    logger.debug(arguments_);

    let result: boolean;
    try {
      result = await this.commandHandler(arguments_);
    } catch (error) {
      const message: string = error instanceof Error ? error.message : String(error);
      throw new PluginError(`${this.command} failed: ${message}`, error);
    }

    logger.info(`==== Finished running '${this.command}' ====`);
    if (!result) {
      throw new PluginError(`${this.command} failed, expected returned value to be true`);
    }
  };
}
