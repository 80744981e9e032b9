// SPDX-License-Identifier: Apache-2.0

// eslint-disable-next-line n/no-extraneous-import
import 'reflect-metadata';
import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import {container} from 'tsyringe-neo';

import {Flags as flags} from './commands/flags.js';
import * as commands from './commands/index.js';
import * as constants from './core/constants.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type PluginLogger} from './core/logging/plugin-logger.js';
import {InitializationError} from './core/errors/initialization-error.js';
import {IllegalArgumentError} from './core/errors/illegal-argument-error.js';
import {SilentBreak} from './core/errors/silent-break.js';
import {getGitCommit, getPluginVersion} from '../version.js';

export async function main(argv: string[], context?: {logger?: PluginLogger}): Promise<void> {
  const arguments_: string[] = hideBin(argv);
  const debug: boolean = arguments_.some(argument => argument === '--debug' || argument === '--debug=true');

  try {
    Container.getInstance().init(
      process.env,
      debug ? constants.DEBUG_LOG_LEVEL : undefined,
      debug ? true : undefined,
    );
  } catch (error) {
    throw new InitializationError('Error initializing container', error);
  }

  const logger = container.resolve<PluginLogger>(InjectTokens.PluginLogger);

  if (context) {
    // save the logger so that outdated.ts can use it to properly flush the logs and exit
    context.logger = logger;
  }

  logger.debug('Initializing helm outdated');
  if (arguments_.includes('--version')) {
    logger.showUser(chalk.cyan('Version:'), chalk.yellow(getPluginVersion()));
    logger.showUser(chalk.cyan('Git Commit:'), chalk.yellow(getGitCommit()));
    throw new SilentBreak('displayed version information, exiting');
  }

  logger.debug('Initializing commands');
  const rootCmd = yargs(arguments_)
    .scriptName('helm outdated')
    .usage(`Usage:\n  helm outdated [flags]\n${constants.OUTDATED_HELP}`)
    .version(false)
    .alias('h', 'help')
    .strict();

  for (const command of commands.Initialize()) {
    rootCmd.command(command);
  }

  rootCmd.fail((message, error) => {
    if (error) {
      throw error;
    }
    rootCmd.showHelp();
    throw new IllegalArgumentError(message);
  });

  logger.debug('Setting up flags');
  // set root level flags
  flags.setOptionalCommandFlags(rootCmd, flags.debug);

  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
