// SPDX-License-Identifier: Apache-2.0

import {OutdatedCommand} from './outdated/index.js';
import {type YargsCommand} from '../core/yargs-command.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @returns an array of Yargs command builder
 */
export function Initialize(): YargsCommand[] {
  return [new OutdatedCommand().getCommandDefinition()];
}
