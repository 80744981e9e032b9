// SPDX-License-Identifier: Apache-2.0

import {type Argv} from 'yargs';

export type AnyYargs = Argv;

export type ArgvStruct = {_: Array<string | number>} & Record<string, unknown>;
