// SPDX-License-Identifier: Apache-2.0

import {Flags as flags} from '../flags.js';
import {type CommandFlags} from '../../types/flag-types.js';

export const OUTDATED_FLAGS: CommandFlags = {
  required: [],
  optional: [
    flags.deprecationNotice,
    flags.ignoreRepo,
    flags.devel,
    flags.short,
    flags.byDate,
    flags.sortReverse,
    flags.all,
    flags.uninstalled,
    flags.superseded,
    flags.uninstalling,
    flags.deployed,
    flags.failed,
    flags.pending,
    flags.allNamespaces,
    flags.max,
    flags.offset,
    flags.output,
  ],
};
