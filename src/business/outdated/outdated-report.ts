// SPDX-License-Identifier: Apache-2.0

import {type OutdatedElement} from './outdated-element.js';
import {type RepoDuplicateGroup} from './repo-duplicate-group.js';

export interface OutdatedReport {
  readonly outdatedSingles: readonly OutdatedElement[];
  readonly duplicateGroups: readonly RepoDuplicateGroup[];
  readonly warnings: readonly string[];
}
