// SPDX-License-Identifier: Apache-2.0

import {type OutdatedElement} from './outdated-element.js';
import {type RepoDuplicateGroup} from './repo-duplicate-group.js';

export type MatchOutcome =
  | {readonly kind: 'no-match'}
  | {readonly kind: 'no-newer'}
  | {readonly kind: 'single-newer'; readonly element: OutdatedElement}
  | {readonly kind: 'multiple-repos'; readonly group: RepoDuplicateGroup};
