// SPDX-License-Identifier: Apache-2.0

import {VersionConstraint} from '../outdated/version-constraint.js';

export class Comparators {
  private constructor() {
    // Utility class
    throw new Error('Cannot instantiate utility class');
  }

  public static readonly number = (l: number, r: number): number => {
    if (l < r) {
      return -1;
    } else if (l > r) {
      return 1;
    }

    return 0;
  };

  /**
   * Orders chart versions newest first. Versions that are not valid semantic versions sort after every valid one and
   * keep their relative order.
   */
  public static readonly chartVersionDescending = (l: string, r: string): number => {
    const left = VersionConstraint.tryParse(l);
    const right = VersionConstraint.tryParse(r);
    if (left === null || right === null) {
      return Comparators.number(left === null ? 1 : 0, right === null ? 1 : 0);
    }

    return right.compare(left);
  };
}
