// SPDX-License-Identifier: Apache-2.0

import semver from 'semver';
import {VersionParseError} from '../../../../core/errors/version-parse-error.js';
import {VersionConstraint} from '../../../../business/outdated/version-constraint.js';

/**
 * A chart name and version, as helm prints them joined into one string.
 */
export class ChartReference {
  public constructor(
    public readonly name: string,
    public readonly version: string,
  ) {}

  /**
   * Splits `<name>-<version>` at the first hyphen that is followed by a valid semantic version. Chart names may
   * contain hyphens themselves, so `cert-manager-v1.14.4` yields `cert-manager` and `v1.14.4`. When no hyphen is
   * followed by a strict version, a shortened one such as `1.2` is accepted, again at the first hyphen.
   *
   * @throws VersionParseError if no hyphen is followed by a semantic version
   */
  public static parse(chart: string): ChartReference {
    const reference: ChartReference | undefined =
      ChartReference.splitAt(chart, version => semver.valid(version) !== null) ??
      ChartReference.splitAt(chart, version => VersionConstraint.tryParse(version) !== null);
    if (!reference) {
      throw new VersionParseError(chart);
    }

    return reference;
  }

  private static splitAt(chart: string, isVersion: (version: string) => boolean): ChartReference | undefined {
    for (let index = chart.indexOf('-'); index > 0; index = chart.indexOf('-', index + 1)) {
      const version: string = chart.slice(index + 1);
      if (isVersion(version)) {
        return new ChartReference(chart.slice(0, index), version);
      }
    }

    return undefined;
  }

  public toString(): string {
    return `${this.name}-${this.version}`;
  }
}
