// SPDX-License-Identifier: Apache-2.0

import semver, {type SemVer} from 'semver';
import {VersionParseError} from '../../core/errors/version-parse-error.js';

/**
 * Accepts an optional leading "v" and missing minor or patch numbers. The normalised string must still be a strict
 * semantic version.
 */
const RELAXED_VERSION = /^v?(\d+)(?:\.(\d+))?(?:\.(\d+))?(-[\dA-Za-z.-]+)?(\+[\dA-Za-z.-]+)?$/;

/**
 * Decides whether a candidate chart version is strictly newer than the installed one.
 *
 * Without devel the constraint is `> installed` and a pre-release candidate is only eligible when the installed
 * version is itself a pre-release. With devel the constraint is `> installed-0 != installed`: any pre-release above the
 * lower bound is eligible and the installed version itself never is. An installed pre-release is its own lower bound.
 */
export class VersionConstraint {
  private readonly lowerBound: SemVer;

  private constructor(
    public readonly installed: SemVer,
    public readonly devel: boolean,
  ) {
    this.lowerBound =
      devel && installed.prerelease.length === 0
        ? new semver.SemVer(`${installed.major}.${installed.minor}.${installed.patch}-0`)
        : installed;
  }

  /**
   * @throws VersionParseError if the installed version is not a semantic version
   */
  public static forInstalled(installedVersion: string, devel: boolean): VersionConstraint {
    return new VersionConstraint(VersionConstraint.parse(installedVersion), devel);
  }

  /**
   * @throws VersionParseError if the value is not a semantic version
   */
  public static parse(raw: string): SemVer {
    const parsed = VersionConstraint.tryParse(raw);
    if (parsed === null) {
      throw new VersionParseError(raw);
    }

    return parsed;
  }

  public static tryParse(raw: string): SemVer | null {
    const match = RELAXED_VERSION.exec(raw.trim());
    if (!match) {
      return null;
    }

    const [, major, minor = '0', patch = '0', prerelease = '', build = ''] = match;
    return semver.parse(`${major}.${minor}.${patch}${prerelease}${build}`);
  }

  /**
   * @throws VersionParseError if the candidate is not a semantic version
   */
  public isSatisfiedBy(candidateVersion: string): boolean {
    const candidate = VersionConstraint.parse(candidateVersion);

    if (this.devel) {
      return semver.gt(candidate, this.lowerBound) && !semver.eq(candidate, this.installed);
    }

    if (candidate.prerelease.length > 0 && this.installed.prerelease.length === 0) {
      return false;
    }

    return semver.gt(candidate, this.installed);
  }

  public toString(): string {
    if (this.devel) {
      return `> ${this.lowerBound.version} != ${this.installed.version}`;
    }

    return `> ${this.installed.version}`;
  }
}

/**
 * Shorthand for a single comparison.
 *
 * @throws VersionParseError if either version is not a semantic version
 */
export function isNewer(installedVersion: string, candidateVersion: string, devel: boolean): boolean {
  return VersionConstraint.forInstalled(installedVersion, devel).isSatisfiedBy(candidateVersion);
}
