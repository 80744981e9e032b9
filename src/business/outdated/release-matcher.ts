// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type PluginLogger} from '../../core/logging/plugin-logger.js';
import {type SearchIndex} from '../search/search-index.js';
import {type SearchResult} from '../search/search-result.js';
import {type InstalledRelease} from './installed-release.js';
import {type MatchOutcome} from './match-outcome.js';
import {type OutdatedOptions} from './outdated-options.js';
import {OutdatedElement} from './outdated-element.js';
import {RepoDuplicateGroup} from './repo-duplicate-group.js';
import {VersionConstraint} from './version-constraint.js';

/**
 * Finds the repositories serving a release's chart and decides whether any of them offers a newer version.
 */
@injectable()
export class ReleaseMatcher {
  private readonly logger: PluginLogger;

  public constructor(@inject(InjectTokens.PluginLogger) logger?: PluginLogger) {
    this.logger = patchInject(logger, InjectTokens.PluginLogger, this.constructor.name);
  }

  /**
   * @throws VersionParseError if the installed version or the version of a matching entry is not a semantic version
   */
  public match(index: SearchIndex, release: InstalledRelease, options: OutdatedOptions): MatchOutcome {
    const chartName: string = release.chartName.toLowerCase();
    const matches: SearchResult[] = index.all().filter(result => result.name.toLowerCase().endsWith(chartName));

    if (matches.length === 0) {
      this.logger.debug(`Could not find any Repo which contains ${release.chartName}`);
      return {kind: 'no-match'};
    }

    const constraint = VersionConstraint.forInstalled(release.chartVersion, options.devel);
    let foundNewer = false;
    for (const result of matches) {
      this.logger.debug(
        `Comparing version of original chart '${release.chartName}' => ${release.chartVersion} with version ` +
          `(${result.name}) ${result.chart.version} [constraint: '${constraint}']`,
      );
      if (constraint.isSatisfiedBy(result.chart.version)) {
        this.logger.debug(`Found newer version '${result.name}' ${result.chart.version} > ${release.chartVersion}`);
        foundNewer = true;
      }
    }

    if (matches.length > 1) {
      this.logger.debug(
        `${matches.length} repositories do serve the '${release.chartName}' chart. Reporting them as duplicates.`,
      );
      return {
        kind: 'multiple-repos',
        group: new RepoDuplicateGroup(
          release.name,
          release.namespace,
          matches.map(result => this.toElement(release, result)),
        ),
      };
    }

    if (foundNewer && options.deprecationNotice) {
      return {kind: 'single-newer', element: this.toElement(release, matches[0])};
    }

    this.logger.debug(`No newer Chart was found for '${release.chartName}'`);
    return {kind: 'no-newer'};
  }

  private toElement(release: InstalledRelease, result: SearchResult): OutdatedElement {
    return new OutdatedElement(
      release.name,
      release.namespace,
      release.chartVersion,
      result.chart.version,
      result.chart.appVersion,
      result.name,
      ReleaseMatcher.toTimestamp(result.chart.created),
      result.chart.deprecated,
    );
  }

  private static toTimestamp(created: string): string {
    if (!created) {
      return '';
    }

    const date = new Date(created);
    return Number.isNaN(date.getTime()) ? '' : date.toISOString();
  }
}
