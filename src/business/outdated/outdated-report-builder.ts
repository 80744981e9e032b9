// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type PluginLogger} from '../../core/logging/plugin-logger.js';
import {NoMatchingRepositoryError} from '../../core/errors/no-matching-repository-error.js';
import {type SearchIndex} from '../search/search-index.js';
import {type InstalledRelease} from './installed-release.js';
import {type OutdatedElement} from './outdated-element.js';
import {type OutdatedOptions} from './outdated-options.js';
import {type OutdatedReport} from './outdated-report.js';
import {type RepoDuplicateGroup} from './repo-duplicate-group.js';
import {type ReleaseMatcher} from './release-matcher.js';

@injectable()
export class OutdatedReportBuilder {
  private readonly logger: PluginLogger;
  private readonly matcher: ReleaseMatcher;

  public constructor(
    @inject(InjectTokens.PluginLogger) logger?: PluginLogger,
    @inject(InjectTokens.ReleaseMatcher) matcher?: ReleaseMatcher,
  ) {
    this.logger = patchInject(logger, InjectTokens.PluginLogger, this.constructor.name);
    this.matcher = patchInject(matcher, InjectTokens.ReleaseMatcher, this.constructor.name);
  }

  /**
   * Sorts every release into the single-repository or the duplicate-repository bucket, keeping release order.
   *
   * @throws NoMatchingRepositoryError if no repository serves a release's chart and `ignoreRepo` is off
   * @throws VersionParseError if a version cannot be compared, regardless of `ignoreRepo`
   */
  public build(
    index: SearchIndex,
    releases: readonly InstalledRelease[],
    options: OutdatedOptions,
  ): OutdatedReport {
    const outdatedSingles: OutdatedElement[] = [];
    const duplicateGroups: RepoDuplicateGroup[] = [];
    const warnings: string[] = [];

    for (const release of releases) {
      const outcome = this.matcher.match(index, release, options);
      switch (outcome.kind) {
        case 'no-match': {
          if (!options.ignoreRepo) {
            throw new NoMatchingRepositoryError(release.chartName, release.name);
          }
          const warning = `No Repo was found which containing the Chart '${release.chartName}' (skipping)`;
          this.logger.debug(`release '${release.name}' skipped, no repository serves chart '${release.chartName}'`);
          warnings.push(warning);
          break;
        }
        case 'single-newer': {
          outdatedSingles.push(outcome.element);
          break;
        }
        case 'multiple-repos': {
          duplicateGroups.push(outcome.group);
          break;
        }
        case 'no-newer': {
          break;
        }
        default: {
          const unhandled: never = outcome;
          throw new Error(`unhandled match outcome: ${JSON.stringify(unhandled)}`);
        }
      }
    }

    return {
      outdatedSingles: Object.freeze(outdatedSingles),
      duplicateGroups: Object.freeze(duplicateGroups),
      warnings: Object.freeze(warnings),
    };
  }
}
