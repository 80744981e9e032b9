// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';

import {OutdatedReportBuilder} from '../../../../src/business/outdated/outdated-report-builder.js';
import {ReleaseMatcher} from '../../../../src/business/outdated/release-matcher.js';
import {InstalledRelease} from '../../../../src/business/outdated/installed-release.js';
import {DEFAULT_OUTDATED_OPTIONS} from '../../../../src/business/outdated/outdated-options.js';
import {NoMatchingRepositoryError} from '../../../../src/core/errors/no-matching-repository-error.js';
import {VersionParseError} from '../../../../src/core/errors/version-parse-error.js';
import {chartVersion, searchIndex, stubLogger} from '../../fixtures/search-index.fixture.js';

describe('OutdatedReportBuilder', (): void => {
  const index = searchIndex([
    [
      'repoA',
      {
        nginx: [chartVersion('nginx', '1.3.0'), chartVersion('nginx', '1.1.0')],
        redis: [chartVersion('redis', '17.0.0')],
        postgres: [chartVersion('postgres', '12.0.0')],
      },
    ],
    ['repoB', {redis: [chartVersion('redis', '18.0.0')]}],
  ]);

  let builder: OutdatedReportBuilder;

  beforeEach((): void => {
    const logger = stubLogger();
    builder = new OutdatedReportBuilder(logger, new ReleaseMatcher(logger));
  });

  it('should sort releases into singles and duplicate groups in release order', (): void => {
    const releases = [
      new InstalledRelease('cache', 'data', 'redis', '16.0.0'),
      new InstalledRelease('web', 'default', 'nginx', '1.2.0'),
      new InstalledRelease('db', 'data', 'postgres', '12.0.0'),
      new InstalledRelease('proxy', 'edge', 'nginx', '1.0.0'),
    ];

    const report = builder.build(index, releases, DEFAULT_OUTDATED_OPTIONS);

    expect(report.outdatedSingles.map(element => element.name)).to.deep.equal(['web', 'proxy']);
    expect(report.outdatedSingles.map(element => element.latestVersion)).to.deep.equal(['1.3.0', '1.3.0']);
    expect(report.duplicateGroups.map(group => group.name)).to.deep.equal(['cache']);
    expect(report.duplicateGroups[0].repos.map(element => element.chart)).to.deep.equal([
      'repoA/redis',
      'repoB/redis',
    ]);
    expect(report.warnings).to.be.empty;
  });

  it('should abort when no repository serves a chart', (): void => {
    const releases = [new InstalledRelease('other', 'default', 'unknown-chart', '1.0.0')];

    expect(() => builder.build(index, releases, DEFAULT_OUTDATED_OPTIONS))
      .to.throw(NoMatchingRepositoryError)
      .with.property('message', 'Could not find any Repo which contains unknown-chart');
  });

  it('should skip a release without repository and record a warning when ignoring missing repositories', (): void => {
    const releases = [
      new InstalledRelease('other', 'default', 'unknown-chart', '1.0.0'),
      new InstalledRelease('web', 'default', 'nginx', '1.2.0'),
    ];

    const report = builder.build(index, releases, {...DEFAULT_OUTDATED_OPTIONS, ignoreRepo: true});

    expect(report.outdatedSingles.map(element => element.name)).to.deep.equal(['web']);
    expect(report.duplicateGroups).to.be.empty;
    expect(report.warnings).to.deep.equal([
      "No Repo was found which containing the Chart 'unknown-chart' (skipping)",
    ]);
  });

  it('should keep version errors fatal when ignoring missing repositories', (): void => {
    const releases = [new InstalledRelease('web', 'default', 'nginx', 'not-a-version')];

    expect(() => builder.build(index, releases, {...DEFAULT_OUTDATED_OPTIONS, ignoreRepo: true})).to.throw(
      VersionParseError,
    );
  });

  it('should produce an identical report for repeated runs', (): void => {
    const releases = [
      new InstalledRelease('cache', 'data', 'redis', '16.0.0'),
      new InstalledRelease('web', 'default', 'nginx', '1.2.0'),
    ];

    const first = builder.build(index, releases, DEFAULT_OUTDATED_OPTIONS);
    const second = builder.build(index, releases, DEFAULT_OUTDATED_OPTIONS);

    expect(second).to.deep.equal(first);
  });
});
