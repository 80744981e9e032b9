// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {ClassToObjectMapper} from '../../../../../src/data/mapper/impl/class-to-object-mapper.js';
import {ChartVersion} from '../../../../../src/data/schema/model/repository/chart-version.js';
import {RepositoryFile} from '../../../../../src/data/schema/model/repository/repository-file.js';
import {RepositoryEntry} from '../../../../../src/data/schema/model/repository/repository-entry.js';
import {OutdatedElement} from '../../../../../src/business/outdated/outdated-element.js';
import {RepoDuplicateGroup} from '../../../../../src/business/outdated/repo-duplicate-group.js';
import {IllegalArgumentError} from '../../../../../src/core/errors/illegal-argument-error.js';

describe('ClassToObjectMapper', (): void => {
  const mapper = new ClassToObjectMapper();

  it('should read numeric and missing scalars of a chart version', (): void => {
    const chart = mapper.fromObject(ChartVersion, {name: 'nginx', version: 1.2, appVersion: 1.26, ignored: 'x'});

    expect(chart).to.be.instanceOf(ChartVersion);
    expect(chart.version).to.equal('1.2');
    expect(chart.appVersion).to.equal('1.26');
    expect(chart.created).to.equal('');
    expect(chart.deprecated).to.be.false;
    expect(chart.urls).to.deep.equal([]);
    expect(chart).not.to.have.property('ignored');
  });

  it('should read a timestamp parsed as a date as ISO text', (): void => {
    const chart = mapper.fromObject(ChartVersion, {
      name: 'nginx',
      version: '1.0.0',
      created: new Date(Date.UTC(2024, 0, 2)),
    });

    expect(chart.created).to.equal('2024-01-02T00:00:00.000Z');
  });

  it('should map nested repository entries', (): void => {
    const file = mapper.fromObject(RepositoryFile, {
      apiVersion: '',
      repositories: [{name: 'stable', url: 'https://charts.example.com/stable', username: 'test-user'}],
    });

    expect(file.repositories).to.have.lengthOf(1);
    expect(file.repositories[0]).to.be.instanceOf(RepositoryEntry);
    expect(file.repositories[0].name).to.equal('stable');
  });

  it('should map an array of plain objects', (): void => {
    const charts = mapper.fromArray(ChartVersion, [{version: '1.0.0'}, {version: '2.0.0'}]);

    expect(charts.map(chart => chart.version)).to.deep.equal(['1.0.0', '2.0.0']);
  });

  it('should reject a value that is not a plain object', (): void => {
    expect(() => mapper.fromObject(ChartVersion, ['1.0.0'])).to.throw(IllegalArgumentError);
  });

  it('should write an outdated element with its wire names', (): void => {
    const element = new OutdatedElement('web', 'default', '1.2.0', '1.3.0', '2.0', 'stable/nginx', '', true);

    expect(mapper.toObject(element)).to.deep.equal({
      name: 'web',
      namespace: 'default',
      installed_version: '1.2.0',
      latest_version: '1.3.0',
      app_version: '2.0',
      chart: 'stable/nginx',
      updated: '',
      deprecated: true,
    });
  });

  it('should write a duplicate group with its elements', (): void => {
    const group = new RepoDuplicateGroup('cache', 'data', [
      new OutdatedElement('cache', 'data', '16.0.0', '17.0.0', '7.0', 'stable/redis', '', false),
    ]);

    expect(mapper.toArray([group])).to.deep.equal([
      {
        deploy_name: 'cache',
        namespace: 'data',
        repos: [
          {
            name: 'cache',
            namespace: 'data',
            installed_version: '16.0.0',
            latest_version: '17.0.0',
            app_version: '7.0',
            chart: 'stable/redis',
            updated: '',
            deprecated: false,
          },
        ],
      },
    ]);
  });
});
