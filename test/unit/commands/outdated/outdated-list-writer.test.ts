// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import yaml from 'yaml';

import {OutdatedListWriter} from '../../../../src/commands/outdated/outdated-list-writer.js';
import {OutdatedElement} from '../../../../src/business/outdated/outdated-element.js';
import {RepoDuplicateGroup} from '../../../../src/business/outdated/repo-duplicate-group.js';
import {type OutdatedReport} from '../../../../src/business/outdated/outdated-report.js';
import {ClassToObjectMapper} from '../../../../src/data/mapper/impl/class-to-object-mapper.js';
import {type TextSink} from '../../../../src/core/output/text-sink.js';

class CapturingSink implements TextSink {
  public text = '';

  public write(text: string): boolean {
    this.text += text;
    return true;
  }
}

describe('OutdatedListWriter', () => {
  const mapper = new ClassToObjectMapper();
  const single = new OutdatedElement(
    'web',
    'default',
    '1.1.0',
    '1.2.0',
    '1.26',
    'stable/nginx',
    '2024-05-01T12:00:00.000Z',
    false,
  );
  const group = new RepoDuplicateGroup('cache', 'data', [
    new OutdatedElement('cache', 'data', '16.0.0', '17.0.0', '7.0.0', 'stable/redis', '2024-03-01T08:30:00.000Z', true),
    new OutdatedElement('cache', 'data', '16.0.0', '18.1.0', '7.2.4', 'mirror/redis', '2024-06-10T09:15:00.000Z', false),
  ]);
  const report: OutdatedReport = {outdatedSingles: [single], duplicateGroups: [group], warnings: []};

  const write = (method: 'writeTable' | 'writeJSON' | 'writeYAML', outdated: OutdatedReport = report): string => {
    const sink = new CapturingSink();
    new OutdatedListWriter(outdated, mapper)[method](sink);
    return sink.text;
  };

  it('should print single releases as a table followed by one block per duplicate group', () => {
    expect(write('writeTable').split('\n')).to.deep.equal([
      'NAME  NAMESPACE  INSTALLED VERSION  LATEST VERSION  CHART',
      'web   default    1.1.0              1.2.0           stable/nginx',
      '',
      '',
      '----',
      'NAME                    cache',
      'NAMESPACE               data',
      'INSTALLED VERSION       16.0.0',
      '',
      'REPOSITORY  DEPRECATED  CHART VERSION  APP VERSION  UPDATED',
      'stable      true        17.0.0         7.0.0        2024-03-01T08:30:00.000Z',
      'mirror      false       18.1.0         7.2.4        2024-06-10T09:15:00.000Z',
      '----',
      '',
    ]);
  });

  it('should print only the header of an empty report', () => {
    expect(write('writeTable', {outdatedSingles: [], duplicateGroups: [], warnings: []})).to.equal(
      'NAME  NAMESPACE  INSTALLED VERSION  LATEST VERSION  CHART\n',
    );
  });

  it('should print single releases as compact JSON', () => {
    expect(write('writeJSON')).to.equal(
      '[{"name":"web","namespace":"default","installed_version":"1.1.0","latest_version":"1.2.0",' +
        '"app_version":"1.26","chart":"stable/nginx","updated":"2024-05-01T12:00:00.000Z","deprecated":false}]\n',
    );
  });

  it('should print an empty JSON list when nothing is outdated', () => {
    expect(write('writeJSON', {outdatedSingles: [], duplicateGroups: [group], warnings: []})).to.equal('[]\n');
  });

  it('should print single releases as YAML', () => {
    const text = write('writeYAML');

    expect(text.startsWith('- name: web\n')).to.be.true;
    expect(yaml.parse(text)).to.deep.equal([
      {
        name: 'web',
        namespace: 'default',
        installed_version: '1.1.0',
        latest_version: '1.2.0',
        app_version: '1.26',
        chart: 'stable/nginx',
        updated: '2024-05-01T12:00:00.000Z',
        deprecated: false,
      },
    ]);
  });
});
