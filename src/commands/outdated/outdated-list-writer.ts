// SPDX-License-Identifier: Apache-2.0

import yaml from 'yaml';
import * as constants from '../../core/constants.js';
import {TableEncoder} from '../../core/output/table-encoder.js';
import {type OutputWriter} from '../../core/output/output-writer.js';
import {type TextSink} from '../../core/output/text-sink.js';
import {type ObjectMapper} from '../../data/mapper/api/object-mapper.js';
import {type OutdatedReport} from '../../business/outdated/outdated-report.js';
import {type RepoDuplicateGroup} from '../../business/outdated/repo-duplicate-group.js';

/**
 * Prints an outdated report. The table lists single-repository releases followed by one detail block per release
 * whose chart is served by several repositories. JSON and YAML carry the single-repository releases only.
 */
export class OutdatedListWriter implements OutputWriter {
  public constructor(
    private readonly report: OutdatedReport,
    private readonly mapper: ObjectMapper,
  ) {}

  public writeTable(out: TextSink): void {
    const table = new TableEncoder().addRow('NAME', 'NAMESPACE', 'INSTALLED VERSION', 'LATEST VERSION', 'CHART');
    for (const element of this.report.outdatedSingles) {
      table.addRow(element.name, element.namespace, element.installedVersion, element.latestVersion, element.chart);
    }

    const lines: string[] = table.encodeLines();
    if (this.report.duplicateGroups.length > 0) {
      lines.push('', '');
      for (const group of this.report.duplicateGroups) {
        lines.push(...OutdatedListWriter.groupLines(group));
      }
      lines.push(constants.DETAIL_SEPARATOR);
    }

    out.write(`${lines.join('\n')}\n`);
  }

  public writeJSON(out: TextSink): void {
    out.write(`${JSON.stringify(this.mapper.toArray(this.report.outdatedSingles))}\n`);
  }

  public writeYAML(out: TextSink): void {
    out.write(yaml.stringify(this.mapper.toArray(this.report.outdatedSingles)));
  }

  private static groupLines(group: RepoDuplicateGroup): string[] {
    const repositories = new TableEncoder().addRow('REPOSITORY', 'DEPRECATED', 'CHART VERSION', 'APP VERSION', 'UPDATED');
    for (const element of group.repos) {
      repositories.addRow(
        element.repository,
        element.deprecated,
        element.latestVersion,
        element.appVersion,
        element.updated,
      );
    }

    return [
      constants.DETAIL_SEPARATOR,
      OutdatedListWriter.detail('NAME', group.name),
      OutdatedListWriter.detail('NAMESPACE', group.namespace),
      OutdatedListWriter.detail('INSTALLED VERSION', group.installedVersion),
      '',
      ...repositories.encodeLines(),
    ];
  }

  private static detail(label: string, value: string): string {
    return `${label.padEnd(constants.DETAIL_LABEL_WIDTH)}${value}`;
  }
}
