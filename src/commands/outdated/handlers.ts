// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InitializationError} from '../../core/errors/initialization-error.js';
import {writeOutput} from '../../core/output/output-format.js';
import {type TextSink} from '../../core/output/text-sink.js';
import {type PluginLogger} from '../../core/logging/plugin-logger.js';
import {type ObjectMapper} from '../../data/mapper/api/object-mapper.js';
import {type HelmClient} from '../../integration/helm/helm-client.js';
import {type ReleaseItem} from '../../integration/helm/model/release/release-item.js';
import {ChartReference} from '../../integration/helm/model/chart/chart-reference.js';
import {type SearchIndexLoader} from '../../integration/helm/repository/search-index-loader.js';
import {InstalledRelease} from '../../business/outdated/installed-release.js';
import {type OutdatedReportBuilder} from '../../business/outdated/outdated-report-builder.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type OutdatedCommandConfigs} from './configs.js';
import {OutdatedListWriter} from './outdated-list-writer.js';

@injectable()
export class OutdatedCommandHandlers {
  private readonly logger: PluginLogger;
  private readonly helm: HelmClient;
  private readonly searchIndexLoader: SearchIndexLoader;
  private readonly reportBuilder: OutdatedReportBuilder;
  private readonly configs: OutdatedCommandConfigs;
  private readonly mapper: ObjectMapper;

  public constructor(
    @inject(InjectTokens.PluginLogger) logger?: PluginLogger,
    @inject(InjectTokens.Helm) helm?: HelmClient,
    @inject(InjectTokens.SearchIndexLoader) searchIndexLoader?: SearchIndexLoader,
    @inject(InjectTokens.OutdatedReportBuilder) reportBuilder?: OutdatedReportBuilder,
    @inject(InjectTokens.OutdatedCommandConfigs) configs?: OutdatedCommandConfigs,
    @inject(InjectTokens.ObjectMapper) mapper?: ObjectMapper,
  ) {
    this.logger = patchInject(logger, InjectTokens.PluginLogger, this.constructor.name);
    this.helm = patchInject(helm, InjectTokens.Helm, this.constructor.name);
    this.searchIndexLoader = patchInject(searchIndexLoader, InjectTokens.SearchIndexLoader, this.constructor.name);
    this.reportBuilder = patchInject(reportBuilder, InjectTokens.OutdatedReportBuilder, this.constructor.name);
    this.configs = patchInject(configs, InjectTokens.OutdatedCommandConfigs, this.constructor.name);
    this.mapper = patchInject(mapper, InjectTokens.ObjectMapper, this.constructor.name);
  }

  /**
   * - List the installed releases through helm.
   * - Merge the cached index of every configured repository.
   * - Compare each release with the newest chart version the repositories serve.
   * - Print the report in the requested format.
   */
  public async outdated(argv: ArgvStruct, out: TextSink = process.stdout): Promise<boolean> {
    const config = this.configs.configBuilder(argv);

    let items: ReleaseItem[];
    try {
      items = await this.helm.listReleases(config.releaseListOptions);
    } catch (error) {
      throw new InitializationError('failed to list the installed releases', error);
    }
    this.logger.debug(`helm reported ${items.length} release(s)`);

    const releases: InstalledRelease[] = items.map(item => OutdatedCommandHandlers.toInstalledRelease(item));
    const index = await this.searchIndexLoader.load();
    const report = this.reportBuilder.build(index, releases, config.options);

    for (const warning of report.warnings) {
      this.logger.showWarning(warning);
    }
    if (report.duplicateGroups.length > 0) {
      this.logger.debug(
        `releases served by several repositories: ${JSON.stringify(this.mapper.toArray(report.duplicateGroups))}`,
      );
    }

    writeOutput(config.output, out, new OutdatedListWriter(report, this.mapper));
    return true;
  }

  /**
   * @throws VersionParseError if the chart string carries no semantic version
   */
  private static toInstalledRelease(item: ReleaseItem): InstalledRelease {
    const chart = ChartReference.parse(item.chart);
    return new InstalledRelease(item.name, item.namespace, chart.name, chart.version);
  }
}
