// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../flags.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type HelmEnvironment} from '../../core/config/helm-environment.js';
import {OutputFormat, parseOutputFormat} from '../../core/output/output-format.js';
import {ReleaseListOptionsBuilder} from '../../integration/helm/model/release/release-list-options-builder.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type OutdatedConfig} from './config-interfaces/outdated-config.js';

@injectable()
export class OutdatedCommandConfigs {
  private readonly environment: HelmEnvironment;

  public constructor(@inject(InjectTokens.HelmEnvironment) environment?: HelmEnvironment) {
    this.environment = patchInject(environment, InjectTokens.HelmEnvironment, this.constructor.name);
  }

  /**
   * Turns the parsed command line into the settings of one run. The namespace and kube context come from the
   * variables helm exports to its plugins.
   */
  public configBuilder(argv: ArgvStruct): OutdatedConfig {
    const releaseListOptions = ReleaseListOptionsBuilder.builder()
      .allNamespaces(flags.getBoolean(argv, flags.allNamespaces))
      .namespace(this.environment.namespace)
      .kubeContext(this.environment.kubeContext)
      .byDate(flags.getBoolean(argv, flags.byDate))
      .sortReverse(flags.getBoolean(argv, flags.sortReverse))
      .all(flags.getBoolean(argv, flags.all))
      .uninstalled(flags.getBoolean(argv, flags.uninstalled))
      .superseded(flags.getBoolean(argv, flags.superseded))
      .uninstalling(flags.getBoolean(argv, flags.uninstalling))
      .deployed(flags.getBoolean(argv, flags.deployed))
      .failed(flags.getBoolean(argv, flags.failed))
      .pending(flags.getBoolean(argv, flags.pending))
      .max(flags.getNumber(argv, flags.max))
      .offset(flags.getNumber(argv, flags.offset))
      .build();

    return {
      options: {
        ignoreRepo: flags.getBoolean(argv, flags.ignoreRepo),
        deprecationNotice: flags.getBoolean(argv, flags.deprecationNotice),
        devel: flags.getBoolean(argv, flags.devel),
      },
      releaseListOptions,
      output: parseOutputFormat(flags.getString(argv, flags.output) ?? OutputFormat.Table),
    };
  }
}
