// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type HelmClient} from '../helm-client.js';
import {HelmExecutionBuilder} from '../execution/helm-execution-builder.js';
import {ReleaseItem} from '../model/release/release-item.js';
import {type ReleaseListOptions} from '../model/release/release-list-options.js';
import {type HelmRequest} from '../request/helm-request.js';
import {ReleaseListRequest} from '../request/release/release-list-request.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type PluginLogger} from '../../../core/logging/plugin-logger.js';
import {type HelmEnvironment} from '../../../core/config/helm-environment.js';
import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';

/**
 * The default implementation of the HelmClient interface.
 */
@injectable()
export class DefaultHelmClient implements HelmClient {
  private readonly logger: PluginLogger;
  private readonly environment: HelmEnvironment;

  constructor(
    @inject(InjectTokens.PluginLogger) logger?: PluginLogger,
    @inject(InjectTokens.HelmEnvironment) environment?: HelmEnvironment,
  ) {
    this.logger = patchInject(logger, InjectTokens.PluginLogger, this.constructor.name);
    this.environment = patchInject(environment, InjectTokens.HelmEnvironment, this.constructor.name);
  }

  public async listReleases(options: ReleaseListOptions): Promise<ReleaseItem[]> {
    return this.executeAsList(new ReleaseListRequest(options), ReleaseItem);
  }

  /**
   * Executes the given request and returns the response as a list of the given class.
   *
   * @param request - The request to execute
   * @param responseClass - The class of the response
   * @returns A list of response objects
   */
  private async executeAsList<T extends HelmRequest, R>(request: T, responseClass: ClassConstructor<R>): Promise<R[]> {
    const builder = new HelmExecutionBuilder(this.environment.helmBinary, this.logger);
    request.apply(builder);
    return builder.build().responseAsList(responseClass);
  }
}
