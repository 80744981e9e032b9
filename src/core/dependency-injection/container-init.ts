// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {container, Lifecycle} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {type PluginLogger} from '../logging/plugin-logger.js';
import {PluginWinstonLogger} from '../logging/plugin-winston-logger.js';
import {HelmEnvironment} from '../config/helm-environment.js';
import {ErrorHandler} from '../error-handler.js';
import {ClassToObjectMapper} from '../../data/mapper/impl/class-to-object-mapper.js';
import {DefaultHelmClient} from '../../integration/helm/impl/default-helm-client.js';
import {RepositoryFileLoader} from '../../integration/helm/repository/repository-file-loader.js';
import {IndexFileLoader} from '../../integration/helm/repository/index-file-loader.js';
import {SearchIndexLoader} from '../../integration/helm/repository/search-index-loader.js';
import {ReleaseMatcher} from '../../business/outdated/release-matcher.js';
import {OutdatedReportBuilder} from '../../business/outdated/outdated-report-builder.js';
import {OutdatedCommandConfigs} from '../../commands/outdated/configs.js';
import {OutdatedCommandHandlers} from '../../commands/outdated/handlers.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param environment - the process environment helm hands to the plugin
   * @param logLevel - the log level to use, defaults to 'debug' when HELM_DEBUG is set and 'info' otherwise
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    environment: NodeJS.ProcessEnv = process.env,
    logLevel?: string,
    developmentMode?: boolean,
    testLogger?: PluginLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<PluginLogger>(InjectTokens.PluginLogger).debug('Container already initialized');
      return;
    }

    // HelmEnvironment
    container.register(InjectTokens.ProcessEnvironment, {useValue: environment});
    container.register(InjectTokens.OsPlatform, {useValue: os.platform()});
    container.register(InjectTokens.HelmEnvironment, {useClass: HelmEnvironment}, {lifecycle: Lifecycle.Singleton});
    const helmEnvironment = container.resolve<HelmEnvironment>(InjectTokens.HelmEnvironment);

    // PluginLogger
    const level: string = logLevel ?? (helmEnvironment.debug ? constants.DEBUG_LOG_LEVEL : constants.DEFAULT_LOG_LEVEL);
    container.register(InjectTokens.LogLevel, {useValue: level});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode ?? helmEnvironment.debug});
    container.register(InjectTokens.LogsDirectory, {useValue: helmEnvironment.logsDirectory});
    if (testLogger) {
      container.registerInstance(InjectTokens.PluginLogger, testLogger);
      container.resolve<PluginLogger>(InjectTokens.PluginLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.PluginLogger, {useClass: PluginWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<PluginLogger>(InjectTokens.PluginLogger).debug('Using default logger');
    }

    // Data Layer ObjectMapper
    container.register(InjectTokens.ObjectMapper, {useClass: ClassToObjectMapper}, {lifecycle: Lifecycle.Singleton});

    // Helm
    container.register(InjectTokens.Helm, {useClass: DefaultHelmClient}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.RepositoryFileLoader,
      {useClass: RepositoryFileLoader},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.IndexFileLoader, {useClass: IndexFileLoader}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.SearchIndexLoader, {useClass: SearchIndexLoader}, {lifecycle: Lifecycle.Singleton});

    // Outdated check
    container.register(InjectTokens.ReleaseMatcher, {useClass: ReleaseMatcher}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.OutdatedReportBuilder,
      {useClass: OutdatedReportBuilder},
      {lifecycle: Lifecycle.Singleton},
    );

    // Commands
    container.register(
      InjectTokens.OutdatedCommandConfigs,
      {useClass: OutdatedCommandConfigs},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.OutdatedCommandHandlers,
      {useClass: OutdatedCommandHandlers},
      {lifecycle: Lifecycle.Singleton},
    );

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});

    container.resolve<PluginLogger>(InjectTokens.PluginLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param environment - the process environment helm hands to the plugin
   * @param logLevel - the log level to use
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(
    environment?: NodeJS.ProcessEnv,
    logLevel?: string,
    developmentMode?: boolean,
    testLogger?: PluginLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<PluginLogger>(InjectTokens.PluginLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(environment, logLevel, developmentMode, testLogger);
  }
}
