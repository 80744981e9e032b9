// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  OsPlatform: Symbol.for('OsPlatform'),
  ProcessEnvironment: Symbol.for('ProcessEnvironment'),
  HelmEnvironment: Symbol.for('HelmEnvironment'),
  PluginLogger: Symbol.for('PluginLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  ObjectMapper: Symbol.for('ObjectMapper'),
  Helm: Symbol.for('Helm'),
  RepositoryFileLoader: Symbol.for('RepositoryFileLoader'),
  IndexFileLoader: Symbol.for('IndexFileLoader'),
  SearchIndexLoader: Symbol.for('SearchIndexLoader'),
  ReleaseMatcher: Symbol.for('ReleaseMatcher'),
  OutdatedReportBuilder: Symbol.for('OutdatedReportBuilder'),
  OutdatedCommandConfigs: Symbol.for('OutdatedCommandConfigs'),
  OutdatedCommandHandlers: Symbol.for('OutdatedCommandHandlers'),
};
