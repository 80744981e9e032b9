// SPDX-License-Identifier: Apache-2.0

import {Container} from '../src/core/dependency-injection/container-init.js';
import {type PluginLogger} from '../src/core/logging/plugin-logger.js';
import {PathEx} from '../src/business/utils/path-ex.js';

export const TEST_DATA_DIRECTORY = PathEx.join('test', 'data');
export const TEMPORARY_DIRECTORY = PathEx.join(TEST_DATA_DIRECTORY, 'tmp');

/**
 * The variables helm would export to the plugin, pointing every location at the test data.
 */
export function testEnvironment(overrides: NodeJS.ProcessEnv = {}): NodeJS.ProcessEnv {
  return {
    HOME: TEMPORARY_DIRECTORY,
    HELM_BIN: 'helm',
    HELM_REPOSITORY_CONFIG: PathEx.join(TEST_DATA_DIRECTORY, 'repositories.yaml'),
    HELM_REPOSITORY_CACHE: PathEx.join(TEST_DATA_DIRECTORY, 'cache'),
    HELM_OUTDATED_HOME: PathEx.join(TEMPORARY_DIRECTORY, 'logs'),
    ...overrides,
  };
}

export function resetForTest(environment: NodeJS.ProcessEnv = testEnvironment(), testLogger?: PluginLogger): void {
  // need to init the container prior to constructing any injectable for dependency injection to work
  Container.getInstance().reset(environment, 'debug', true, testLogger);
}
