// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {type SinonStubbedInstance} from 'sinon';

import {SearchIndexLoader} from '../../../../../src/integration/helm/repository/search-index-loader.js';
import {RepositoryFileLoader} from '../../../../../src/integration/helm/repository/repository-file-loader.js';
import {IndexFileLoader} from '../../../../../src/integration/helm/repository/index-file-loader.js';
import {HelmEnvironment} from '../../../../../src/core/config/helm-environment.js';
import {ClassToObjectMapper} from '../../../../../src/data/mapper/impl/class-to-object-mapper.js';
import {NoRepositoryConfiguredError} from '../../../../../src/core/errors/no-repository-configured-error.js';
import {type PluginWinstonLogger} from '../../../../../src/core/logging/plugin-winston-logger.js';
import {PathEx} from '../../../../../src/business/utils/path-ex.js';
import {TEST_DATA_DIRECTORY, testEnvironment} from '../../../../test-container.js';
import {stubLogger} from '../../../fixtures/search-index.fixture.js';

describe('SearchIndexLoader', (): void => {
  let logger: SinonStubbedInstance<PluginWinstonLogger>;

  const loaderFor = (environment: NodeJS.ProcessEnv): SearchIndexLoader => {
    const helmEnvironment = new HelmEnvironment(environment, 'linux');
    const mapper = new ClassToObjectMapper();
    return new SearchIndexLoader(
      logger,
      new RepositoryFileLoader(helmEnvironment, mapper),
      new IndexFileLoader(helmEnvironment, mapper),
    );
  };

  beforeEach((): void => {
    logger = stubLogger();
  });

  it('should merge the newest chart versions of every readable repository', async (): Promise<void> => {
    const index = await loaderFor(testEnvironment()).load();

    expect(index.all().map(result => [result.name, result.chart.version])).to.deep.equal([
      ['stable/nginx', '1.2.0'],
      ['stable/redis', '17.0.0'],
      ['mirror/redis', '18.1.0'],
    ]);
    expect(index.repositories()).to.deep.equal(['stable', 'mirror']);
  });

  it('should warn about corrupt and missing indexes and skip them', async (): Promise<void> => {
    await loaderFor(testEnvironment()).load();

    expect(logger.showWarning).to.have.been.calledTwice;
    expect(logger.showWarning.firstCall).to.have.been.calledWith(
      `Repo "broken" is corrupt or missing. Try 'helm repo update'.`,
    );
    expect(logger.showWarning.secondCall).to.have.been.calledWith(
      `Repo "missing" is corrupt or missing. Try 'helm repo update'.`,
    );
  });

  it('should fail when no repository is configured', async (): Promise<void> => {
    const environment = testEnvironment({
      HELM_REPOSITORY_CONFIG: PathEx.join(TEST_DATA_DIRECTORY, 'empty-repositories.yaml'),
    });

    await expect(loaderFor(environment).load()).to.be.rejectedWith(NoRepositoryConfiguredError);
  });
});
