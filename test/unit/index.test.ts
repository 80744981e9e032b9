// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach, afterEach} from 'mocha';
import sinon, {type SinonStub, type SinonStubbedInstance} from 'sinon';
import {container} from 'tsyringe-neo';

import {main} from '../../src/index.js';
import {InjectTokens} from '../../src/core/dependency-injection/inject-tokens.js';
import {IllegalArgumentError} from '../../src/core/errors/illegal-argument-error.js';
import {SilentBreak} from '../../src/core/errors/silent-break.js';
import {type PluginLogger} from '../../src/core/logging/plugin-logger.js';
import {type PluginWinstonLogger} from '../../src/core/logging/plugin-winston-logger.js';
import {type HelmClient} from '../../src/integration/helm/helm-client.js';
import {ReleaseItem} from '../../src/integration/helm/model/release/release-item.js';
import {type ReleaseListOptions} from '../../src/integration/helm/model/release/release-list-options.js';
import {resetForTest, testEnvironment} from '../test-container.js';
import {stubLogger} from './fixtures/search-index.fixture.js';

describe('main', () => {
  let logger: SinonStubbedInstance<PluginWinstonLogger>;
  let listReleases: SinonStub<[ReleaseListOptions], Promise<ReleaseItem[]>>;

  /**
   * Runs the plugin with stdout and stderr captured, so the printed report can be asserted.
   */
  const run = async (...arguments_: string[]): Promise<{stdout: string; error?: unknown}> => {
    let stdout = '';
    const write = sinon.stub(process.stdout, 'write').callsFake((chunk: string | Uint8Array): boolean => {
      stdout += chunk.toString();
      return true;
    });
    const consoleError = sinon.stub(console, 'error');
    try {
      await main(['node', 'outdated.js', ...arguments_]);
      return {stdout};
    } catch (error) {
      return {stdout, error};
    } finally {
      write.restore();
      consoleError.restore();
    }
  };

  beforeEach(() => {
    logger = stubLogger();
    resetForTest(testEnvironment(), logger);

    listReleases = sinon
      .stub<[ReleaseListOptions], Promise<ReleaseItem[]>>()
      .resolves([new ReleaseItem('web', 'default', '3', '', 'deployed', 'nginx-1.1.0', '1.25')]);
    const helm: HelmClient = {listReleases};
    container.registerInstance(InjectTokens.Helm, helm);
  });

  afterEach(() => {
    resetForTest();
  });

  it('should print the version and stop with a silent break', async () => {
    const {error} = await run('--version');

    expect(error).to.be.instanceof(SilentBreak);
    expect(logger.showUser).to.have.been.calledTwice;
    expect(listReleases).to.not.have.been.called;
  });

  it('should run the outdated check when no command is named', async () => {
    const {stdout, error} = await run('-o', 'json', '-A', '--max', '10');

    expect(error).to.be.undefined;
    expect(listReleases).to.have.been.calledOnce;
    expect(listReleases.firstCall.args[0].allNamespaces).to.be.true;
    expect(listReleases.firstCall.args[0].max).to.equal(10);
    expect(stdout).to.equal(
      '[{"name":"web","namespace":"default","installed_version":"1.1.0","latest_version":"1.2.0",' +
        '"app_version":"1.26","chart":"stable/nginx","updated":"2024-05-01T12:00:00.000Z","deprecated":false}]\n',
    );
  });

  it('should run the outdated check under its alias', async () => {
    const {error} = await run('od', '-o', 'yaml');

    expect(error).to.be.undefined;
    expect(listReleases).to.have.been.calledOnce;
  });

  it('should reject an unknown output format without printing to stdout', async () => {
    const {stdout, error} = await run('-o', 'xml');

    expect(error).to.be.instanceof(IllegalArgumentError);
    expect(error).to.have.property('message').that.contains('Invalid values:');
    expect(logger.showUser).to.not.have.been.called;
    expect(listReleases).to.not.have.been.called;
    expect(stdout).to.equal('');
  });

  it('should reject an unknown flag', async () => {
    const {error} = await run('--bogus');

    expect(error).to.be.instanceof(IllegalArgumentError);
    expect(error).to.have.property('message', 'Unknown argument: bogus');
    expect(listReleases).to.not.have.been.called;
  });

  it('should use the logger registered in the container', async () => {
    const context: {logger?: PluginLogger} = {};
    await main(['node', 'outdated.js', '--version'], context).catch((error: unknown) => {
      expect(error).to.be.instanceof(SilentBreak);
    });

    expect(context.logger).to.equal(logger);
  });
});
