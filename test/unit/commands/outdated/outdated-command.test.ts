// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, before, after} from 'mocha';
import {container} from 'tsyringe-neo';

import {OutdatedCommand} from '../../../../src/commands/outdated/index.js';
import {OutdatedCommandHandlers} from '../../../../src/commands/outdated/handlers.js';
import * as commands from '../../../../src/commands/index.js';
import {InjectTokens} from '../../../../src/core/dependency-injection/inject-tokens.js';
import {resetForTest, testEnvironment} from '../../../test-container.js';
import {stubLogger} from '../../fixtures/search-index.fixture.js';

describe('OutdatedCommand', () => {
  const logger = stubLogger();

  before(() => {
    resetForTest(testEnvironment(), logger);
  });

  after(() => {
    resetForTest();
  });

  it('should resolve its handlers from the container', () => {
    expect(container.resolve(InjectTokens.OutdatedCommandHandlers)).to.be.instanceof(OutdatedCommandHandlers);

    const command = new OutdatedCommand();
    expect(command.logger).to.equal(logger);
  });

  it('should be the default command of the plugin', () => {
    const definition = new OutdatedCommand().getCommandDefinition();

    expect(definition.command).to.equal('outdated');
    expect(definition.aliases).to.deep.equal(['od', '$0']);
    expect(definition.describe).to.equal('list outdated releases');
  });

  it('should be the only command', () => {
    expect(commands.Initialize().map(definition => definition.command)).to.deep.equal(['outdated']);
  });
});
