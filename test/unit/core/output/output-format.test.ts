// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import sinon from 'sinon';

import {
  formats,
  isOutputFormat,
  OutputFormat,
  parseOutputFormat,
  writeOutput,
} from '../../../../src/core/output/output-format.js';
import {type OutputWriter} from '../../../../src/core/output/output-writer.js';
import {IllegalArgumentError} from '../../../../src/core/errors/illegal-argument-error.js';

describe('OutputFormat', () => {
  it('should list the supported formats', () => {
    expect(formats()).to.deep.equal(['table', 'json', 'yaml']);
  });

  it('should recognize format names', () => {
    expect(isOutputFormat('yaml')).to.be.true;
    expect(isOutputFormat('YAML')).to.be.false;
    expect(isOutputFormat(1)).to.be.false;
  });

  it('should parse a known format', () => {
    expect(parseOutputFormat('json')).to.equal(OutputFormat.JSON);
  });

  it('should reject an unknown format', () => {
    expect(() => parseOutputFormat('xml')).to.throw(
      IllegalArgumentError,
      'invalid format type: xml, allowed values: table, json, yaml',
    );
  });

  it('should dispatch to the writer method of the format', () => {
    const writer = {
      writeTable: sinon.stub(),
      writeJSON: sinon.stub(),
      writeYAML: sinon.stub(),
    } satisfies OutputWriter;
    const sink = {write: sinon.stub()};

    writeOutput(OutputFormat.YAML, sink, writer);
    writeOutput(OutputFormat.Table, sink, writer);

    expect(writer.writeYAML).to.have.been.calledOnceWith(sink);
    expect(writer.writeTable).to.have.been.calledOnceWith(sink);
    expect(writer.writeJSON).to.not.have.been.called;
  });
});
