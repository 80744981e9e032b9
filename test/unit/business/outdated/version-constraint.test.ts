// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import each from 'mocha-each';

import {isNewer, VersionConstraint} from '../../../../src/business/outdated/version-constraint.js';
import {VersionParseError} from '../../../../src/core/errors/version-parse-error.js';

describe('VersionConstraint', (): void => {
  each([
    {installed: '1.0.0', candidate: '1.1.0', devel: false, expected: true},
    {installed: '1.1.0', candidate: '1.1.0', devel: false, expected: false},
    {installed: '1.2.0', candidate: '1.1.0', devel: false, expected: false},
    {installed: '1.0.0', candidate: '1.1.0-beta.1', devel: false, expected: false},
    {installed: '1.0.0-beta.1', candidate: '1.0.0-beta.2', devel: false, expected: true},
    {installed: '1.0.0-beta.1', candidate: '1.0.0', devel: false, expected: true},
    {installed: '1.0.0', candidate: '1.1.0-beta.1', devel: true, expected: true},
    {installed: '1.0.0', candidate: '1.0.0', devel: true, expected: false},
    {installed: '1.0.0', candidate: '0.9.0', devel: true, expected: false},
    {installed: '1.2.0', candidate: '1.2.0-rc.1', devel: true, expected: true},
    {installed: '1.0.0-beta.2', candidate: '1.0.0-beta.1', devel: true, expected: false},
    {installed: 'v1.0', candidate: '1.0.1', devel: false, expected: true},
    {installed: '2', candidate: 'v2.0.0', devel: false, expected: false},
  ]).it(
    'should decide whether the candidate is newer than the installed version',
    ({
      installed,
      candidate,
      devel,
      expected,
    }: {
      installed: string;
      candidate: string;
      devel: boolean;
      expected: boolean;
    }): void => {
      expect(isNewer(installed, candidate, devel)).to.equal(expected);
    },
  );

  it('should describe the stable constraint', (): void => {
    expect(VersionConstraint.forInstalled('1.2.0', false).toString()).to.equal('> 1.2.0');
  });

  it('should describe the devel constraint with a pre-release lower bound', (): void => {
    expect(VersionConstraint.forInstalled('1.2.0', true).toString()).to.equal('> 1.2.0-0 != 1.2.0');
  });

  it('should use an installed pre-release as its own lower bound', (): void => {
    expect(VersionConstraint.forInstalled('1.2.0-rc.1', true).toString()).to.equal('> 1.2.0-rc.1 != 1.2.0-rc.1');
  });

  it('should pad missing minor and patch numbers', (): void => {
    expect(VersionConstraint.parse(' v3 ').version).to.equal('3.0.0');
    expect(VersionConstraint.parse('3.4').version).to.equal('3.4.0');
  });

  it('should return null for a value that is not a version', (): void => {
    expect(VersionConstraint.tryParse('latest')).to.be.null;
    expect(VersionConstraint.tryParse('1.2.3.4')).to.be.null;
  });

  it('should reject an installed version that is not a version', (): void => {
    expect(() => VersionConstraint.forInstalled('not-a-version', false))
      .to.throw(VersionParseError)
      .with.property('message', "Invalid Semantic Version: 'not-a-version'");
  });

  it('should reject a candidate version that is not a version', (): void => {
    const constraint = VersionConstraint.forInstalled('1.0.0', false);
    expect(() => constraint.isSatisfiedBy('1.x')).to.throw(VersionParseError);
  });
});
