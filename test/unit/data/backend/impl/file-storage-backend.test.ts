// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, before} from 'mocha';
import fs from 'node:fs';

import {FileStorageBackend} from '../../../../../src/data/backend/impl/file-storage-backend.js';
import {StorageBackendError} from '../../../../../src/data/backend/api/storage-backend-error.js';
import {IllegalArgumentError} from '../../../../../src/core/errors/illegal-argument-error.js';
import {PathEx} from '../../../../../src/business/utils/path-ex.js';
import {getTemporaryDirectory} from '../../../../test-utility.js';

describe('File Storage Backend', (): void => {
  let temporaryDirectory: string;

  before((): void => {
    temporaryDirectory = getTemporaryDirectory();
    fs.writeFileSync(PathEx.join(temporaryDirectory, 'stable-index.yaml'), 'apiVersion: v1\n');
  });

  it('should reject an empty base path', (): void => {
    expect(() => new FileStorageBackend('')).to.throw(IllegalArgumentError);
  });

  it('should reject a base path that does not exist', (): void => {
    expect(() => new FileStorageBackend(PathEx.join(temporaryDirectory, 'absent'))).to.throw(
      StorageBackendError,
      'basePath must exist and be valid',
    );
  });

  it('should reject a base path that is a file', (): void => {
    expect(() => new FileStorageBackend(PathEx.join(temporaryDirectory, 'stable-index.yaml'))).to.throw(
      StorageBackendError,
      'basePath must be a valid directory',
    );
  });

  it('should read the bytes of a file', async (): Promise<void> => {
    const backend = new FileStorageBackend(temporaryDirectory);
    const data = await backend.readBytes('stable-index.yaml');
    expect(Buffer.from(data).toString('utf8')).to.equal('apiVersion: v1\n');
  });

  it('should fail to read a missing file', async (): Promise<void> => {
    const backend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.readBytes('missing-index.yaml')).to.be.rejectedWith(StorageBackendError, 'error reading file');
  });

  it('should reject an empty key', async (): Promise<void> => {
    const backend = new FileStorageBackend(temporaryDirectory);
    await expect(backend.readBytes('')).to.be.rejectedWith(IllegalArgumentError);
  });
});
