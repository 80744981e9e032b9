// SPDX-License-Identifier: Apache-2.0

import {type ObjectStorageBackend} from '../api/object-storage-backend.js';
import {FileStorageBackend} from './file-storage-backend.js';
import {StorageBackendError} from '../api/storage-backend-error.js';
import yaml from 'yaml';

export class YamlFileStorageBackend extends FileStorageBackend implements ObjectStorageBackend {
  public constructor(basePath: string) {
    super(basePath);
  }

  public async readObject(key: string): Promise<object> {
    const data: Uint8Array = await this.readBytes(key);

    const filePath: string = this.filePath(key);
    if (data.length === 0) {
      throw new StorageBackendError(`file is empty: ${filePath}`, undefined, {filePath});
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(Buffer.from(data).toString('utf8'));
    } catch (error) {
      throw new StorageBackendError(`error parsing yaml file: ${filePath}`, error, {filePath});
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new StorageBackendError(`yaml file does not contain a mapping: ${filePath}`, undefined, {filePath});
    }

    return parsed;
  }
}
