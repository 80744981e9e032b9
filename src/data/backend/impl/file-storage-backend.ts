// SPDX-License-Identifier: Apache-2.0

import {type StorageBackend} from '../api/storage-backend.js';
import {type Stats, lstatSync, readFileSync} from 'node:fs';
import {StorageBackendError} from '../api/storage-backend-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {PathEx} from '../../../business/utils/path-ex.js';

/**
 * A file storage backend that reads files directly within a specified base path. Keys are file names.
 */
export class FileStorageBackend implements StorageBackend {
  /**
   * Creates a new file storage backend bound to the specified base path.
   *
   * @param basePath - The base path to use for all file operations.
   * @throws IllegalArgumentError if the base path is empty.
   * @throws StorageBackendError if the base path does not exist or is not a directory.
   */
  public constructor(public readonly basePath: string) {
    if (!basePath || basePath.trim().length === 0) {
      throw new IllegalArgumentError('basePath must not be null, undefined or empty');
    }

    let stats: Stats;
    try {
      stats = lstatSync(basePath);
    } catch (error) {
      throw new StorageBackendError(`basePath must exist and be valid: ${basePath}`, error, {basePath});
    }

    if (!stats.isDirectory()) {
      throw new StorageBackendError(`basePath must be a valid directory: ${basePath}`, undefined, {basePath});
    }
  }

  public async readBytes(key: string): Promise<Uint8Array> {
    const filePath: string = this.filePath(key);
    try {
      return new Uint8Array(readFileSync(filePath));
    } catch (error) {
      throw new StorageBackendError(`error reading file: ${filePath}`, error, {filePath});
    }
  }

  protected filePath(key: string): string {
    if (!key || key.trim().length === 0) {
      throw new IllegalArgumentError('key must not be null, undefined or empty');
    }

    return PathEx.join(this.basePath, key);
  }
}
