// SPDX-License-Identifier: Apache-2.0

import {type StorageBackend} from './storage-backend.js';

export interface ObjectStorageBackend extends StorageBackend {
  /**
   * Reads the persisted data and parses it into a plain javascript object.
   *
   * @param key - The key to use to read the data from the storage backend.
   * @throws StorageBackendError if the data cannot be read or is not an object.
   */
  readObject(key: string): Promise<object>;
}
