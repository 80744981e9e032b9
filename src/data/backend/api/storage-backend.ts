// SPDX-License-Identifier: Apache-2.0

/**
 * The storage backend implementations provide the logic to read persistent data from a storage medium. Helm owns the
 * repository files this plugin reads, so backends are read-only.
 *
 * Storage backends should not attempt to interpret or validate the data being read, but should handle the conversion of
 * the underlying data format to plain javascript objects.
 */
export interface StorageBackend {
  /**
   * Reads the persisted data from the storage backend as bytes.
   *
   * @param key - The key to use to read the data from the storage backend. The key is implementation specific and might
   *              be a file name.
   * @returns The persisted data represented as a byte array.
   */
  readBytes(key: string): Promise<Uint8Array>;
}
