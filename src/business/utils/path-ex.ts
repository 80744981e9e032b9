// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';

export class PathEx {
  /**
   * Joins the given paths. This is a wrapper around path.join. It is recommended to only use this when you are dealing
   * with part of a path that is not a complete path reference on its own.
   *
   * This method is not safe unless literals are used as parameters. It is best to avoid using user input directly for
   * constructing paths.
   *
   * For more information see: https://owasp.org/www-community/attacks/Path_Traversal
   * @param paths
   */
  public static join(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.normalize(path.join(...paths));
  }

  /**
   * Resolves the given paths. This is a wrapper around path.resolve.
   *
   * For more information see: https://owasp.org/www-community/attacks/Path_Traversal
   * @param paths
   */
  public static resolve(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.resolve(...paths);
  }

  /**
   * Splits a file path into its directory and base name.
   */
  public static split(filePath: string): {directory: string; fileName: string} {
    const resolved: string = PathEx.resolve(filePath);
    return {directory: path.dirname(resolved), fileName: path.basename(resolved)};
  }
}
