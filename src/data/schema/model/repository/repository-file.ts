// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {RepositoryEntry} from './repository-entry.js';

/**
 * The repositories file helm maintains through `helm repo add` and `helm repo remove`.
 */
@Exclude()
export class RepositoryFile {
  @Expose()
  public apiVersion: string;

  @Expose()
  public generated: string;

  @Expose()
  @Type(() => RepositoryEntry)
  public repositories: RepositoryEntry[];

  public constructor(apiVersion?: string, generated?: string, repositories?: RepositoryEntry[]) {
    this.apiVersion = apiVersion ?? '';
    this.generated = generated ?? '';
    this.repositories = repositories ?? [];
  }
}
