// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';

@Exclude()
export class RepositoryEntry {
  @Expose()
  public name: string;

  @Expose()
  public url: string;

  public constructor(name?: string, url?: string) {
    this.name = name ?? '';
    this.url = url ?? '';
  }
}
