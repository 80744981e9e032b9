// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {OutdatedElement} from './outdated-element.js';

/**
 * All repositories that serve the chart of one release, when there is more than one.
 */
@Exclude()
export class RepoDuplicateGroup {
  @Expose({name: 'deploy_name'})
  public readonly name: string;

  @Expose()
  public readonly namespace: string;

  @Expose()
  @Type(() => OutdatedElement)
  public readonly repos: readonly OutdatedElement[];

  public constructor(name?: string, namespace?: string, repos?: OutdatedElement[]) {
    this.name = name ?? '';
    this.namespace = namespace ?? '';
    this.repos = Object.freeze([...(repos ?? [])]);
  }

  public get installedVersion(): string {
    return this.repos.length > 0 ? this.repos[0].installedVersion : '';
  }
}
