// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Transform} from 'class-transformer';
import {asText} from '../transformers.js';

/**
 * One published version of a chart as listed in a repository index.
 */
@Exclude()
export class ChartVersion {
  @Expose()
  public name: string;

  @Expose()
  @Transform(asText, {toClassOnly: true})
  public version: string;

  // numeric in many indexes, e.g. `appVersion: 1.16`
  @Expose()
  @Transform(asText, {toClassOnly: true})
  public appVersion: string;

  @Expose()
  public description: string;

  @Expose()
  @Transform(asText, {toClassOnly: true})
  public created: string;

  @Expose()
  public deprecated: boolean;

  @Expose()
  public urls: string[];

  public constructor(
    name?: string,
    version?: string,
    appVersion?: string,
    created?: string,
    deprecated?: boolean,
    description?: string,
    urls?: string[],
  ) {
    this.name = name ?? '';
    this.version = version ?? '';
    this.appVersion = appVersion ?? '';
    this.created = created ?? '';
    this.deprecated = deprecated ?? false;
    this.description = description ?? '';
    this.urls = urls ?? [];
  }
}
