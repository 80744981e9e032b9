// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Transform} from 'class-transformer';
import {asText} from '../../../../data/schema/model/transformers.js';

/**
 * One row of `helm list --output json`.
 */
@Exclude()
export class ReleaseItem {
  @Expose()
  public name: string;

  @Expose()
  public namespace: string;

  @Expose()
  @Transform(asText, {toClassOnly: true})
  public revision: string;

  @Expose()
  public updated: string;

  @Expose()
  public status: string;

  /**
   * The chart name and version joined by a hyphen, e.g. `ingress-nginx-4.10.0`.
   */
  @Expose()
  public chart: string;

  @Expose({name: 'app_version'})
  @Transform(asText, {toClassOnly: true})
  public appVersion: string;

  public constructor(
    name?: string,
    namespace?: string,
    revision?: string,
    updated?: string,
    status?: string,
    chart?: string,
    appVersion?: string,
  ) {
    this.name = name ?? '';
    this.namespace = namespace ?? '';
    this.revision = revision ?? '';
    this.updated = updated ?? '';
    this.status = status ?? '';
    this.chart = chart ?? '';
    this.appVersion = appVersion ?? '';
  }
}
