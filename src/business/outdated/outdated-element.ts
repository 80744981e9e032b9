// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';

@Exclude()
export class OutdatedElement {
  @Expose()
  public readonly name: string;

  @Expose()
  public readonly namespace: string;

  @Expose({name: 'installed_version'})
  public readonly installedVersion: string;

  @Expose({name: 'latest_version'})
  public readonly latestVersion: string;

  @Expose({name: 'app_version'})
  public readonly appVersion: string;

  /**
   * `repository/chart` of the index entry
   */
  @Expose()
  public readonly chart: string;

  /**
   * When the chart version was published to the repository, ISO-8601 or empty when the index does not say.
   */
  @Expose()
  public readonly updated: string;

  @Expose()
  public readonly deprecated: boolean;

  public constructor(
    name?: string,
    namespace?: string,
    installedVersion?: string,
    latestVersion?: string,
    appVersion?: string,
    chart?: string,
    updated?: string,
    deprecated?: boolean,
  ) {
    this.name = name ?? '';
    this.namespace = namespace ?? '';
    this.installedVersion = installedVersion ?? '';
    this.latestVersion = latestVersion ?? '';
    this.appVersion = appVersion ?? '';
    this.chart = chart ?? '';
    this.updated = updated ?? '';
    this.deprecated = deprecated ?? false;
  }

  /**
   * The repository part of the chart identifier.
   */
  public get repository(): string {
    return this.chart.split('/')[0];
  }
}
