// SPDX-License-Identifier: Apache-2.0

/**
 * A release deployed in the cluster, reduced to what the outdated check needs.
 */
export class InstalledRelease {
  public constructor(
    public readonly name: string,
    public readonly namespace: string,
    public readonly chartName: string,
    public readonly chartVersion: string,
  ) {
    Object.freeze(this);
  }
}
