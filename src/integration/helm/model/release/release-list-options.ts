// SPDX-License-Identifier: Apache-2.0

import {type HelmExecutionBuilder} from '../../execution/helm-execution-builder.js';

/**
 * Options for listing releases: scope, state filter, sort order and paging.
 */
export class ReleaseListOptions {
  constructor(
    public readonly allNamespaces: boolean = false,
    public readonly namespace?: string,
    public readonly kubeContext?: string,
    public readonly byDate: boolean = false,
    public readonly sortReverse: boolean = false,
    public readonly all: boolean = false,
    public readonly uninstalled: boolean = false,
    public readonly superseded: boolean = false,
    public readonly uninstalling: boolean = false,
    public readonly deployed: boolean = false,
    public readonly failed: boolean = false,
    public readonly pending: boolean = false,
    public readonly max?: number,
    public readonly offset: number = 0,
  ) {}

  /**
   * Applies the options to the given builder.
   * @param builder The builder to apply the options to.
   */
  apply(builder: HelmExecutionBuilder): void {
    if (this.allNamespaces) {
      builder.flag('--all-namespaces');
    } else if (this.namespace) {
      builder.argument('namespace', this.namespace);
    }
    if (this.kubeContext) {
      builder.argument('kube-context', this.kubeContext);
    }

    const flags: Array<[boolean, string]> = [
      [this.byDate, '--date'],
      [this.sortReverse, '--reverse'],
      [this.all, '--all'],
      [this.uninstalled, '--uninstalled'],
      [this.superseded, '--superseded'],
      [this.uninstalling, '--uninstalling'],
      [this.deployed, '--deployed'],
      [this.failed, '--failed'],
      [this.pending, '--pending'],
    ];
    for (const [enabled, flag] of flags) {
      if (enabled) {
        builder.flag(flag);
      }
    }

    if (this.max !== undefined) {
      builder.argument('max', this.max.toString());
    }
    if (this.offset > 0) {
      builder.argument('offset', this.offset.toString());
    }
  }
}
