// SPDX-License-Identifier: Apache-2.0

import {ReleaseListOptions} from './release-list-options.js';

/**
 * Builder for {@link ReleaseListOptions}.
 */
export class ReleaseListOptionsBuilder {
  private _allNamespaces: boolean = false;
  private _namespace?: string;
  private _kubeContext?: string;
  private _byDate: boolean = false;
  private _sortReverse: boolean = false;
  private _all: boolean = false;
  private _uninstalled: boolean = false;
  private _superseded: boolean = false;
  private _uninstalling: boolean = false;
  private _deployed: boolean = false;
  private _failed: boolean = false;
  private _pending: boolean = false;
  private _max?: number;
  private _offset: number = 0;

  private constructor() {}

  public static builder(): ReleaseListOptionsBuilder {
    return new ReleaseListOptionsBuilder();
  }

  /**
   * Lists releases of every namespace. Takes precedence over {@link namespace}.
   */
  public allNamespaces(allNamespaces: boolean): ReleaseListOptionsBuilder {
    this._allNamespaces = allNamespaces;
    return this;
  }

  public namespace(namespace?: string): ReleaseListOptionsBuilder {
    this._namespace = namespace;
    return this;
  }

  public kubeContext(context?: string): ReleaseListOptionsBuilder {
    this._kubeContext = context;
    return this;
  }

  public byDate(byDate: boolean): ReleaseListOptionsBuilder {
    this._byDate = byDate;
    return this;
  }

  public sortReverse(sortReverse: boolean): ReleaseListOptionsBuilder {
    this._sortReverse = sortReverse;
    return this;
  }

  public all(all: boolean): ReleaseListOptionsBuilder {
    this._all = all;
    return this;
  }

  public uninstalled(uninstalled: boolean): ReleaseListOptionsBuilder {
    this._uninstalled = uninstalled;
    return this;
  }

  public superseded(superseded: boolean): ReleaseListOptionsBuilder {
    this._superseded = superseded;
    return this;
  }

  public uninstalling(uninstalling: boolean): ReleaseListOptionsBuilder {
    this._uninstalling = uninstalling;
    return this;
  }

  public deployed(deployed: boolean): ReleaseListOptionsBuilder {
    this._deployed = deployed;
    return this;
  }

  public failed(failed: boolean): ReleaseListOptionsBuilder {
    this._failed = failed;
    return this;
  }

  public pending(pending: boolean): ReleaseListOptionsBuilder {
    this._pending = pending;
    return this;
  }

  /**
   * Maximum number of releases helm fetches.
   */
  public max(max?: number): ReleaseListOptionsBuilder {
    this._max = max;
    return this;
  }

  /**
   * Index of the first release to return. Zero starts at the beginning and is not passed to helm.
   */
  public offset(offset: number): ReleaseListOptionsBuilder {
    this._offset = offset;
    return this;
  }

  public build(): ReleaseListOptions {
    return new ReleaseListOptions(
      this._allNamespaces,
      this._namespace,
      this._kubeContext,
      this._byDate,
      this._sortReverse,
      this._all,
      this._uninstalled,
      this._superseded,
      this._uninstalling,
      this._deployed,
      this._failed,
      this._pending,
      this._max,
      this._offset,
    );
  }
}
