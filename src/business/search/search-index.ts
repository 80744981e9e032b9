// SPDX-License-Identifier: Apache-2.0

import {type SearchResult} from './search-result.js';

/**
 * The merged, read-only view of every configured repository's charts. Results keep the order in which their
 * repositories and charts were added.
 */
export class SearchIndex {
  private readonly results: readonly SearchResult[];

  public constructor(results: readonly SearchResult[]) {
    this.results = Object.freeze(results.map(result => Object.freeze({...result, chart: Object.freeze(result.chart)})));
  }

  public all(): readonly SearchResult[] {
    return this.results;
  }

  public get size(): number {
    return this.results.length;
  }

  public repositories(): string[] {
    return [...new Set(this.results.map(result => result.repository))];
  }
}
