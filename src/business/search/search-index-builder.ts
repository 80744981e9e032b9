// SPDX-License-Identifier: Apache-2.0

import {SearchIndex} from './search-index.js';
import {type SearchResult} from './search-result.js';
import {type IndexFile} from '../../data/schema/model/repository/index-file.js';
import {type ChartVersion} from '../../data/schema/model/repository/chart-version.js';
import {Comparators} from '../utils/comparators.js';

/**
 * Accumulates repository indexes into a {@link SearchIndex}. Only the newest version of each chart is kept, under the
 * name `repository/chart`.
 */
export class SearchIndexBuilder {
  private readonly results: SearchResult[] = [];

  public addRepository(repositoryName: string, indexFile: IndexFile): SearchIndexBuilder {
    for (const [chartName, versions] of indexFile.entries) {
      if (versions.length === 0) {
        continue;
      }

      const newest: ChartVersion = [...versions].sort((l, r) =>
        Comparators.chartVersionDescending(l.version, r.version),
      )[0];
      this.results.push({name: `${repositoryName}/${chartName}`, repository: repositoryName, chart: newest});
    }

    return this;
  }

  public build(): SearchIndex {
    return new SearchIndex(this.results);
  }
}
