// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type PluginLogger} from '../../../core/logging/plugin-logger.js';
import {CorruptIndexFileError} from '../../../core/errors/corrupt-index-file-error.js';
import {type SearchIndex} from '../../../business/search/search-index.js';
import {SearchIndexBuilder} from '../../../business/search/search-index-builder.js';
import {type RepositoryFileLoader} from './repository-file-loader.js';
import {type IndexFileLoader} from './index-file-loader.js';

/**
 * Builds the search index from every configured repository, in the order the repositories file lists them.
 */
@injectable()
export class SearchIndexLoader {
  private readonly logger: PluginLogger;
  private readonly repositoryFileLoader: RepositoryFileLoader;
  private readonly indexFileLoader: IndexFileLoader;

  public constructor(
    @inject(InjectTokens.PluginLogger) logger?: PluginLogger,
    @inject(InjectTokens.RepositoryFileLoader) repositoryFileLoader?: RepositoryFileLoader,
    @inject(InjectTokens.IndexFileLoader) indexFileLoader?: IndexFileLoader,
  ) {
    this.logger = patchInject(logger, InjectTokens.PluginLogger, this.constructor.name);
    this.repositoryFileLoader = patchInject(
      repositoryFileLoader,
      InjectTokens.RepositoryFileLoader,
      this.constructor.name,
    );
    this.indexFileLoader = patchInject(indexFileLoader, InjectTokens.IndexFileLoader, this.constructor.name);
  }

  /**
   * @throws NoRepositoryConfiguredError if no repository is configured
   */
  public async load(): Promise<SearchIndex> {
    const repositoryFile = await this.repositoryFileLoader.load();
    const builder = new SearchIndexBuilder();

    for (const repository of repositoryFile.repositories) {
      try {
        builder.addRepository(repository.name, await this.indexFileLoader.load(repository.name));
      } catch (error) {
        if (!(error instanceof CorruptIndexFileError)) {
          throw error;
        }
        this.logger.showWarning(`Repo "${repository.name}" is corrupt or missing. Try 'helm repo update'.`);
        this.logger.debug(error.message, error);
      }
    }

    const index: SearchIndex = builder.build();
    this.logger.debug(`search index holds ${index.size} charts from ${index.repositories().length} repositories`);
    return index;
  }
}
