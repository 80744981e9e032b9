// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type HelmEnvironment} from '../../../core/config/helm-environment.js';
import {type ObjectMapper} from '../../../data/mapper/api/object-mapper.js';
import {YamlFileStorageBackend} from '../../../data/backend/impl/yaml-file-storage-backend.js';
import {RepositoryFile} from '../../../data/schema/model/repository/repository-file.js';
import {NoRepositoryConfiguredError} from '../../../core/errors/no-repository-configured-error.js';
import {PathEx} from '../../../business/utils/path-ex.js';

/**
 * Reads the repositories file helm keeps at HELM_REPOSITORY_CONFIG.
 */
@injectable()
export class RepositoryFileLoader {
  private readonly environment: HelmEnvironment;
  private readonly mapper: ObjectMapper;

  public constructor(
    @inject(InjectTokens.HelmEnvironment) environment?: HelmEnvironment,
    @inject(InjectTokens.ObjectMapper) mapper?: ObjectMapper,
  ) {
    this.environment = patchInject(environment, InjectTokens.HelmEnvironment, this.constructor.name);
    this.mapper = patchInject(mapper, InjectTokens.ObjectMapper, this.constructor.name);
  }

  /**
   * @param repositoryConfig - path of the repositories file, defaults to the one helm uses
   * @throws NoRepositoryConfiguredError if the file cannot be read or lists no named repository
   */
  public async load(repositoryConfig: string = this.environment.repositoryConfig): Promise<RepositoryFile> {
    const {directory, fileName} = PathEx.split(repositoryConfig);

    let document: object;
    try {
      document = await new YamlFileStorageBackend(directory).readObject(fileName);
    } catch (error) {
      throw new NoRepositoryConfiguredError(repositoryConfig, error);
    }

    const repositoryFile: RepositoryFile = this.mapper.fromObject(RepositoryFile, document);
    const repositories = Array.isArray(repositoryFile.repositories)
      ? repositoryFile.repositories.filter(repository => typeof repository.name === 'string' && repository.name)
      : [];
    if (repositories.length === 0) {
      throw new NoRepositoryConfiguredError(repositoryConfig);
    }

    return new RepositoryFile(repositoryFile.apiVersion, repositoryFile.generated, repositories);
  }
}
