// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type HelmEnvironment} from '../../../core/config/helm-environment.js';
import {type ObjectMapper} from '../../../data/mapper/api/object-mapper.js';
import {YamlFileStorageBackend} from '../../../data/backend/impl/yaml-file-storage-backend.js';
import {ChartVersion} from '../../../data/schema/model/repository/chart-version.js';
import {IndexFile} from '../../../data/schema/model/repository/index-file.js';
import {CorruptIndexFileError} from '../../../core/errors/corrupt-index-file-error.js';
import {PathEx} from '../../../business/utils/path-ex.js';

/**
 * Reads the index a `helm repo update` cached for one repository.
 */
@injectable()
export class IndexFileLoader {
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
   * @throws CorruptIndexFileError if the index is missing, unreadable or not an index
   */
  public async load(repositoryName: string): Promise<IndexFile> {
    const {directory, fileName} = PathEx.split(this.environment.indexFilePath(repositoryName));

    let document: object;
    try {
      document = await new YamlFileStorageBackend(directory).readObject(fileName);
    } catch (error) {
      throw new CorruptIndexFileError(repositoryName, `cannot read index file of repository '${repositoryName}'`, error);
    }

    if (!('apiVersion' in document) || typeof document.apiVersion !== 'string' || !document.apiVersion) {
      throw new CorruptIndexFileError(repositoryName, `index file of repository '${repositoryName}' has no API version`);
    }
    const apiVersion: string = document.apiVersion;
    const generated: string =
      'generated' in document && document.generated !== undefined && document.generated !== null
        ? String(document.generated)
        : '';

    const entries = new Map<string, readonly ChartVersion[]>();
    const rawEntries: unknown = 'entries' in document ? document.entries : undefined;
    if (rawEntries === undefined || rawEntries === null) {
      return new IndexFile(apiVersion, generated, entries);
    }
    if (typeof rawEntries !== 'object' || Array.isArray(rawEntries)) {
      throw new CorruptIndexFileError(repositoryName, `entries of repository '${repositoryName}' are not a mapping`);
    }

    for (const [chartName, rawVersions] of Object.entries(rawEntries)) {
      const versions: unknown = rawVersions ?? [];
      if (!Array.isArray(versions)) {
        throw new CorruptIndexFileError(
          repositoryName,
          `versions of chart '${chartName}' in repository '${repositoryName}' are not a list`,
        );
      }

      const items: unknown[] = versions;
      entries.set(chartName, this.mapper.fromArray(ChartVersion, items.filter(IndexFileLoader.isMapping)));
    }

    return new IndexFile(apiVersion, generated, entries);
  }

  private static isMapping(value: unknown): value is object {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }
}
