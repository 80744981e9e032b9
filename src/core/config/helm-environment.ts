// SPDX-License-Identifier: Apache-2.0

import os from 'node:os';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {PathEx} from '../../business/utils/path-ex.js';
import * as constants from '../constants.js';

/**
 * The settings a helm plugin receives through its environment. Helm exports the HELM_* variables before it starts a
 * plugin; when the plugin runs on its own the same defaults as helm's are derived from the XDG variables and the
 * platform.
 */
@injectable()
export class HelmEnvironment {
  public readonly helmBinary: string;
  public readonly namespace?: string;
  public readonly kubeContext?: string;
  public readonly debug: boolean;
  public readonly configHome: string;
  public readonly cacheHome: string;
  public readonly repositoryConfig: string;
  public readonly repositoryCache: string;
  public readonly logsDirectory: string;

  public constructor(
    @inject(InjectTokens.ProcessEnvironment) environment?: NodeJS.ProcessEnv,
    @inject(InjectTokens.OsPlatform) platform?: NodeJS.Platform,
  ) {
    const variables: NodeJS.ProcessEnv = patchInject(environment, InjectTokens.ProcessEnvironment, this.constructor.name);
    const osPlatform: NodeJS.Platform = patchInject(platform, InjectTokens.OsPlatform, this.constructor.name);
    const value = (name: string): string | undefined => {
      const raw = variables[name]?.trim();
      return raw ? raw : undefined;
    };

    this.helmBinary = value('HELM_BIN') ?? constants.DEFAULT_HELM_BINARY;
    this.namespace = value('HELM_NAMESPACE');
    this.kubeContext = value('HELM_KUBECONTEXT');
    this.debug = HelmEnvironment.isTrue(value('HELM_DEBUG'));

    const home: string = value('HOME') ?? value('USERPROFILE') ?? os.homedir();
    this.configHome =
      value('HELM_CONFIG_HOME') ??
      HelmEnvironment.xdgPath(value('XDG_CONFIG_HOME')) ??
      HelmEnvironment.defaultConfigHome(osPlatform, home, value('APPDATA'));
    this.cacheHome =
      value('HELM_CACHE_HOME') ??
      HelmEnvironment.xdgPath(value('XDG_CACHE_HOME')) ??
      HelmEnvironment.defaultCacheHome(osPlatform, home, value('TEMP'));

    this.repositoryConfig =
      value('HELM_REPOSITORY_CONFIG') ?? PathEx.join(this.configHome, constants.REPOSITORY_CONFIG_FILE);
    this.repositoryCache =
      value('HELM_REPOSITORY_CACHE') ?? PathEx.join(this.cacheHome, constants.REPOSITORY_CACHE_DIRECTORY);
    this.logsDirectory =
      value('HELM_OUTDATED_HOME') ?? PathEx.join(this.cacheHome, 'plugins', constants.PLUGIN_NAME, 'logs');
  }

  /**
   * Path of the cached index file helm keeps for the named repository.
   */
  public indexFilePath(repositoryName: string): string {
    return PathEx.join(this.repositoryCache, `${repositoryName}${constants.INDEX_FILE_SUFFIX}`);
  }

  private static isTrue(raw?: string): boolean {
    return raw !== undefined && ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
  }

  private static xdgPath(base?: string): string | undefined {
    return base ? PathEx.join(base, 'helm') : undefined;
  }

  private static defaultConfigHome(platform: NodeJS.Platform, home: string, appData?: string): string {
    switch (platform) {
      case 'darwin': {
        return PathEx.join(home, 'Library', 'Preferences', 'helm');
      }
      case 'win32': {
        return PathEx.join(appData ?? PathEx.join(home, 'AppData', 'Roaming'), 'helm');
      }
      default: {
        return PathEx.join(home, '.config', 'helm');
      }
    }
  }

  private static defaultCacheHome(platform: NodeJS.Platform, home: string, temporary?: string): string {
    switch (platform) {
      case 'darwin': {
        return PathEx.join(home, 'Library', 'Caches', 'helm');
      }
      case 'win32': {
        return PathEx.join(temporary ?? PathEx.join(home, 'AppData', 'Local', 'Temp'), 'helm');
      }
      default: {
        return PathEx.join(home, '.cache', 'helm');
      }
    }
  }
}
