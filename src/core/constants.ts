// SPDX-License-Identifier: Apache-2.0

export const PLUGIN_NAME = 'helm-outdated';
export const DEFAULT_HELM_BINARY = 'helm';
export const REPOSITORY_CONFIG_FILE = 'repositories.yaml';
export const REPOSITORY_CACHE_DIRECTORY = 'repository';
export const INDEX_FILE_SUFFIX = '-index.yaml';
export const DEFAULT_LOG_LEVEL = 'info';
export const DEBUG_LOG_LEVEL = 'debug';

export const DEFAULT_MAX_RELEASES = 256;

export const DETAIL_LABEL_WIDTH = 24;
export const DETAIL_SEPARATOR = '----';

export const OUTDATED_HELP = `
This Command lists all releases which are outdated.

By default, the output is printed in a Table but you can change this behavior
with the '--output' Flag.
`;
