// SPDX-License-Identifier: Apache-2.0

import {type CommandFlag} from '../types/flag-types.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import * as constants from '../core/constants.js';
import {formats, OutputFormat} from '../core/output/output-format.js';

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setRequiredCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {
        describe: flag.definition.describe,
        alias: flag.definition.alias,
        type: flag.definition.type,
        choices: flag.definition.choices,
        demandOption: true,
      });
    }
  }

  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      const defaultValue = flag.definition.defaultValue === '' ? undefined : flag.definition.defaultValue;
      y.option(flag.name, {
        describe: flag.definition.describe,
        alias: flag.definition.alias,
        type: flag.definition.type,
        choices: flag.definition.choices,
        default: defaultValue,
      });
    }
  }

  /**
   * Reads a boolean flag, falling back to its default when absent.
   * @throws IllegalArgumentError if the value is not a boolean
   */
  public static getBoolean(argv: ArgvStruct, flag: CommandFlag): boolean {
    const value: unknown = argv[flag.name] ?? flag.definition.defaultValue ?? false;
    if (typeof value !== 'boolean') {
      throw new IllegalArgumentError(`flag --${flag.name} expects true or false`, value);
    }

    return value;
  }

  /**
   * Reads a numeric flag, falling back to its default when absent.
   * @throws IllegalArgumentError if the value is not a non-negative integer
   */
  public static getNumber(argv: ArgvStruct, flag: CommandFlag): number {
    const value: unknown = argv[flag.name] ?? flag.definition.defaultValue ?? 0;
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
      throw new IllegalArgumentError(`flag --${flag.name} expects a non-negative integer`, value);
    }

    return value;
  }

  /**
   * Reads a string flag, falling back to its default when absent.
   */
  public static getString(argv: ArgvStruct, flag: CommandFlag): string | undefined {
    const value: unknown = argv[flag.name] ?? flag.definition.defaultValue;
    if (value === undefined || value === null || value === '') {
      return undefined;
    }

    return String(value);
  }

  public static readonly debug: CommandFlag = {
    constName: 'debug',
    name: 'debug',
    definition: {
      describe: 'enable verbose output and show stack traces of errors',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly deprecationNotice: CommandFlag = {
    constName: 'deprecationNotice',
    name: 'deprecation-notice',
    definition: {
      describe: 'disable it to prevent printing the deprecation notice message',
      defaultValue: true,
      type: 'boolean',
    },
  };

  public static readonly ignoreRepo: CommandFlag = {
    constName: 'ignoreRepo',
    name: 'ignore-repo',
    definition: {
      describe: 'ignore error if no repo for a chart is found',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly devel: CommandFlag = {
    constName: 'devel',
    name: 'devel',
    definition: {
      describe:
        "use development versions (alpha, beta, and release candidate releases), too. Equivalent to version '>0.0.0-0'.",
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly short: CommandFlag = {
    constName: 'short',
    name: 'short',
    definition: {
      describe: 'output short (quiet) listing format',
      alias: 'q',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly byDate: CommandFlag = {
    constName: 'byDate',
    name: 'date',
    definition: {
      describe: 'sort by release date',
      alias: 'd',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly sortReverse: CommandFlag = {
    constName: 'sortReverse',
    name: 'reverse',
    definition: {
      describe: 'reverse the sort order',
      alias: 'r',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly all: CommandFlag = {
    constName: 'all',
    name: 'all',
    definition: {
      describe: 'show all releases, not just the ones marked deployed or failed',
      alias: 'a',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly uninstalled: CommandFlag = {
    constName: 'uninstalled',
    name: 'uninstalled',
    definition: {
      describe: 'show uninstalled releases',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly superseded: CommandFlag = {
    constName: 'superseded',
    name: 'superseded',
    definition: {
      describe: 'show superseded releases',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly uninstalling: CommandFlag = {
    constName: 'uninstalling',
    name: 'uninstalling',
    definition: {
      describe: 'show releases that are currently being uninstalled',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly deployed: CommandFlag = {
    constName: 'deployed',
    name: 'deployed',
    definition: {
      describe: 'show deployed releases. If no other is specified, this will be automatically enabled',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly failed: CommandFlag = {
    constName: 'failed',
    name: 'failed',
    definition: {
      describe: 'show failed releases',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly pending: CommandFlag = {
    constName: 'pending',
    name: 'pending',
    definition: {
      describe: 'show pending releases',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly allNamespaces: CommandFlag = {
    constName: 'allNamespaces',
    name: 'all-namespaces',
    definition: {
      describe: 'list releases across all namespaces',
      alias: 'A',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly max: CommandFlag = {
    constName: 'max',
    name: 'max',
    definition: {
      describe: 'maximum number of releases to fetch',
      alias: 'm',
      defaultValue: constants.DEFAULT_MAX_RELEASES,
      type: 'number',
    },
  };

  public static readonly offset: CommandFlag = {
    constName: 'offset',
    name: 'offset',
    definition: {
      describe: 'next release index in the list, used to offset from start value',
      defaultValue: 0,
      type: 'number',
    },
  };

  public static readonly output: CommandFlag = {
    constName: 'output',
    name: 'output',
    definition: {
      describe: `prints the output in the specified format. Allowed values: ${formats().join(', ')}`,
      alias: 'o',
      defaultValue: OutputFormat.Table,
      type: 'string',
      choices: formats(),
    },
  };

  public static readonly allFlags: CommandFlag[] = [
    Flags.debug,
    Flags.deprecationNotice,
    Flags.ignoreRepo,
    Flags.devel,
    Flags.short,
    Flags.byDate,
    Flags.sortReverse,
    Flags.all,
    Flags.uninstalled,
    Flags.superseded,
    Flags.uninstalling,
    Flags.deployed,
    Flags.failed,
    Flags.pending,
    Flags.allNamespaces,
    Flags.max,
    Flags.offset,
    Flags.output,
  ];
}
