// SPDX-License-Identifier: Apache-2.0

import {HelmExecution} from './helm-execution.js';
import {type PluginLogger} from '../../../core/logging/plugin-logger.js';

/**
 * A builder for creating a helm command execution.
 */
export class HelmExecutionBuilder {
  private static readonly NAME_MUST_NOT_BE_NULL = 'name must not be null';
  private static readonly VALUE_MUST_NOT_BE_NULL = 'value must not be null';

  /**
   * The list of subcommands to be used when execute the helm command.
   */
  private readonly _subcommands: string[] = [];

  /**
   * The arguments to be passed to the helm command.
   */
  private readonly _arguments: Map<string, string> = new Map();

  /**
   * The flags to be passed to the helm command.
   */
  private readonly _flags: string[] = [];

  /**
   * Creates a new HelmExecutionBuilder instance.
   * @param helmExecutable the helm binary, a path or a name looked up on the PATH
   * @param logger receives the assembled command line
   * @param workingDirectory the directory helm runs in
   */
  constructor(
    private readonly helmExecutable: string,
    private readonly logger: PluginLogger,
    private readonly workingDirectory: string = process.cwd(),
  ) {
    if (!helmExecutable) {
      throw new Error('helmExecutable must not be null');
    }
  }

  /**
   * Adds the list of subcommands to the helm execution.
   * @param commands the list of subcommands to be added
   * @returns this builder
   */
  subcommands(...commands: string[]): HelmExecutionBuilder {
    this._subcommands.push(...commands);
    return this;
  }

  /**
   * Adds an argument to the helm execution. A later value for the same name replaces the earlier one.
   * @param name the name of the argument
   * @param value the value of the argument
   * @returns this builder
   */
  argument(name: string, value: string): HelmExecutionBuilder {
    if (!name) {
      throw new Error(HelmExecutionBuilder.NAME_MUST_NOT_BE_NULL);
    }
    if (!value) {
      throw new Error(HelmExecutionBuilder.VALUE_MUST_NOT_BE_NULL);
    }
    this._arguments.set(name, value);
    return this;
  }

  /**
   * Adds a flag to the helm execution.
   * @param flag the flag to be added
   * @returns this builder
   */
  flag(flag: string): HelmExecutionBuilder {
    if (!flag) {
      throw new Error('flag must not be null');
    }
    this._flags.push(flag);
    return this;
  }

  /**
   * Builds the HelmExecution instance.
   */
  build(): HelmExecution {
    return new HelmExecution(this.buildCommand(), this.workingDirectory, {...process.env});
  }

  /**
   * Builds the command array for the helm execution.
   */
  private buildCommand(): string[] {
    const command: string[] = [];
    command.push(this.helmExecutable);
    command.push(...this._subcommands);
    command.push(...this._flags);

    for (const [key, value] of this._arguments.entries()) {
      command.push(`--${key}`);
      command.push(value);
    }

    this.logger.debug(`Helm command: helm ${command.slice(1).join(' ')}`);

    return command;
  }
}
