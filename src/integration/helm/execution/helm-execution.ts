// SPDX-License-Identifier: Apache-2.0

import {spawn} from 'node:child_process';
import {plainToInstance} from 'class-transformer';
import {HelmExecutionException} from '../helm-execution-exception.js';
import {HelmParserException} from '../helm-parser-exception.js';
import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';

/**
 * Represents the execution of a helm command and is responsible for parsing the response.
 */
export class HelmExecution {
  /**
   * The message for a deserialization error.
   */
  private static readonly MSG_LIST_DESERIALIZATION_ERROR =
    'Failed to deserialize the output into a list of the specified class: %s';

  private readonly output: string[] = [];
  private readonly errOutput: string[] = [];
  private exitCodeValue: number | null = null;

  /**
   * Creates a new HelmExecution instance. The process is started by {@link waitFor}.
   * @param command The command array to execute, the executable first
   * @param workingDirectory The working directory for the process
   * @param environmentVariables The environment variables to set
   */
  constructor(
    public readonly command: readonly string[],
    private readonly workingDirectory: string,
    private readonly environmentVariables: NodeJS.ProcessEnv,
  ) {}

  /**
   * Runs the process to completion.
   * @returns A promise that resolves when the process exits with code 0
   */
  async waitFor(): Promise<void> {
    const [executable, ...arguments_] = this.command;

    return new Promise((resolve, reject) => {
      const child = spawn(executable, arguments_, {
        cwd: this.workingDirectory,
        env: this.environmentVariables,
      });

      child.stdout.on('data', (d: Buffer) => {
        this.output.push(d.toString());
      });

      child.stderr.on('data', (d: Buffer) => {
        const items: string[] = d.toString().split(/\r?\n/);
        for (const item of items) {
          if (item.trim()) {
            this.errOutput.push(item.trim());
          }
        }
      });

      child.on('error', error => {
        reject(new HelmExecutionException(127, `Failed to run '${executable}': ${error.message}`, '', '', error));
      });

      child.on('close', code => {
        this.exitCodeValue = code;
        if (code === 0) {
          resolve();
        } else {
          reject(
            new HelmExecutionException(
              code ?? 1,
              `Process exited with code ${code}: ${this.standardError()}`,
              this.standardOutput(),
              this.standardError(),
            ),
          );
        }
      });
    });
  }

  /**
   * Gets the exit code of the process.
   * @returns The exit code or null if the process hasn't completed
   */
  exitCode(): number | null {
    return this.exitCodeValue;
  }

  /**
   * Gets the standard output of the process.
   */
  standardOutput(): string {
    return this.output.join('');
  }

  /**
   * Gets the standard error of the process, one line per captured line.
   */
  standardError(): string {
    return this.errOutput.join('\n');
  }

  /**
   * Gets the response as a list of parsed objects.
   * @param responseClass The class to parse each item in the response into
   * @returns A promise that resolves with the parsed response list
   */
  async responseAsList<T>(responseClass: ClassConstructor<T>): Promise<T[]> {
    await this.waitFor();

    return HelmExecution.parseList(responseClass, this.standardOutput());
  }

  /**
   * Parses a JSON array printed by helm into instances of the response class.
   */
  static parseList<T>(responseClass: ClassConstructor<T>, output: string): T[] {
    const message: string = HelmExecution.MSG_LIST_DESERIALIZATION_ERROR.replace('%s', responseClass.name);

    let parsed: unknown;
    try {
      parsed = JSON.parse(output.trim() || '[]');
    } catch (error) {
      throw new HelmParserException(message, error);
    }

    if (!Array.isArray(parsed)) {
      throw new HelmParserException(message);
    }

    const items: unknown[] = parsed;
    return items
      .filter((item): item is object => typeof item === 'object' && item !== null && !Array.isArray(item))
      .map(item => plainToInstance(responseClass, item, {exposeUnsetFields: false}));
  }
}
