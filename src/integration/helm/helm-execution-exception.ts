// SPDX-License-Identifier: Apache-2.0

import {PluginError} from '../../core/errors/plugin-error.js';

/**
 * Exception thrown when the execution of the Helm executable fails.
 */
export class HelmExecutionException extends PluginError {
  /**
   * The default message to use when no message is provided
   */
  private static readonly DEFAULT_MESSAGE = 'Execution of the Helm command failed with exit code: %d';

  /**
   * @param exitCode The exit code returned by the Helm executable or the operating system
   * @param message The detail message, defaults to one naming the exit code
   * @param stdOut The standard output of the Helm executable
   * @param stdErr The standard error of the Helm executable
   * @param cause The cause
   */
  constructor(
    private readonly exitCode: number,
    message?: string,
    private readonly stdOut: string = '',
    private readonly stdErr: string = '',
    cause?: unknown,
  ) {
    super(message ?? HelmExecutionException.DEFAULT_MESSAGE.replace('%d', exitCode.toString()), cause, {
      exitCode,
      stdErr,
    });
  }

  /**
   * Returns the exit code returned by the Helm executable or the operating system.
   */
  getExitCode(): number {
    return this.exitCode;
  }

  getStdOut(): string {
    return this.stdOut;
  }

  getStdErr(): string {
    return this.stdErr;
  }

  override toString(): string {
    return `HelmExecutionException{message=${this.message}, exitCode=${this.getExitCode()}, stdOut='${this.getStdOut()}', stdErr='${this.getStdErr()}'}`;
  }
}
