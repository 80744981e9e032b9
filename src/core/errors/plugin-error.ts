// SPDX-License-Identifier: Apache-2.0

export class PluginError extends Error {
  public readonly statusCode?: number;

  /**
   * Create a custom error object
   *
   * error metadata will include the `cause`
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    cause?: unknown,
    public readonly meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
    if (cause !== undefined) {
      this.cause = cause;
      if (cause instanceof Error) {
        this.stack += `\nCaused by: ${cause.stack}`;
      }
      if (PluginError.hasStatusCode(cause)) {
        this.statusCode = cause.statusCode;
      }
    }
  }

  private static hasStatusCode(value: unknown): value is {statusCode: number} {
    return (
      typeof value === 'object' &&
      value !== null &&
      'statusCode' in value &&
      typeof value.statusCode === 'number'
    );
  }
}
