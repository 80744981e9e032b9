// SPDX-License-Identifier: Apache-2.0

/**
 * Anything text can be written to, such as process.stdout.
 */
export interface TextSink {
  write(text: string): unknown;
}
