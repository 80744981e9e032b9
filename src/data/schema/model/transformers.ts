// SPDX-License-Identifier: Apache-2.0

import {type TransformFnParams} from 'class-transformer';

/**
 * Reads scalars that YAML or JSON may have typed as numbers, booleans or dates as plain text.
 */
export function asText({value}: TransformFnParams): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }

  return String(value);
}
