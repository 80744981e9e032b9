// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {type OutputWriter} from './output-writer.js';
import {type TextSink} from './text-sink.js';

export const OutputFormat = {
  Table: 'table',
  JSON: 'json',
  YAML: 'yaml',
} as const;

export type OutputFormat = (typeof OutputFormat)[keyof typeof OutputFormat];

const FORMATS: readonly OutputFormat[] = Object.values(OutputFormat);

/**
 * Names of every supported format, in the order help text lists them.
 */
export function formats(): string[] {
  return [...FORMATS];
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && FORMATS.some(format => format === value);
}

/**
 * @throws IllegalArgumentError for an unknown format name
 */
export function parseOutputFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new IllegalArgumentError(`invalid format type: ${value}, allowed values: ${formats().join(', ')}`, value);
  }

  return value;
}

/**
 * Renders the writer's data to the sink in the requested format.
 */
export function writeOutput(format: OutputFormat, sink: TextSink, writer: OutputWriter): void {
  switch (format) {
    case OutputFormat.Table: {
      writer.writeTable(sink);
      break;
    }
    case OutputFormat.JSON: {
      writer.writeJSON(sink);
      break;
    }
    case OutputFormat.YAML: {
      writer.writeYAML(sink);
      break;
    }
    default: {
      const unknown: never = format;
      throw new IllegalArgumentError(`invalid format type: ${String(unknown)}`, unknown);
    }
  }
}
