// SPDX-License-Identifier: Apache-2.0

import {type TextSink} from './text-sink.js';

/**
 * Renders one result in each of the supported output formats.
 */
export interface OutputWriter {
  writeTable(out: TextSink): void;

  writeJSON(out: TextSink): void;

  writeYAML(out: TextSink): void;
}
