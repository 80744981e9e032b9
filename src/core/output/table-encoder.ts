// SPDX-License-Identifier: Apache-2.0

import Table from 'cli-table3';

const NO_BORDER = {
  'top': '',
  'top-mid': '',
  'top-left': '',
  'top-right': '',
  'bottom': '',
  'bottom-mid': '',
  'bottom-left': '',
  'bottom-right': '',
  'left': '',
  'left-mid': '',
  'mid': '',
  'mid-mid': '',
  'right': '',
  'right-mid': '',
  'middle': '',
};

/**
 * Lays rows out as plain, column-aligned text. Columns are separated by two spaces and trailing blanks are removed.
 */
export class TableEncoder {
  private readonly rows: string[][] = [];

  public addRow(...cells: Array<string | number | boolean>): TableEncoder {
    this.rows.push(cells.map(cell => String(cell)));
    return this;
  }

  public encodeLines(): string[] {
    const table = new Table({
      chars: NO_BORDER,
      style: {'padding-left': 0, 'padding-right': 2, 'head': [], 'border': [], 'compact': true},
    });
    for (const row of this.rows) {
      table.push(row);
    }

    return table
      .toString()
      .split('\n')
      .map(line => line.trimEnd());
  }
}
