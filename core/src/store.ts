/**
 * @activetable/core - Table Store
 *
 * Column-oriented cell storage: one row-ordered map per column, populated
 * once by {@link TableStore.load} and never mutated afterwards. Every column
 * access re-checks that the stored column number matches the registry.
 */

import { ConfigurationError, CorruptedStateError } from './errors.js';
import type { ColumnRegistry } from './registry.js';
import type { ColumnNumber, RowNumber } from './types.js';

export interface ColumnStorage {
  readonly name: string;
  /** Column number recorded when the storage was created */
  readonly columnNumber: ColumnNumber;
  /** Present cells by row number, in ascending row order */
  readonly cells: ReadonlyMap<RowNumber, string>;
}

/**
 * Split one input line on `delimiter`, keeping every field, trailing empty
 * fields included.
 *
 * @example
 * ```typescript
 * splitFields('a||', '|');  // ['a', '', '']
 * splitFields('||x', '|');  // ['', '', 'x']
 * ```
 */
export function splitFields(line: string, delimiter: string): string[] {
  if (delimiter === '') {
    throw ConfigurationError.invalidDelimiter('field', delimiter);
  }
  return line.split(delimiter);
}

export class TableStore {
  /**
   * Storage must hold one entry per registry column, in registry order;
   * use {@link TableStore.load} instead of calling this directly.
   */
  constructor(
    public readonly registry: ColumnRegistry,
    private readonly columns: readonly ColumnStorage[],
    /** Number of loaded rows; row numbers are 1..rowCount */
    public readonly rowCount: number
  ) {}

  /**
   * Assign row numbers from 1 in input order and store each line's fields
   * under the registry's columns. Empty and missing fields are absent cells;
   * fields beyond the last column are ignored.
   */
  static load(registry: ColumnRegistry, lines: Iterable<string>, fieldDelimiter: string): TableStore {
    if (fieldDelimiter === '') {
      throw ConfigurationError.invalidDelimiter('field', fieldDelimiter);
    }

    const entries = registry.entries();
    const cells = entries.map(() => new Map<RowNumber, string>());
    let row = 0;

    for (const rawLine of lines) {
      row++;
      const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
      const fields = splitFields(line, fieldDelimiter);
      for (let c = 0; c < entries.length; c++) {
        const field = fields[c];
        if (field !== undefined && field !== '') {
          cells[c]?.set(row, field);
        }
      }
    }

    const columns = entries.map((entry, index): ColumnStorage => ({
      name: entry.name,
      columnNumber: entry.number,
      cells: cells[index] ?? new Map<RowNumber, string>(),
    }));

    return new TableStore(registry, columns, row);
  }

  get columnCount(): number {
    return this.registry.size;
  }

  /**
   * Storage of a registered column.
   *
   * @throws CorruptedStateError when the column is not registered, or when its
   *         storage disagrees with the registry
   */
  column(columnNumber: ColumnNumber): ColumnStorage {
    const entry = this.registry.entry(columnNumber);
    if (entry === undefined) {
      throw CorruptedStateError.columnOutOfRange(columnNumber, this.registry.size);
    }
    const storage = this.columns[columnNumber - 1];
    if (storage === undefined || storage.name !== entry.name) {
      throw CorruptedStateError.columnNumberMismatch(entry.name, entry.number, storage?.columnNumber ?? 0);
    }
    if (storage.columnNumber !== entry.number) {
      throw CorruptedStateError.columnNumberMismatch(entry.name, entry.number, storage.columnNumber);
    }
    return storage;
  }

  /**
   * Text of a cell, or undefined when absent.
   */
  cell(row: RowNumber, columnNumber: ColumnNumber): string | undefined {
    return this.column(columnNumber).cells.get(row);
  }

  hasRow(row: RowNumber): boolean {
    return Number.isInteger(row) && row >= 1 && row <= this.rowCount;
  }
}
