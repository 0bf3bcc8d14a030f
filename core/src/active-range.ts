/**
 * @activetable/core - Active Range
 *
 * The active range is the only mutable table state after load: an ordered
 * set of row numbers and an ordered set of column numbers that Print and
 * Filter walk. Snapshots are frozen {@link RangeToken} values.
 */

import { z } from 'zod';
import { RangeTokenError } from './errors.js';
import type { ColumnNumber, RangeToken, RowNumber } from './types.js';

// =============================================================================
// Tokens
// =============================================================================

/**
 * Frozen token holding copies of `rows` and `columns`, order kept.
 */
export function createRangeToken(rows: Iterable<RowNumber>, columns: Iterable<ColumnNumber>): RangeToken {
  return Object.freeze({
    rows: Object.freeze(Array.from(rows)),
    columns: Object.freeze(Array.from(columns)),
  });
}

/**
 * 1..count, ascending.
 */
export function numberSequence(count: number): number[] {
  return Array.from({ length: Math.max(0, count) }, (_, index) => index + 1);
}

function complementOf(active: readonly number[], count: number): number[] {
  const present = new Set(active);
  return numberSequence(count).filter(n => !present.has(n));
}

/**
 * Rows 1..rowCount and columns 1..columnCount missing from `token`.
 */
export function complementRange(token: RangeToken, rowCount: number, columnCount: number): RangeToken {
  return createRangeToken(
    complementOf(token.rows, rowCount),
    complementOf(token.columns, columnCount)
  );
}

// =============================================================================
// Serialization
// =============================================================================

const TOKEN_SEPARATOR = ':';

const numberListSchema = z
  .string()
  .regex(/^\s*(\d+(\s+\d+)*)?\s*$/, 'expected whitespace-separated integers')
  .transform(text => (text.trim() === '' ? [] : text.trim().split(/\s+/).map(Number)))
  .pipe(z.array(z.number().int().positive()));

/**
 * Serialize a token to text that {@link decodeRangeToken} restores exactly.
 */
export function encodeRangeToken(token: RangeToken): string {
  return `${token.rows.join(' ')}${TOKEN_SEPARATOR}${token.columns.join(' ')}`;
}

/**
 * Restore a token serialized by {@link encodeRangeToken}.
 *
 * @throws RangeTokenError when the text is not a serialized token
 */
export function decodeRangeToken(text: string): RangeToken {
  const parts = text.split(TOKEN_SEPARATOR);
  if (parts.length !== 2) {
    throw new RangeTokenError(`expected exactly one "${TOKEN_SEPARATOR}"`, { text });
  }
  const [rowText = '', columnText = ''] = parts;

  const rows = numberListSchema.safeParse(rowText);
  if (!rows.success) {
    throw new RangeTokenError(`rows: ${rows.error.issues[0]?.message ?? 'invalid'}`, { text });
  }
  const columns = numberListSchema.safeParse(columnText);
  if (!columns.success) {
    throw new RangeTokenError(`columns: ${columns.error.issues[0]?.message ?? 'invalid'}`, { text });
  }
  return createRangeToken(rows.data, columns.data);
}

// =============================================================================
// ActiveRange
// =============================================================================

export class ActiveRange {
  private rows: readonly RowNumber[];
  private columns: readonly ColumnNumber[];

  private constructor(token: RangeToken) {
    this.rows = token.rows;
    this.columns = token.columns;
  }

  /**
   * Every row 1..rowCount and every column 1..columnCount.
   */
  static all(rowCount: number, columnCount: number): ActiveRange {
    return new ActiveRange(createRangeToken(numberSequence(rowCount), numberSequence(columnCount)));
  }

  get activeRows(): readonly RowNumber[] {
    return this.rows;
  }

  get activeColumns(): readonly ColumnNumber[] {
    return this.columns;
  }

  /**
   * True when there are no active rows or no active columns.
   */
  isEmpty(): boolean {
    return this.rows.length === 0 || this.columns.length === 0;
  }

  snapshot(): RangeToken {
    return createRangeToken(this.rows, this.columns);
  }

  /**
   * Replace both sets with the token's contents, verbatim.
   */
  restore(token: RangeToken): void {
    const copy = createRangeToken(token.rows, token.columns);
    this.rows = copy.rows;
    this.columns = copy.columns;
  }

  replaceRows(rows: Iterable<RowNumber>): void {
    this.rows = Object.freeze(Array.from(rows));
  }

  replaceColumns(columns: Iterable<ColumnNumber>): void {
    this.columns = Object.freeze(Array.from(columns));
  }
}
