/**
 * @activetable/core - Shared types
 *
 * Row and column numbers are positive integers assigned once (rows by input
 * order at load time, columns by generator order at registry build time) and
 * never reassigned.
 */

import type { Logger } from './logging.js';

// =============================================================================
// Numbering
// =============================================================================

/** Immutable 1-based row number */
export type RowNumber = number;

/** Immutable 1-based column number */
export type ColumnNumber = number;

/** A column addressed by number or by identifier */
export type ColumnRef = ColumnNumber | string;

// =============================================================================
// Active Range
// =============================================================================

/**
 * Snapshot of an active (or inactive) range.
 *
 * Exchange it only through `getActiveRange()`, `setActiveRange()` and
 * `getInactiveRange()`; use `encodeRangeToken()` to persist it.
 */
export interface RangeToken {
  readonly rows: readonly RowNumber[];
  readonly columns: readonly ColumnNumber[];
}

// =============================================================================
// Filtering
// =============================================================================

/**
 * Current-row values seen by a filter: one entry per active column, keyed by
 * column number. Absent cells are empty strings.
 */
export type RowValues = ReadonlyMap<ColumnNumber, string>;

/**
 * Read access to the current row for callback predicates.
 */
export interface RowView {
  /** Row number being evaluated */
  readonly rowNumber: RowNumber;
  /** Value of an active column, or '' for absent cells and inactive columns */
  get(column: ColumnRef): string;
}

/**
 * Callback alternative to a textual filter expression.
 */
export type RowPredicate = (row: RowView) => boolean;

// =============================================================================
// Options
// =============================================================================

/** Default identifier substitution budget for filter and select */
export const DEFAULT_MAX_SUBSTITUTIONS = 100;

/** Default leading character of column identifiers */
export const DEFAULT_IDENTIFIER_SENTINEL = '_';

/** Default environment prefix of column label variables */
export const DEFAULT_LABEL_ENV_PREFIX = 'i18n_col_';

export interface TableOptions {
  /** Delimiter used to split input lines into fields */
  fieldDelimiter: string;
  /** Logger for operation traces (default: no-op) */
  logger?: Logger;
  /** Default budget for filter/select when the call gives none (default: 100) */
  maxSubstitutions?: number;
}

export interface PrintOptions {
  /** Text emitted in place of absent cells */
  naFill?: string;
  /** Prefix each line with its row number and the delimiter */
  showRowNumber?: boolean;
}
