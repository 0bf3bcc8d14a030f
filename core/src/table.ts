/**
 * @activetable/core - Table
 *
 * A loaded table: immutable cell storage plus the mutable active range that
 * Filter, Slice and Select narrow and Print projects.
 *
 * @example
 * ```typescript
 * import { buildRegistry, Table } from '@activetable/core';
 *
 * const registry = buildRegistry(() => ['_A', '_B']);
 * const table = Table.load(registry, ['1|x', '2|', '|y'], { fieldDelimiter: '|' });
 *
 * table.print('|', { naFill: 'NA' }); // ['1|x', '2|NA', 'NA|y']
 * table.slice('-2');
 * table.select('-_A');
 * table.print('|');                   // ['x', 'y']
 * ```
 */

import { ActiveRange, complementRange } from './active-range.js';
import { ConfigurationError, ExpressionError, SubstitutionLimitExceeded } from './errors.js';
import { compileFilterExpression } from './expression/index.js';
import { createNoopLogger, toLogContext, type Logger } from './logging.js';
import {
  applyRangeList,
  assertSubstitutionBudget,
  listTokens,
  parseRangeList,
  substituteColumnIdentifiers,
  type RangeList,
} from './range-list.js';
import type { ColumnRegistry } from './registry.js';
import { TableStore } from './store.js';
import {
  DEFAULT_MAX_SUBSTITUTIONS,
  type ColumnRef,
  type PrintOptions,
  type RangeToken,
  type RowNumber,
  type RowPredicate,
  type RowValues,
  type RowView,
  type TableOptions,
} from './types.js';

/** Table options that do not concern parsing input lines */
export type TableRuntimeOptions = Omit<TableOptions, 'fieldDelimiter'>;

export class Table {
  private readonly range: ActiveRange;
  private readonly logger: Logger;
  private readonly maxSubstitutions: number;

  private constructor(
    private readonly store: TableStore,
    options: TableRuntimeOptions
  ) {
    this.logger = options.logger ?? createNoopLogger();
    this.maxSubstitutions = options.maxSubstitutions ?? DEFAULT_MAX_SUBSTITUTIONS;
    assertSubstitutionBudget(this.maxSubstitutions);
    this.range = ActiveRange.all(store.rowCount, store.columnCount);
  }

  /**
   * Load `lines` under `registry`. Every row and every column starts active.
   *
   * @throws ConfigurationError on an empty field delimiter or invalid budget
   */
  static load(registry: ColumnRegistry, lines: Iterable<string>, options: TableOptions): Table {
    const started = performance.now();
    const table = new Table(TableStore.load(registry, lines, options.fieldDelimiter), options);
    table.logger.debug('table loaded', {
      operation: 'load',
      rowsProcessed: table.rowCount,
      activeRows: table.rowCount,
      activeColumns: table.columnCount,
      durationMs: performance.now() - started,
    });
    return table;
  }

  /**
   * Wrap an existing store, all rows and columns active.
   */
  static fromStore(store: TableStore, options: TableRuntimeOptions = {}): Table {
    return new Table(store, options);
  }

  get registry(): ColumnRegistry {
    return this.store.registry;
  }

  get rowCount(): number {
    return this.store.rowCount;
  }

  get columnCount(): number {
    return this.store.columnCount;
  }

  // ===========================================================================
  // Active range
  // ===========================================================================

  getActiveRange(): RangeToken {
    return this.range.snapshot();
  }

  /**
   * Replace the active range with a token's sets, verbatim and unvalidated.
   * A row outside the table reads as all absent cells; a column outside the
   * registry makes the next Filter or Print throw a CorruptedStateError.
   */
  setActiveRange(token: RangeToken): void {
    this.range.restore(token);
  }

  /**
   * Rows and columns of the table that are not active, ascending.
   */
  getInactiveRange(): RangeToken {
    return complementRange(this.range.snapshot(), this.rowCount, this.columnCount);
  }

  // ===========================================================================
  // Filter
  // ===========================================================================

  /**
   * Keep the active rows for which `expression` holds. Columns are unchanged.
   *
   * A string expression is compiled first; a {@link RowPredicate} is called
   * once per active row, in ascending order. Nothing changes when the range is
   * empty or when any step fails.
   *
   * @throws SubstitutionLimitExceeded when the expression names more column
   *         identifiers than `maxSubstitutions`
   * @throws ExpressionError on unknown identifiers and syntax errors
   */
  filter(expression: string | RowPredicate, maxSubstitutions: number = this.maxSubstitutions): void {
    if (this.range.isEmpty()) return;
    const started = performance.now();

    const test = typeof expression === 'string'
      ? this.compile(expression, maxSubstitutions)
      : this.adaptPredicate(expression);

    const columns = this.range.activeColumns.map(column => ({ column, cells: this.store.column(column).cells }));
    const rows = this.range.activeRows;
    const kept = [...rows]
      .sort((a, b) => a - b)
      .filter(row => test(row, new Map(columns.map(({ column, cells }) => [column, cells.get(row) ?? '']))));

    this.range.replaceRows(kept);
    this.logger.debug('filter applied', {
      operation: 'filter',
      rowsProcessed: rows.length,
      activeRows: kept.length,
      activeColumns: this.range.activeColumns.length,
      durationMs: performance.now() - started,
    });
  }

  private compile(expression: string, maxSubstitutions: number): (row: RowNumber, values: RowValues) => boolean {
    try {
      const { predicate } = compileFilterExpression(expression, this.registry, maxSubstitutions);
      return (_row, values) => predicate(values);
    } catch (error) {
      this.warnOnLimit(error);
      throw error;
    }
  }

  private adaptPredicate(predicate: RowPredicate): (row: RowNumber, values: RowValues) => boolean {
    const registry = this.registry;
    return (rowNumber, values) => {
      const view: RowView = {
        rowNumber,
        get(ref: ColumnRef): string {
          const column = registry.resolve(ref);
          if (column === undefined) {
            if (typeof ref === 'string') throw ExpressionError.unknownColumn(ref, 'filter');
            return '';
          }
          return values.get(column) ?? '';
        },
      };
      return predicate(view);
    };
  }

  // ===========================================================================
  // Slice / Select
  // ===========================================================================

  /**
   * Apply a row list (`*`, `-*`, `n`, `-n`) to the active rows, left to right.
   *
   * @throws ExpressionError on an invalid list element; nothing changes
   */
  slice(list: RangeList): void {
    if (this.range.isEmpty()) return;
    const started = performance.now();

    const steps = parseRangeList(listTokens(list), 'slice');
    const rows = applyRangeList(this.range.activeRows, steps, this.rowCount);

    this.range.replaceRows(rows);
    this.logger.debug('slice applied', {
      operation: 'slice',
      activeRows: rows.length,
      activeColumns: this.range.activeColumns.length,
      durationMs: performance.now() - started,
    });
  }

  /**
   * Apply a column list to the active columns, left to right. Elements may
   * be column identifiers, optionally signed (`_B`, `-_B`).
   *
   * @throws SubstitutionLimitExceeded when the list names more identifiers
   *         than `maxSubstitutions`
   * @throws ExpressionError on unknown identifiers or invalid elements
   */
  select(list: RangeList, maxSubstitutions: number = this.maxSubstitutions): void {
    if (this.range.isEmpty()) return;
    const started = performance.now();

    let tokens: string[];
    try {
      tokens = substituteColumnIdentifiers(listTokens(list), this.registry, maxSubstitutions);
    } catch (error) {
      this.warnOnLimit(error);
      throw error;
    }
    const steps = parseRangeList(tokens, 'select');
    const columns = applyRangeList(this.range.activeColumns, steps, this.columnCount);

    this.range.replaceColumns(columns);
    this.logger.debug('select applied', {
      operation: 'select',
      activeRows: this.range.activeRows.length,
      activeColumns: columns.length,
      durationMs: performance.now() - started,
    });
  }

  private warnOnLimit(error: unknown): void {
    if (error instanceof SubstitutionLimitExceeded) {
      this.logger.warn(error.message, {
        ...toLogContext(error.toLogContext()),
        errorCode: error.code,
      });
    }
  }

  // ===========================================================================
  // Print
  // ===========================================================================

  /**
   * One line per active row: the active columns' cells joined with
   * `outputDelimiter`, absent cells replaced by `naFill` when given.
   *
   * @throws ConfigurationError on an empty delimiter
   * @throws CorruptedStateError when an active column is not registered or
   *         its storage disagrees with the registry
   */
  print(outputDelimiter: string, options: PrintOptions = {}): string[] {
    if (outputDelimiter === '') {
      throw ConfigurationError.invalidDelimiter('output', outputDelimiter);
    }
    if (this.range.isEmpty()) return [];

    const fill = options.naFill ?? '';
    const columns = this.range.activeColumns.map(column => this.store.column(column).cells);

    return this.range.activeRows.map(row => {
      const fields = columns.map(cells => cells.get(row) ?? fill);
      const line = fields.join(outputDelimiter);
      return options.showRowNumber ? `${row}${outputDelimiter}${line}` : line;
    });
  }

  // ===========================================================================
  // Cell access
  // ===========================================================================

  /**
   * Text of a cell regardless of the active range; undefined when absent.
   */
  getCell(row: RowNumber, column: ColumnRef): string | undefined {
    const columnNumber = this.registry.resolve(column);
    if (columnNumber === undefined || !this.store.hasRow(row)) return undefined;
    return this.store.cell(row, columnNumber);
  }

  /**
   * Every row's cell of one column, in row order.
   */
  getColumnValues(column: ColumnRef): (string | undefined)[] {
    const columnNumber = this.registry.resolve(column);
    if (columnNumber === undefined) return [];
    const cells = this.store.column(columnNumber).cells;
    return Array.from({ length: this.rowCount }, (_, index) => cells.get(index + 1));
  }

  /**
   * Every column's cell of one row, in column order.
   */
  getRowValues(row: RowNumber): (string | undefined)[] {
    if (!this.store.hasRow(row)) return [];
    return this.registry.entries().map(entry => this.store.cell(row, entry.number));
  }
}
