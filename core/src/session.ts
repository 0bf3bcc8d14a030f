/**
 * @activetable/core - Table Session
 *
 * One registry and at most one loaded table, for callers that drive the
 * engine as a single stateful component. Operations before a registry is
 * built, or before a table is loaded, fail with CorruptedStateError.
 *
 * @example
 * ```typescript
 * const session = new TableSession({ logger });
 * session.buildRegistry(() => '_NAME\n_JOB\n');
 * session.load(['Ann|dev', 'Bob|ops'], '|');
 * session.filter('_JOB == d*');
 * session.print('|'); // ['Ann|dev']
 * ```
 */

import { CorruptedStateError } from './errors.js';
import { readLines, type LineSource } from './io.js';
import { createNoopLogger, type Logger } from './logging.js';
import type { RangeList } from './range-list.js';
import {
  buildRegistry,
  type ColumnNameGenerator,
  type ColumnRegistry,
  type LabelLookup,
  type RegistryOptions,
} from './registry.js';
import { Table } from './table.js';
import type { PrintOptions, RangeToken, RowPredicate } from './types.js';

export interface TableSessionOptions {
  /** Logger handed to every loaded table (default: no-op) */
  logger?: Logger;
  /** Default budget for filter/select (default: 100) */
  maxSubstitutions?: number;
}

export class TableSession {
  private readonly logger: Logger;
  private readonly maxSubstitutions?: number;
  private currentRegistry?: ColumnRegistry;
  private currentTable?: Table;

  constructor(options: TableSessionOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
    this.maxSubstitutions = options.maxSubstitutions;
  }

  /**
   * Build the column registry. A previously loaded table is discarded.
   */
  buildRegistry(
    generator: ColumnNameGenerator | undefined,
    labelLookup?: LabelLookup,
    options?: RegistryOptions
  ): ColumnRegistry {
    const registry = buildRegistry(generator, labelLookup, options);
    this.currentRegistry = registry;
    this.currentTable = undefined;
    this.logger.debug('column registry built', { operation: 'buildRegistry', activeColumns: registry.size });
    return registry;
  }

  get registry(): ColumnRegistry {
    if (this.currentRegistry === undefined) {
      throw CorruptedStateError.registryNotBuilt('access the registry');
    }
    return this.currentRegistry;
  }

  get table(): Table {
    if (this.currentTable === undefined) {
      throw CorruptedStateError.notLoaded('access the table');
    }
    return this.currentTable;
  }

  get isLoaded(): boolean {
    return this.currentTable !== undefined;
  }

  /**
   * Load `lines`, replacing any loaded table.
   */
  load(lines: Iterable<string>, fieldDelimiter: string): Table {
    if (this.currentRegistry === undefined) {
      throw CorruptedStateError.registryNotBuilt('load');
    }
    const table = Table.load(this.currentRegistry, lines, {
      fieldDelimiter,
      logger: this.logger,
      maxSubstitutions: this.maxSubstitutions,
    });
    this.currentTable = table;
    return table;
  }

  /**
   * Read every line of `input`, then {@link TableSession.load} them.
   */
  async loadFrom(input: LineSource, fieldDelimiter: string): Promise<Table> {
    if (this.currentRegistry === undefined) {
      throw CorruptedStateError.registryNotBuilt('load');
    }
    return this.load(await readLines(input), fieldDelimiter);
  }

  private loaded(operation: string): Table {
    if (this.currentRegistry === undefined) {
      throw CorruptedStateError.registryNotBuilt(operation);
    }
    if (this.currentTable === undefined) {
      throw CorruptedStateError.notLoaded(operation);
    }
    return this.currentTable;
  }

  getActiveRange(): RangeToken {
    return this.loaded('get the active range').getActiveRange();
  }

  setActiveRange(token: RangeToken): void {
    this.loaded('set the active range').setActiveRange(token);
  }

  getInactiveRange(): RangeToken {
    return this.loaded('get the inactive range').getInactiveRange();
  }

  filter(expression: string | RowPredicate, maxSubstitutions?: number): void {
    this.loaded('filter').filter(expression, maxSubstitutions);
  }

  slice(list: RangeList): void {
    this.loaded('slice').slice(list);
  }

  select(list: RangeList, maxSubstitutions?: number): void {
    this.loaded('select').select(list, maxSubstitutions);
  }

  print(outputDelimiter: string, options?: PrintOptions): string[] {
    return this.loaded('print').print(outputDelimiter, options);
  }
}
