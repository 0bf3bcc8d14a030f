/**
 * @activetable/config - Default Configuration Values
 *
 * Values are sourced from @activetable/core constants where applicable.
 *
 * @packageDocumentation
 */

import {
  DEFAULT_IDENTIFIER_SENTINEL,
  DEFAULT_LABEL_ENV_PREFIX,
  DEFAULT_MAX_SUBSTITUTIONS,
} from '@activetable/core';

import type { ActiveTableConfig, ObservabilityConfig, TableConfig } from './types.js';

/** Field and output delimiter used when none is configured */
export const DEFAULT_DELIMITER = '|';

/** Budgets above this are accepted with a warning */
export const MAX_RECOMMENDED_SUBSTITUTIONS = 10_000;

const DEFAULT_TABLE_CONFIG: TableConfig = {
  fieldDelimiter: DEFAULT_DELIMITER,
  outputDelimiter: DEFAULT_DELIMITER,
  showRowNumber: false,
  maxSubstitutions: DEFAULT_MAX_SUBSTITUTIONS,
  identifierSentinel: DEFAULT_IDENTIFIER_SENTINEL,
  labelEnvPrefix: DEFAULT_LABEL_ENV_PREFIX,
};

const DEFAULT_OBSERVABILITY_CONFIG: ObservabilityConfig = {
  logLevel: 'info',
  logFormat: 'json',
};

/**
 * Default configuration.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@activetable/config';
 *
 * console.log(DEFAULT_CONFIG.table.maxSubstitutions); // 100
 *
 * const config = createConfig({ table: { naFill: 'NA' } });
 * ```
 */
export const DEFAULT_CONFIG: ActiveTableConfig = {
  table: DEFAULT_TABLE_CONFIG,
  observability: DEFAULT_OBSERVABILITY_CONFIG,
};
