/**
 * @activetable/config - Type Definitions
 *
 * Configuration schema for activetable hosts: how input is parsed, how
 * tables print, the substitution budget and logging.
 *
 * @packageDocumentation
 * @module @activetable/config
 */

import type { LogLevel } from '@activetable/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

/**
 * Deep readonly type that makes all nested properties readonly.
 */
export type DeepReadonly<T> = T extends object
  ? { readonly [P in keyof T]: DeepReadonly<T[P]> }
  : T;

// =============================================================================
// Table Configuration
// =============================================================================

/**
 * Table parsing and printing settings.
 *
 * @example
 * ```typescript
 * const tableConfig: TableConfig = {
 *   fieldDelimiter: '\t',
 *   outputDelimiter: ' | ',
 *   naFill: 'NA',
 *   showRowNumber: true,
 *   maxSubstitutions: 100,
 *   identifierSentinel: '_',
 *   labelEnvPrefix: 'i18n_col_',
 * };
 * ```
 */
export interface TableConfig {
  /** Delimiter splitting input lines into fields */
  fieldDelimiter: string;

  /** Delimiter joining printed fields */
  outputDelimiter: string;

  /** Text printed for absent cells (default: none, absent cells print empty) */
  naFill?: string;

  /** Prefix printed lines with their row number */
  showRowNumber: boolean;

  /** Identifier substitutions allowed per filter or select */
  maxSubstitutions: number;

  /** Leading character of column identifiers; '' allows plain names */
  identifierSentinel: string;

  /** Environment variable prefix of column labels */
  labelEnvPrefix: string;
}

// =============================================================================
// Observability Configuration
// =============================================================================

/**
 * Log format options.
 */
export type LogFormat = 'json' | 'pretty';

export interface ObservabilityConfig {
  /** Minimum log level */
  logLevel: LogLevel;

  /** Log output format */
  logFormat: LogFormat;
}

// =============================================================================
// Unified Configuration
// =============================================================================

/**
 * Complete activetable configuration.
 *
 * @example
 * ```typescript
 * const config: ActiveTableConfig = {
 *   table: { fieldDelimiter: '|', outputDelimiter: '|', ... },
 *   observability: { logLevel: 'info', logFormat: 'json' },
 * };
 * ```
 */
export interface ActiveTableConfig {
  /** Table parsing and printing */
  table: TableConfig;

  /** Logging */
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ValidationError {
  /** Path to the invalid field (e.g., 'table.maxSubstitutions') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Validation warning details.
 */
export interface ValidationWarning {
  /** Path to the field with potential issue */
  path: string;

  /** Human-readable warning message */
  message: string;

  /** The concerning value */
  value: unknown;

  /** Recommended action */
  recommendation?: string;
}

/**
 * Configuration validation result.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;

  /** List of validation errors */
  errors: ValidationError[];

  /** List of validation warnings */
  warnings: ValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'ACTIVETABLE') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
