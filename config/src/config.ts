/**
 * @activetable/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and manage configurations.
 *
 * @packageDocumentation
 */

import { ConfigurationError, ErrorCode, LogLevels } from '@activetable/core';
import type {
  ActiveTableConfig,
  DeepPartial,
  EnvConfigOptions,
  LogFormat,
  ObservabilityConfig,
  TableConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

/**
 * Copy `base` with every defined value of `override` applied on top.
 * Undefined values do not override.
 */
function mergeSection<T extends object>(base: T, override: Partial<T> | null | undefined): T {
  const result = { ...base };
  if (!override) {
    return result;
  }

  for (const key of Object.keys(override) as Array<keyof T>) {
    const value = override[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

function freezeConfig(config: ActiveTableConfig): ActiveTableConfig {
  return Object.freeze({
    table: Object.freeze(config.table),
    observability: Object.freeze(config.observability),
  });
}

/**
 * Create a complete ActiveTableConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen ActiveTableConfig with all values filled in
 *
 * @example
 * ```typescript
 * const config1 = createConfig();
 *
 * const config2 = createConfig({
 *   table: { fieldDelimiter: '\t', naFill: 'NA' },
 * });
 *
 * // Build on another config
 * const config3 = createConfig({ observability: { logLevel: 'debug' } }, config2);
 * ```
 */
export function createConfig(
  overrides?: DeepPartial<ActiveTableConfig>,
  base: ActiveTableConfig = DEFAULT_CONFIG
): ActiveTableConfig {
  return freezeConfig({
    table: mergeSection<TableConfig>(base.table, overrides?.table),
    observability: mergeSection<ObservabilityConfig>(base.observability, overrides?.observability),
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const base = { table: { fieldDelimiter: ',' } };
 * const override = { table: { fieldDelimiter: '\t', naFill: '-' } };
 * const merged = mergeConfigs(base, override);
 * // merged.table.fieldDelimiter === '\t'
 * // merged.table.naFill === '-'
 * ```
 */
export function mergeConfigs(
  ...configs: Array<DeepPartial<ActiveTableConfig> | null | undefined>
): DeepPartial<ActiveTableConfig> {
  let result: DeepPartial<ActiveTableConfig> = {};

  for (const config of configs) {
    if (!config) continue;
    result = {
      ...result,
      ...(config.table && {
        table: mergeSection<Partial<TableConfig>>(result.table ?? {}, config.table),
      }),
      ...(config.observability && {
        observability: mergeSection<Partial<ObservabilityConfig>>(result.observability ?? {}, config.observability),
      }),
    };
  }

  return result;
}

/**
 * Parse environment variable value to the appropriate type.
 */
function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function parseLogFormat(value: string | undefined, key: string): LogFormat | undefined {
  if (value === undefined) return undefined;
  if (value === 'json' || value === 'pretty') return value;
  throw new ConfigurationError(
    `Invalid log format ${JSON.stringify(value)} in ${key}`,
    ErrorCode.CONFIGURATION_ERROR,
    { key, value },
    'Use "json" or "pretty"'
  );
}

function parseLogLevel(value: string | undefined, key: string): ObservabilityConfig['logLevel'] | undefined {
  if (value === undefined) return undefined;
  if (LogLevels.isLogLevel(value)) return value;
  throw new ConfigurationError(
    `Invalid log level ${JSON.stringify(value)} in ${key}`,
    ErrorCode.CONFIGURATION_ERROR,
    { key, value },
    'Use one of: debug, info, warn, error'
  );
}

/**
 * Environment variable name for a config field.
 */
export function envVarName(prefix: string, ...parts: string[]): string {
  return [prefix, ...parts].join('_').toUpperCase();
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: ACTIVETABLE_<SECTION>_<FIELD>
 * For example:
 * - ACTIVETABLE_TABLE_FIELD_DELIMITER=,
 * - ACTIVETABLE_TABLE_MAX_SUBSTITUTIONS=500
 * - ACTIVETABLE_OBSERVABILITY_LOG_LEVEL=debug
 *
 * Unparseable numbers are ignored.
 *
 * @throws ConfigurationError on an unknown log level or log format
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'MYAPP', env: { MYAPP_TABLE_NA_FILL: 'NA' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): ActiveTableConfig {
  const prefix = options.prefix ?? 'ACTIVETABLE';
  const env = options.env ?? process.env;
  const read = (...parts: string[]): string | undefined => env[envVarName(prefix, ...parts)];

  const table: Partial<TableConfig> = {
    fieldDelimiter: read('TABLE', 'FIELD', 'DELIMITER'),
    outputDelimiter: read('TABLE', 'OUTPUT', 'DELIMITER'),
    naFill: read('TABLE', 'NA', 'FILL'),
    showRowNumber: parseBoolean(read('TABLE', 'SHOW', 'ROW', 'NUMBER')),
    maxSubstitutions: parseNumber(read('TABLE', 'MAX', 'SUBSTITUTIONS')),
    identifierSentinel: read('TABLE', 'IDENTIFIER', 'SENTINEL'),
    labelEnvPrefix: read('TABLE', 'LABEL', 'ENV', 'PREFIX'),
  };

  const logLevelKey = envVarName(prefix, 'OBSERVABILITY', 'LOG', 'LEVEL');
  const logFormatKey = envVarName(prefix, 'OBSERVABILITY', 'LOG', 'FORMAT');
  const observability: Partial<ObservabilityConfig> = {
    logLevel: parseLogLevel(env[logLevelKey], logLevelKey),
    logFormat: parseLogFormat(env[logFormatKey], logFormatKey),
  };

  return createConfig({ table, observability });
}
