/**
 * @activetable/config - Core Bridges
 *
 * Turns a resolved configuration into the option objects that
 * @activetable/core functions take.
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const logger = createLoggerFromConfig(config);
 * const registry = buildRegistry(generator, createLabelLookupFromConfig(config), toRegistryOptions(config));
 * const table = Table.load(registry, lines, toTableOptions(config, logger));
 * table.print(config.table.outputDelimiter, toPrintOptions(config));
 * ```
 *
 * @packageDocumentation
 */

import {
  createConsoleLogger,
  createEnvLabelLookup,
  type Logger,
  type PrintOptions,
  type RegistryOptions,
  type TableOptions,
} from '@activetable/core';
import type { ActiveTableConfig } from './types.js';

export function toTableOptions(config: ActiveTableConfig, logger?: Logger): TableOptions {
  return {
    fieldDelimiter: config.table.fieldDelimiter,
    maxSubstitutions: config.table.maxSubstitutions,
    ...(logger && { logger }),
  };
}

export function toPrintOptions(config: ActiveTableConfig): PrintOptions {
  return {
    showRowNumber: config.table.showRowNumber,
    ...(config.table.naFill !== undefined && { naFill: config.table.naFill }),
  };
}

export function toRegistryOptions(config: ActiveTableConfig): RegistryOptions {
  return { sentinel: config.table.identifierSentinel };
}

/**
 * Label lookup over `<labelEnvPrefix><identifier>` variables of `env`.
 */
export function createLabelLookupFromConfig(
  config: ActiveTableConfig,
  env: Readonly<Record<string, string | undefined>> = process.env
): (name: string) => string | undefined {
  return createEnvLabelLookup(env, config.table.labelEnvPrefix);
}

/**
 * Console logger (stderr) at the configured level and format.
 */
export function createLoggerFromConfig(config: ActiveTableConfig): Logger {
  return createConsoleLogger({
    minLevel: config.observability.logLevel,
    format: config.observability.logFormat,
  });
}
