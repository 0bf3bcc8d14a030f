/**
 * @activetable/config - Configuration for activetable hosts
 *
 * Supports environment-based configuration, validation, and conversion to
 * the option objects of @activetable/core.
 *
 * Key Features:
 * - Deep partial overrides with createConfig()
 * - Environment variable support with getConfigFromEnv()
 * - Validation with clear error messages
 * - Bridges to TableOptions, PrintOptions, RegistryOptions and Logger
 *
 * @example
 * ```typescript
 * import { createConfig, validateConfig, getConfigFromEnv } from '@activetable/config';
 *
 * const config = createConfig({ table: { fieldDelimiter: '\t', naFill: 'NA' } });
 *
 * const envConfig = getConfigFromEnv();
 *
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 *
 * @packageDocumentation
 * @module @activetable/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  // Utility types
  DeepPartial,
  DeepReadonly,

  // Table types
  TableConfig,

  // Observability types
  LogFormat,
  ObservabilityConfig,

  // Main config
  ActiveTableConfig,

  // Validation types
  ValidationError,
  ValidationWarning,
  ValidationResult,

  // Environment types
  EnvConfigOptions,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export { DEFAULT_CONFIG, DEFAULT_DELIMITER, MAX_RECOMMENDED_SUBSTITUTIONS } from './defaults.js';

// =============================================================================
// Config Functions
// =============================================================================

export { createConfig, mergeConfigs, getConfigFromEnv, envVarName } from './config.js';

// =============================================================================
// Validation
// =============================================================================

export { validateConfig } from './validation.js';

// =============================================================================
// Core Bridges
// =============================================================================

export {
  toTableOptions,
  toPrintOptions,
  toRegistryOptions,
  createLabelLookupFromConfig,
  createLoggerFromConfig,
} from './bridge.js';
