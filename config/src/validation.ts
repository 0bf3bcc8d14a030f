/**
 * @activetable/config - Configuration Validation
 *
 * Validates configuration values and provides clear error messages.
 *
 * @packageDocumentation
 */

import { LogLevels, isValidSentinel } from '@activetable/core';
import { MAX_RECOMMENDED_SUBSTITUTIONS } from './defaults.js';
import type {
  ActiveTableConfig,
  ValidationResult,
  ValidationError,
  ValidationWarning,
} from './types.js';

/**
 * Validate a complete ActiveTableConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * if (result.warnings.length > 0) {
 *   console.warn('Config warnings:', result.warnings);
 * }
 * ```
 */
export function validateConfig(config: ActiveTableConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateTableConfig(config.table, errors, warnings);
  validateObservabilityConfig(config.observability, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateDelimiter(
  path: string,
  delimiter: string,
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (delimiter === '') {
    errors.push({
      path,
      message: 'Delimiter must not be empty',
      value: delimiter,
      suggestion: 'Use a single character such as "|" or "\\t"',
    });
  } else if (delimiter.length > 1) {
    warnings.push({
      path,
      message: 'Multi-character delimiter',
      value: delimiter,
      recommendation: 'Check that input and downstream tools agree on the delimiter',
    });
  }
}

/**
 * Validate table configuration.
 */
function validateTableConfig(
  table: ActiveTableConfig['table'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  validateDelimiter('table.fieldDelimiter', table.fieldDelimiter, errors, warnings);
  validateDelimiter('table.outputDelimiter', table.outputDelimiter, errors, warnings);

  // Budget must be a non-negative integer
  if (!Number.isInteger(table.maxSubstitutions) || table.maxSubstitutions < 0) {
    errors.push({
      path: 'table.maxSubstitutions',
      message: 'Substitution budget must be a non-negative integer',
      value: table.maxSubstitutions,
    });
  } else if (table.maxSubstitutions > MAX_RECOMMENDED_SUBSTITUTIONS) {
    warnings.push({
      path: 'table.maxSubstitutions',
      message: 'Very large substitution budget',
      value: table.maxSubstitutions,
      recommendation: `Keep the budget at or below ${MAX_RECOMMENDED_SUBSTITUTIONS}`,
    });
  }

  if (!isValidSentinel(table.identifierSentinel)) {
    errors.push({
      path: 'table.identifierSentinel',
      message: 'Sentinel must be empty or one character that is not a letter, digit, whitespace or expression operator',
      value: table.identifierSentinel,
      suggestion: 'Use "_" (the default) or "@"',
    });
  }

  // Printed fill text that contains the delimiter splits into extra fields
  if (
    table.naFill !== undefined &&
    table.outputDelimiter !== '' &&
    table.naFill.includes(table.outputDelimiter)
  ) {
    warnings.push({
      path: 'table.naFill',
      message: 'NA fill text contains the output delimiter',
      value: table.naFill,
      recommendation: 'Choose fill text without the output delimiter',
    });
  }
}

/**
 * Validate observability configuration.
 */
function validateObservabilityConfig(
  observability: ActiveTableConfig['observability'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (!LogLevels.isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: 'Log level must be one of: debug, info, warn, error',
      value: observability.logLevel,
    });
  }

  const validLogFormats: readonly string[] = ['json', 'pretty'];
  if (!validLogFormats.includes(observability.logFormat)) {
    errors.push({
      path: 'observability.logFormat',
      message: `Log format must be one of: ${validLogFormats.join(', ')}`,
      value: observability.logFormat,
    });
  }

  // Debug logging traces every table operation
  if (observability.logLevel === 'debug') {
    warnings.push({
      path: 'observability.logLevel',
      message: 'Debug logging records every load, filter, slice and select',
      value: observability.logLevel,
      recommendation: 'Use "info" or higher outside of troubleshooting',
    });
  }
}
