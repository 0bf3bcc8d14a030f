/**
 * Typed exception classes for activetable
 *
 * Error hierarchy:
 * - TableError: Base error class for all table errors
 *   - ConfigurationError: Missing or malformed collaborators (name generator,
 *     identifiers, delimiters, sentinel)
 *   - CorruptedStateError: No registry, no loaded table, or a registry/store
 *     mismatch detected before a column access
 *   - SubstitutionLimitExceeded: Identifier rewrites exceeded their budget
 *   - ExpressionError: Filter expression or range list could not be understood
 *   - RangeTokenError: Serialized range token could not be decoded
 *
 * @example
 * ```typescript
 * import { SubstitutionLimitExceeded, CorruptedStateError } from '@activetable/core';
 *
 * try {
 *   table.filter(expression, 10);
 * } catch (error) {
 *   if (error instanceof SubstitutionLimitExceeded) {
 *     table.filter(expression, error.required);
 *   } else if (error instanceof CorruptedStateError) {
 *     logger.error('Table state is inconsistent', error, error.toLogContext());
 *     throw error;
 *   }
 * }
 * ```
 */

import { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',

  // Configuration errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  MISSING_NAME_GENERATOR = 'MISSING_NAME_GENERATOR',
  NAME_GENERATOR_FAILED = 'NAME_GENERATOR_FAILED',
  EMPTY_COLUMN_SET = 'EMPTY_COLUMN_SET',
  DUPLICATE_COLUMN = 'DUPLICATE_COLUMN',
  MALFORMED_IDENTIFIER = 'MALFORMED_IDENTIFIER',
  INVALID_SENTINEL = 'INVALID_SENTINEL',
  INVALID_DELIMITER = 'INVALID_DELIMITER',

  // Corrupted state errors
  CORRUPTED_STATE = 'CORRUPTED_STATE',
  REGISTRY_NOT_BUILT = 'REGISTRY_NOT_BUILT',
  TABLE_NOT_LOADED = 'TABLE_NOT_LOADED',
  COLUMN_NUMBER_MISMATCH = 'COLUMN_NUMBER_MISMATCH',
  COLUMN_OUT_OF_RANGE = 'COLUMN_OUT_OF_RANGE',

  // Substitution budget
  SUBSTITUTION_LIMIT_EXCEEDED = 'SUBSTITUTION_LIMIT_EXCEEDED',

  // Expression and list errors
  EXPRESSION_ERROR = 'EXPRESSION_ERROR',
  EXPRESSION_SYNTAX_ERROR = 'EXPRESSION_SYNTAX_ERROR',
  UNKNOWN_COLUMN = 'UNKNOWN_COLUMN',
  INVALID_LIST_TOKEN = 'INVALID_LIST_TOKEN',

  // Range token errors
  INVALID_RANGE_TOKEN = 'INVALID_RANGE_TOKEN',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  const codes: readonly string[] = Object.values(ErrorCode);
  return codes.includes(code);
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all activetable errors.
 *
 * Carries a `code` for programmatic handling, optional structured `details`,
 * an optional `suggestion` and the creation timestamp.
 */
export class TableError extends Error {
  /** Error code for programmatic identification (see {@link ErrorCode}) */
  public readonly code: string;

  /** Structured details for debugging (operation, column, token, ...) */
  public readonly details?: Record<string, unknown>;

  /** Hint for resolving the error, when one applies */
  public readonly suggestion?: string;

  /** Creation time, milliseconds since epoch */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'TableError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, TableError);
  }

  /**
   * Structured form of the error, suitable for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Multi-line description: code and message, then details and suggestion.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when an external collaborator or setting is missing or malformed.
 *
 * @example
 * ```typescript
 * throw ConfigurationError.duplicateIdentifier('_A', 3);
 * ```
 */
export class ConfigurationError extends TableError {
  constructor(
    message: string,
    code: string = ErrorCode.CONFIGURATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ConfigurationError';
    captureStackTrace(this, ConfigurationError);
  }

  static missingGenerator(): ConfigurationError {
    return new ConfigurationError(
      'Column name generator is missing',
      ErrorCode.MISSING_NAME_GENERATOR,
      { operation: 'buildRegistry' },
      'Pass a function that returns the column identifiers, one per line or as an iterable'
    );
  }

  static generatorFailed(cause: unknown): ConfigurationError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ConfigurationError(
      `Column name generator failed: ${reason}`,
      ErrorCode.NAME_GENERATOR_FAILED,
      { operation: 'buildRegistry', reason }
    );
  }

  static emptyColumnSet(): ConfigurationError {
    return new ConfigurationError(
      'Column name generator produced no identifiers',
      ErrorCode.EMPTY_COLUMN_SET,
      { operation: 'buildRegistry' }
    );
  }

  static duplicateIdentifier(name: string, position: number): ConfigurationError {
    return new ConfigurationError(
      `Duplicate column identifier "${name}" at position ${position}`,
      ErrorCode.DUPLICATE_COLUMN,
      { operation: 'buildRegistry', name, position }
    );
  }

  static malformedIdentifier(name: string, sentinel: string, position: number): ConfigurationError {
    const shape = sentinel === ''
      ? 'a letter or underscore followed by letters, digits or underscores'
      : `"${sentinel}" followed by letters, digits or underscores`;
    return new ConfigurationError(
      `Malformed column identifier "${name}" at position ${position}`,
      ErrorCode.MALFORMED_IDENTIFIER,
      { operation: 'buildRegistry', name, sentinel, position },
      `Column identifiers must be ${shape}`
    );
  }

  static invalidSentinel(sentinel: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid identifier sentinel "${sentinel}"`,
      ErrorCode.INVALID_SENTINEL,
      { sentinel },
      'Use an empty sentinel or a single punctuation character such as "_" or "@"'
    );
  }

  static invalidDelimiter(operation: string, delimiter: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid ${operation} delimiter ${JSON.stringify(delimiter)}`,
      ErrorCode.INVALID_DELIMITER,
      { operation, delimiter },
      'Delimiters must be non-empty'
    );
  }
}

// =============================================================================
// Corrupted State Errors
// =============================================================================

/**
 * Error thrown when table state is missing or internally inconsistent.
 *
 * Always a call-sequencing or programming error; never worth retrying.
 */
export class CorruptedStateError extends TableError {
  constructor(
    message: string,
    code: string = ErrorCode.CORRUPTED_STATE,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'CorruptedStateError';
    captureStackTrace(this, CorruptedStateError);
  }

  static registryNotBuilt(operation: string): CorruptedStateError {
    return new CorruptedStateError(
      `Cannot ${operation}: column registry has not been built`,
      ErrorCode.REGISTRY_NOT_BUILT,
      { operation },
      'Call buildRegistry() before loading a table'
    );
  }

  static notLoaded(operation: string): CorruptedStateError {
    return new CorruptedStateError(
      `Cannot ${operation}: no table is loaded`,
      ErrorCode.TABLE_NOT_LOADED,
      { operation },
      'Call load() before querying or reshaping the table'
    );
  }

  static columnOutOfRange(column: number, columnCount: number): CorruptedStateError {
    return new CorruptedStateError(
      `Column number ${column} is not registered (registry has ${columnCount} columns)`,
      ErrorCode.COLUMN_OUT_OF_RANGE,
      { column, columnCount },
      'Only restore range tokens obtained from this table'
    );
  }

  static columnNumberMismatch(name: string, expected: number, actual: number): CorruptedStateError {
    return new CorruptedStateError(
      `Column "${name}" is stored as number ${actual} but registered as ${expected}`,
      ErrorCode.COLUMN_NUMBER_MISMATCH,
      { name, expected, actual }
    );
  }
}

// =============================================================================
// Substitution Budget
// =============================================================================

/**
 * Error thrown when an expression or column list needs more identifier
 * substitutions than allowed. The active range is left unchanged.
 */
export class SubstitutionLimitExceeded extends TableError {
  /** Budget in force when the error was raised */
  public readonly limit: number;

  /** Substitutions the input needed */
  public readonly required: number;

  constructor(operation: string, limit: number, required: number) {
    super(
      `${operation} needs ${required} identifier substitutions, limit is ${limit}`,
      ErrorCode.SUBSTITUTION_LIMIT_EXCEEDED,
      { operation, limit, required },
      `Raise maxSubstitutions to at least ${required} or simplify the input`
    );
    this.name = 'SubstitutionLimitExceeded';
    this.limit = limit;
    this.required = required;
    captureStackTrace(this, SubstitutionLimitExceeded);
  }
}

// =============================================================================
// Expression Errors
// =============================================================================

/**
 * Error thrown when a filter expression or a row/column list is malformed.
 */
export class ExpressionError extends TableError {
  constructor(
    message: string,
    code: string = ErrorCode.EXPRESSION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ExpressionError';
    captureStackTrace(this, ExpressionError);
  }

  static syntaxError(message: string, context: { expression: string; position: number }): ExpressionError {
    return new ExpressionError(
      `Expression syntax error: ${message}`,
      ErrorCode.EXPRESSION_SYNTAX_ERROR,
      { operation: 'parse', ...context }
    );
  }

  static unknownColumn(name: string, operation: string): ExpressionError {
    return new ExpressionError(
      `Unknown column identifier "${name}"`,
      ErrorCode.UNKNOWN_COLUMN,
      { operation, name },
      'Use an identifier produced by the column name generator, or a column number'
    );
  }

  static invalidListToken(token: string, operation: string): ExpressionError {
    return new ExpressionError(
      `Invalid ${operation} list element "${token}"`,
      ErrorCode.INVALID_LIST_TOKEN,
      { operation, token },
      'List elements are signed integers, "*" or "-*"'
    );
  }
}

// =============================================================================
// Range Token Errors
// =============================================================================

/**
 * Error thrown when a serialized range token cannot be decoded.
 */
export class RangeTokenError extends TableError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(
      `Invalid range token: ${message}`,
      ErrorCode.INVALID_RANGE_TOKEN,
      details,
      'Only decode text produced by encodeRangeToken()'
    );
    this.name = 'RangeTokenError';
    captureStackTrace(this, RangeTokenError);
  }
}
