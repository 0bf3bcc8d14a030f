// @activetable/core
// In-memory text tables with a narrowable active range of rows and columns

// =============================================================================
// Table / Session
// =============================================================================

export { Table, type TableRuntimeOptions } from './table.js';
export { TableSession, type TableSessionOptions } from './session.js';

// =============================================================================
// Core Types
// =============================================================================

export {
  DEFAULT_MAX_SUBSTITUTIONS,
  DEFAULT_IDENTIFIER_SENTINEL,
  DEFAULT_LABEL_ENV_PREFIX,
  type RowNumber,
  type ColumnNumber,
  type ColumnRef,
  type RangeToken,
  type RowValues,
  type RowView,
  type RowPredicate,
  type TableOptions,
  type PrintOptions,
} from './types.js';

// =============================================================================
// Column Registry
// =============================================================================

export {
  ColumnRegistry,
  buildRegistry,
  createEnvLabelLookup,
  type ColumnNameGenerator,
  type LabelLookup,
  type RegistryOptions,
  type ColumnEntry,
} from './registry.js';

export {
  RESERVED_SENTINEL_CHARACTERS,
  isValidSentinel,
  assertValidSentinel,
  isColumnIdentifier,
  stripLabelNamespace,
} from './identifiers.js';

// =============================================================================
// Storage / Active Range
// =============================================================================

export { TableStore, splitFields, type ColumnStorage } from './store.js';

export {
  ActiveRange,
  createRangeToken,
  numberSequence,
  complementRange,
  encodeRangeToken,
  decodeRangeToken,
} from './active-range.js';

export {
  listTokens,
  parseRangeList,
  applyRangeList,
  substituteColumnIdentifiers,
  assertSubstitutionBudget,
  type RangeList,
  type RangeListStep,
} from './range-list.js';

// =============================================================================
// Filter Expressions
// =============================================================================

export {
  compileFilterExpression,
  globToRegexSource,
  tokenize,
  parseExpression,
  type CompiledFilter,
  type CompiledPredicate,
  type ExpressionNode,
  type Operand,
  type Token,
} from './expression/index.js';

// =============================================================================
// Stream I/O
// =============================================================================

export { readLines, loadTableFromStream, writeLines, printTo, type LineSource } from './io.js';

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  isErrorCode,
  TableError,
  ConfigurationError,
  CorruptedStateError,
  SubstitutionLimitExceeded,
  ExpressionError,
  RangeTokenError,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  withContext,
  formatLogEntry,
  toLogContext,
  isLogContextValue,
  type LogLevel,
  type LogContext,
  type LogContextValue,
  type LogEntry,
  type Logger,
  type LoggerConfig,
  type ConsoleLoggerConfig,
  type TestLogger,
} from './logging.js';
