/**
 * Structured logging for activetable
 *
 * Loggers are plain objects injected into `Table` and `TableSession`; the
 * default is a no-op logger so library use stays silent.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext, Table } from '@activetable/core';
 *
 * const logger = withContext(createConsoleLogger({ format: 'pretty' }), { table: 'jobs' });
 * const table = Table.load(registry, lines, { fieldDelimiter: '|', logger });
 * table.filter('-n _J || _D == ddd');
 * // [2025-01-01T00:00:00.000Z] DEBUG filter applied {"table":"jobs","operation":"filter",...}
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * JSON-compatible values allowed in a log context.
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context attached to log entries.
 */
export interface LogContext {
  /** Table name supplied by the caller */
  table?: string;
  /** Operation being performed (load, filter, slice, select, print) */
  operation?: string;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Rows read or evaluated */
  rowsProcessed?: number;
  /** Active rows after the operation */
  activeRows?: number;
  /** Active columns after the operation */
  activeColumns?: number;
  /** Error code for error logs */
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
}

/**
 * Type guard for JSON-compatible log values.
 */
export function isLogContextValue(value: unknown): value is LogContextValue {
  if (value === null) return true;
  if (typeof value === 'string') return true;
  if (typeof value === 'number') return true;
  if (typeof value === 'boolean') return true;
  if (Array.isArray(value)) {
    return value.every(isLogContextValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isLogContextValue);
  }
  return false;
}

/**
 * Convert an arbitrary record (such as `TableError#toLogContext()`) into a
 * LogContext, dropping entries that are not JSON-compatible.
 */
export function toLogContext(record: Record<string, unknown>): LogContext {
  const context: LogContext = {};
  for (const [key, value] of Object.entries(record)) {
    if (isLogContextValue(value)) {
      context[key] = value;
    }
  }
  return context;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Receives every entry at or above `minLevel` */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for one JSON object per line, 'pretty' for humans (default: 'json') */
  format?: 'json' | 'pretty';
}

/**
 * Logger that keeps its entries for assertions.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },

  isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
  },
};

// =============================================================================
// Logger Factory Functions
// =============================================================================

function entrySink(minLevel: LogLevel, output: (entry: LogEntry) => void): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
    };

    if (context !== undefined) {
      entry.context = context;
    }

    if (error !== undefined) {
      entry.error = error;
    }

    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Create a logger that hands entries to `config.output`.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ minLevel: 'info', output: (entry) => sink.push(entry) });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return entrySink(config.minLevel ?? 'debug', config.output ?? (() => {}));
}

/**
 * Format an entry the way {@link createConsoleLogger} prints it.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  let output = `[${time}] ${levelUpper} ${entry.message}`;

  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  ${entry.error.stack}`;
    }
  }

  return output;
}

/**
 * Create a logger that writes to stderr, keeping stdout free for printed tables.
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: (entry) => {
      console.error(formatLogEntry(entry, format));
    },
  });
}

export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a logger that captures entries in memory.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * table.slice('-2');
 * expect(logger.getLogsByLevel('debug')[0]?.context?.operation).toBe('slice');
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const sink = entrySink(config.minLevel ?? 'debug', (entry) => {
    logs.push(entry);
  });

  return {
    ...sink,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger whose entries carry `context`, merged under any
 * context given at log time.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const mergeContext = (localContext?: LogContext): LogContext => {
    if (localContext === undefined) {
      return context;
    }
    return { ...context, ...localContext };
  };

  return {
    debug(message: string, localContext?: LogContext): void {
      logger.debug(message, mergeContext(localContext));
    },
    info(message: string, localContext?: LogContext): void {
      logger.info(message, mergeContext(localContext));
    },
    warn(message: string, localContext?: LogContext): void {
      logger.warn(message, mergeContext(localContext));
    },
    error(message: string, error?: Error, localContext?: LogContext): void {
      logger.error(message, error, mergeContext(localContext));
    },
  };
}
