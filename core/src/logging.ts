/**
 * Structured logging for Tuplet
 *
 * Gateways accept a Logger through `useLogger()`. The base gateway keeps the
 * no-op logger, adapters such as the memory gateway store and use the one they
 * are handed.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext } from '@tuplet/core';
 *
 * const logger = createConsoleLogger({ format: 'pretty', minLevel: 'info' });
 * const gatewayLogger = withContext(logger, { gateway: 'default' });
 * gatewayLogger.info('Dataset created', { dataset: 'users' });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * JSON-compatible values allowed in log context
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries
 */
export interface LogContext {
  /** Gateway name from configuration */
  gateway?: string;
  /** Adapter identifier */
  adapter?: string;
  /** Relation or dataset name */
  dataset?: string;
  /** Operation being performed */
  operation?: string;
  durationMs?: number;
  rowsProcessed?: number;
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
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
  /** Receives every emitted entry */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for structured lines, 'pretty' for humans */
  format?: 'json' | 'pretty';
}

/**
 * Logger that keeps its entries for assertions
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

  isLevel(value: string): value is LogLevel {
    return Object.hasOwn(LOG_LEVEL_ORDER, value);
  },
};

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Build the four level methods around a single sink.
 */
function buildLogger(
  minLevel: LogLevel,
  sink: (entry: LogEntry) => void
): Logger {
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

    sink(entry);
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
 * Create a logger with a custom output
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   minLevel: 'info',
 *   output: (entry) => shipToCollector(entry),
 * });
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return buildLogger(config.minLevel ?? 'debug', config.output ?? (() => {}));
}

/**
 * Create a logger that writes one line per entry to the console
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  const formatEntry = (entry: LogEntry): string => {
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
  };

  return createLogger({
    ...config,
    output: (entry) => {
      console.log(formatEntry(entry));
    },
  });
}

const NOOP_LOGGER: Logger = Object.freeze({
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
});

/**
 * The shared logger that discards everything
 */
export function createNoopLogger(): Logger {
  return NOOP_LOGGER;
}

/**
 * Create a logger that captures entries for assertions
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * gateway.useLogger(logger);
 * gateway.dataset('users');
 * expect(logger.getLogsByLevel('debug')).toHaveLength(1);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = buildLogger(config.minLevel ?? 'debug', entry => {
    logs.push(entry);
  });

  return {
    ...logger,
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
 * Create a child logger that adds `context` to every entry
 *
 * Context passed at log time wins over the inherited context.
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
