// Logging

/**
 * Structured logger interface for the estimator.
 * Implementations can route to console, file, or external services.
 */
export type EstimatorLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Create a logger that writes to the console, one `[LEVEL] [scope] message`
 * line per entry.
 */
export function createConsoleLogger(scope?: string): EstimatorLogger {
  const prefix = scope ? ` [${scope}]` : '';
  const write =
    (level: LogLevel) =>
    (message: string, data?: Record<string, unknown>): void => {
      console[level](`[${level.toUpperCase()}]${prefix} ${message}`, data ?? '');
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

/**
 * Default console logger implementation
 */
export const consoleLogger: EstimatorLogger = createConsoleLogger();

/**
 * Silent logger, the default
 */
export const silentLogger: EstimatorLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

export function createCapturingLogger(): EstimatorLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({
      level,
      message,
      data,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    entries,
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
