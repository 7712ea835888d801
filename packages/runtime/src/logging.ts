// Structured logging for the runtime
//
// Halts and policy denials are logged at warn, loop phases at debug and
// interventions at info.

/**
 * Structured logger interface.
 * Implementations can route to console, file, or external services.
 */
export type RuntimeLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

/**
 * Default console logger implementation
 */
export const consoleLogger: RuntimeLogger = {
  debug(message: string, data?: Record<string, unknown>) {
    console.debug(`[DEBUG] ${message}`, data ?? '');
  },
  info(message: string, data?: Record<string, unknown>) {
    console.info(`[INFO] ${message}`, data ?? '');
  },
  warn(message: string, data?: Record<string, unknown>) {
    console.warn(`[WARN] ${message}`, data ?? '');
  },
  error(message: string, data?: Record<string, unknown>) {
    console.error(`[ERROR] ${message}`, data ?? '');
  },
};

/**
 * Silent logger for testing
 */
export const silentLogger: RuntimeLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Drop entries below `level` before they reach `base`.
 */
export function createConsoleLogger(
  level: LogLevel,
  base: RuntimeLogger = consoleLogger
): RuntimeLogger {
  const threshold = LEVEL_RANK[level];
  const enabled = (entryLevel: Exclude<LogLevel, 'silent'>) => LEVEL_RANK[entryLevel] >= threshold;

  return {
    debug(message, data) {
      if (enabled('debug')) base.debug(message, data);
    },
    info(message, data) {
      if (enabled('info')) base.info(message, data);
    },
    warn(message, data) {
      if (enabled('warn')) base.warn(message, data);
    },
    error(message, data) {
      if (enabled('error')) base.error(message, data);
    },
  };
}

/**
 * A captured log entry
 */
export type LogEntry = {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Create a capturing logger that stores log entries for inspection
 */
export function createCapturingLogger(): RuntimeLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const log = (level: LogEntry['level']) => (message: string, data?: Record<string, unknown>) => {
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
