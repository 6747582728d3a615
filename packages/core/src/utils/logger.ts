/**
 * Logger interface. Consumers provide their own implementation
 * (console, pino, winston, etc.). Every engine component falls back to
 * the no-op logger when none is passed.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * No-op logger used when no logger is provided.
 */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogLevel = keyof Logger;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface ConsoleLoggerOptions {
  /** Entries below this level are dropped. Defaults to 'debug'. */
  minLevel?: LogLevel;
  /** Tag printed before the level, e.g. 'sync'. */
  scope?: string;
}

/**
 * Console logger for development and local runs.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.minLevel ?? 'debug'];
  const tag = options.scope ? `[${options.scope}] ` : '';

  const write = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < threshold) return;
    console[level](`${tag}[${level.toUpperCase()}] ${message}`, data ?? '');
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export const consoleLogger: Logger = createConsoleLogger();

/**
 * Wrap a logger so every entry carries the given fields (e.g. jobId, providerId).
 * Per-call data wins on key collisions.
 */
export function withLogContext(logger: Logger, context: Record<string, unknown>): Logger {
  return {
    debug: (message, data) => logger.debug(message, { ...context, ...data }),
    info: (message, data) => logger.info(message, { ...context, ...data }),
    warn: (message, data) => logger.warn(message, { ...context, ...data }),
    error: (message, data) => logger.error(message, { ...context, ...data }),
  };
}
