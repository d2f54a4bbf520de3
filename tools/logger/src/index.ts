type LogFn = (...args: unknown[]) => void;

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const noop: LogFn = () => {};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

/**
 * Creates a console-backed logger.
 * Methods below `level` are replaced with no-ops.
 */
function createConsoleLogger(level: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel) =>
    LOG_LEVELS.indexOf(candidate) >= threshold;

  return new Logger({
    debug: enabled('debug') ? (...args) => console.debug(...args) : noop,
    info: enabled('info') ? (...args) => console.info(...args) : noop,
    warn: enabled('warn') ? (...args) => console.warn(...args) : noop,
    error: enabled('error') ? (...args) => console.error(...args) : noop,
  });
}

export { Logger, LOG_LEVELS, createConsoleLogger };
export type { LoggerMethods, LogFn, LogLevel };
