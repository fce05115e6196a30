type LogFn = (message: string, ...args: unknown[]) => void;

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

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

interface ConsoleLoggerOptions {
  /** Minimum level that is written (default: 'info') */
  level?: LogLevel;
  /** Sink for formatted lines, defaults to the global console */
  sink?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
  /** Timestamp source, overridable for deterministic output */
  now?: () => Date;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a Logger that writes `<ISO time> <LEVEL> <message>` lines to the
 * console, dropping everything below the configured level.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());

  const build =
    (level: Exclude<LogLevel, 'silent'>): LogFn =>
    (message, ...args) => {
      if (LEVEL_ORDER[level] < threshold) return;
      const line = `${now().toISOString()} ${level.toUpperCase()} ${message}`;
      sink[level](line, ...args);
    };

  return new Logger({
    debug: build('debug'),
    info: build('info'),
    warn: build('warn'),
    error: build('error'),
  });
}

export { Logger, LOG_LEVELS, createConsoleLogger, isLogLevel };
export type { ConsoleLoggerOptions, LoggerMethods, LogFn, LogLevel };
