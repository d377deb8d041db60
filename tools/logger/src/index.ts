type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
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

/**
 * Options for the console-backed logger
 */
interface ConsoleLoggerOptions {
  /**
   * Minimum level that is written (default: 'info')
   */
  level?: LogLevel;

  /**
   * Sink to write to (default: global console)
   */
  sink?: Pick<Console, LogLevel>;

  /**
   * Clock used for the line timestamp
   */
  now?: () => Date;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Format a date as `YYYY-MM-DD HH:mm:ss` in local time
 */
function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Create a Logger that writes `[timestamp] LEVEL: message` lines to the console.
 * Calls below the configured level are dropped.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());

  const write =
    (level: LogLevel): LogFn =>
    (...args) => {
      if (LOG_LEVEL_ORDER[level] < threshold) return;
      sink[level](
        `[${formatTimestamp(now())}] ${level.toUpperCase()}:`,
        ...args,
      );
    };

  return new Logger({
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  });
}

export { Logger, createConsoleLogger, LOG_LEVEL_ORDER };
export type { ConsoleLoggerOptions, LoggerMethods, LogFn, LogLevel };
