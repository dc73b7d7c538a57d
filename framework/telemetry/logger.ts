/**
 * Structured Logging
 *
 * JSON-structured logging with levels and context. A logger is built from
 * configuration and handed to the server, router and connections.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFormat = 'json' | 'pretty';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  context?: Record<string, unknown>;
  output?: (entry: LogEntry) => void;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Structured logger
 */
export class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private context: Record<string, unknown>;
  private output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.context = options.context ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  /**
   * Log at debug level
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  /**
   * Log at info level
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Log at warn level
   */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  /**
   * Log at error level
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.context, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.context, ...context },
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    this.output(entry);
  }

  private defaultOutput(entry: LogEntry): void {
    if (this.format === 'json') {
      console.log(JSON.stringify(entry));
    } else {
      this.prettyPrint(entry);
    }
  }

  /**
   * Pretty print for development
   */
  private prettyPrint(entry: LogEntry): void {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[34m', // Blue
      info: '\x1b[32m', // Green
      warn: '\x1b[33m', // Yellow
      error: '\x1b[31m', // Red
    };
    const reset = '\x1b[0m';
    const dim = '\x1b[2m';

    const timestamp = dim + entry.timestamp + reset;
    const level = colors[entry.level] + entry.level.toUpperCase().padEnd(5) + reset;

    let output = `${timestamp} ${level} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${dim}${JSON.stringify(entry.context)}${reset}`;
    }

    if (entry.level === 'error' || entry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }

    if (entry.error?.stack) {
      console.error(dim + entry.error.stack + reset);
    }
  }
}

/**
 * Coerce a caught value into an Error for logging.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// Default logger instance
let defaultLogger: Logger | null = null;

/**
 * Get the default logger
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    const env = process.env.NODE_ENV ?? 'development';
    defaultLogger = new Logger({
      level: env === 'production' ? 'info' : 'debug',
      format: env === 'production' ? 'json' : 'pretty',
    });
  }
  return defaultLogger;
}

/**
 * Set the default logger
 */
export function setLogger(logger: Logger): void {
  defaultLogger = logger;
}
