/**
 * Structured Logger
 *
 * Emits one JSON object per line with timestamp, level, service and an
 * optional component/context. Loggers are passed explicitly to every runner;
 * nothing reads log output back.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  step?: string;
  check?: string;
  replica?: string;
  connector?: string;
  topic?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  component?: string;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Minimal logging surface accepted by runners and orchestrators
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  withComponent(component: string): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
  now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, line) => {
  const logMethod = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  logMethod(line);
};

/**
 * Sink that writes every entry to stderr, keeping stdout free for payloads
 */
export const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(line + '\n');
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class StructuredLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(
    private readonly serviceName: string = 'shiftgate',
    options: LoggerOptions = {},
    private readonly component?: string
  ) {
    this.minLevel = options.minLevel ?? 'info';
    this.sink = options.sink ?? consoleSink;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Log debug information (skipped in production)
   */
  debug(message: string, context?: LogContext): void {
    if (process.env.NODE_ENV === 'production') {
      return;
    }
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  /**
   * Log errors with the error's name, message and stack
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled('error')) {
      return;
    }
    const logEntry = this.entry('error', message, context);

    if (error instanceof Error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error !== undefined) {
      logEntry.error = {
        name: 'UnknownError',
        message: String(error),
      };
    }

    this.sink('error', JSON.stringify(logEntry));
  }

  /**
   * Create a child logger with a component name
   */
  withComponent(component: string): Logger {
    return new StructuredLogger(
      this.serviceName,
      { minLevel: this.minLevel, sink: this.sink, now: this.now },
      component
    );
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private entry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: this.now().toISOString(),
      level,
      service: this.serviceName,
      component: this.component,
      message,
      context,
    };
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.enabled(level)) {
      return;
    }
    this.sink(level, JSON.stringify(this.entry(level, message, context)));
  }
}

export function createLogger(serviceName?: string, options?: LoggerOptions): Logger {
  return new StructuredLogger(serviceName, options);
}
