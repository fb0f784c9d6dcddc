export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export interface LoggerOptions {
  level: LogLevel;
}

type LogContext = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export class Logger {
  private level: LogLevel;

  constructor(options: LoggerOptions) {
    this.level = options.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private write(level: Exclude<LogLevel, 'silent'>, msg: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    const line = `[${level.toUpperCase()}] ${msg}`;
    if (context) {
      console[level](line, context);
    } else {
      console[level](line);
    }
  }

  debug(msg: string, context?: LogContext): void {
    this.write('debug', msg, context);
  }

  info(msg: string, context?: LogContext): void {
    this.write('info', msg, context);
  }

  warn(msg: string, context?: LogContext): void {
    this.write('warn', msg, context);
  }

  error(msg: string, context?: LogContext): void {
    this.write('error', msg, context);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  // Create a child logger with additional context
  child(context: LogContext): ChildLogger {
    return new ChildLogger(this, context);
  }
}

export class ChildLogger {
  constructor(
    private parent: Logger,
    private context: LogContext
  ) {}

  debug(msg: string, context?: LogContext): void {
    this.parent.debug(msg, { ...this.context, ...context });
  }

  info(msg: string, context?: LogContext): void {
    this.parent.info(msg, { ...this.context, ...context });
  }

  warn(msg: string, context?: LogContext): void {
    this.parent.warn(msg, { ...this.context, ...context });
  }

  error(msg: string, context?: LogContext): void {
    this.parent.error(msg, { ...this.context, ...context });
  }
}

let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    // Default logger for early use
    globalLogger = new Logger({ level: 'info' });
  }
  return globalLogger;
}
