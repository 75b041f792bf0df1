export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Writes to stderr only. stdout carries MCP stdio frames and `--json` CLI
 * output, so nothing else may be printed there.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(private readonly level: LogLevel = 'info', private readonly prefix = 'pylens') {
    this.minLevel = LEVEL_ORDER[level];
  }

  debug(message: string, context?: LogContext): void {
    this.emit('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.emit('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.emit('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.emit('error', message, context);
  }

  /** Same sink and level, with a narrower prefix. */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.level, `${this.prefix}:${scope}`);
  }

  private emit(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_ORDER[level] < this.minLevel) return;
    const write = level === 'warn' ? console.warn : console.error;
    const line = `[${this.prefix}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      write(line, context);
      return;
    }
    write(line);
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

export function createLogger(level: LogLevel = 'info', prefix?: string): ConsoleLogger {
  return new ConsoleLogger(level, prefix);
}
