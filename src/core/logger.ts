/**
 * Levelled console logger.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

/**
 * Destination for formatted log lines. Defaults to the matching console method.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel;
  sink?: LogSink;
}

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line);
      return;
    case 'info':
      console.info(line);
      return;
    case 'warn':
      console.warn(line);
      return;
    case 'error':
      console.error(line);
      return;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export function formatLogLine(level: LogLevel, message: string, context?: LogContext): string {
  let line = `[pubchem] ${level.toUpperCase().padEnd(5)} ${message}`;
  if (context && Object.keys(context).length > 0) {
    line += ` ${JSON.stringify(context)}`;
  }
  return line;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_PRIORITY[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;

  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LOG_LEVEL_PRIORITY[level] < threshold) return;
    sink(level, formatLogLine(level, message, context));
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}

