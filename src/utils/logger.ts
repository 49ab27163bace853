export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export interface Logger {
  readonly level: LogLevel;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Logger that prefixes every line with the component name */
  scoped: (scope: string) => Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(
  level: LogLevel,
  output: (message: string) => void = console.log,
  scope?: string
): Logger {
  const shouldLog = (msgLevel: LogLevel): boolean => {
    return LEVEL_PRIORITY[msgLevel] >= LEVEL_PRIORITY[level];
  };

  const formatMessage = (msgLevel: LogLevel, message: string): string => {
    const timestamp = new Date().toISOString().replace('T', ' ').slice(0, 19);
    const levelStr = msgLevel.toUpperCase().padEnd(5);
    const scopeStr = scope ? `[${scope}] ` : '';
    return `[${timestamp}] ${levelStr} ${scopeStr}${message}`;
  };

  const write = (msgLevel: LogLevel, message: string): void => {
    if (shouldLog(msgLevel)) output(formatMessage(msgLevel, message));
  };

  return {
    level,
    debug: (message: string) => write('debug', message),
    info: (message: string) => write('info', message),
    warn: (message: string) => write('warn', message),
    error: (message: string) => write('error', message),
    scoped: (child: string) => createLogger(level, output, scope ? `${scope}:${child}` : child)
  };
}
