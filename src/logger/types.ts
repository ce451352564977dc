/**
 * Logger accepted by TableKit sessions. Any object with these four
 * methods works, so application loggers can be passed straight in.
 */
export interface ITableKitLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
