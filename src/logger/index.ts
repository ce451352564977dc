/**
 * TableKit logging
 */

import pc from 'picocolors';
import { ITableKitLogger, LogLevel } from './types';

export * from './types';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: pc.gray,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red
};

/**
 * Options for the console logger
 */
export interface IConsoleLoggerOptions {
  /**
   * Minimum level to emit
   *
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Tag printed before each message
   *
   * @default 'tablekit'
   */
  prefix?: string;
}

function formatValue(value: unknown): string {
  if (typeof value === 'bigint') {
    return `${value}n`;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Render structured data as `key=value` pairs
 */
function formatData(data: Record<string, unknown> = {}): string[] {
  return Object.entries(data).map(([key, value]) => `${pc.dim(`${key}=`)}${formatValue(value)}`);
}

/**
 * Create a logger writing one colored line per message to the console.
 * Warnings and errors go to stderr.
 *
 * @example
 * ```typescript
 * const session = createSession(handle, {
 *   logger: createConsoleLogger({ level: 'debug' })
 * });
 * // [tablekit] DEBUG Opening table table="EMPLOYEES"
 * ```
 */
export function createConsoleLogger(options: IConsoleLoggerOptions = {}): ITableKitLogger {
  const { level = 'info', prefix = 'tablekit' } = options;
  const enabled = new Set(LEVELS.slice(LEVELS.indexOf(level)));

  const write = (lvl: LogLevel) => (message: string, data?: Record<string, unknown>): void => {
    if (!enabled.has(lvl)) {
      return;
    }

    const tag = LEVEL_STYLE[lvl](lvl.toUpperCase());
    const line = [pc.dim(`[${prefix}]`), tag, message, ...formatData(data)].join(' ');
    if (lvl === 'warn' || lvl === 'error') {
      console.error(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error')
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: ITableKitLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
