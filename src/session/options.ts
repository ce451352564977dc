/**
 * Session configuration
 */

import { DEFAULT_KEY_MAPPER, createKeyMapper } from '../keys';
import { IKeyMapper } from '../keys/types';
import { silentLogger } from '../logger';
import { ITableKitLogger } from '../logger/types';

/**
 * Options accepted when creating a session
 *
 * @example
 * ```typescript
 * const options: ITableKitOptions = {
 *   keys: {
 *     encode: key => key.replace(/[A-Z]/g, c => `_${c}`).toUpperCase(),
 *     decode: name => name.toLowerCase().replace(/_([a-z])/g, (_, c) => c.toUpperCase())
 *   },
 *   logger: createConsoleLogger({ level: 'debug' })
 * };
 * ```
 */
export interface ITableKitOptions {
  /**
   * Key translation between records and columns. Either side may be
   * given alone; the other comes from {@link DEFAULT_TABLEKIT_OPTIONS}.
   */
  keys?: Partial<IKeyMapper>;

  /**
   * Where session activity is logged
   */
  logger?: ITableKitLogger;
}

/**
 * Options after defaults are applied
 */
export interface IResolvedTableKitOptions {
  keys: IKeyMapper;
  logger: ITableKitLogger;
}

/**
 * Default session options: upper-case column names, lower-case keys,
 * no logging
 */
export const DEFAULT_TABLEKIT_OPTIONS: Readonly<IResolvedTableKitOptions> = Object.freeze({
  keys: DEFAULT_KEY_MAPPER,
  logger: silentLogger
});

/**
 * Apply defaults to session options
 */
export function resolveTableKitOptions(options: ITableKitOptions = {}): IResolvedTableKitOptions {
  return {
    keys: createKeyMapper(options.keys, DEFAULT_TABLEKIT_OPTIONS.keys),
    logger: options.logger ?? DEFAULT_TABLEKIT_OPTIONS.logger
  };
}
