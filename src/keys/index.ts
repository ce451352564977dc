/**
 * TableKit key mappers
 */

import { IKeyMapper } from './types';

export * from './types';

/**
 * Key mapper for engines that store unquoted identifiers upper-cased:
 * `userId` is written as `USERID` and read back as `userid`.
 *
 * This is a configuration value. Conversion functions never fall back to
 * it; sessions apply it only when the caller supplies no mapper.
 */
export const DEFAULT_KEY_MAPPER: Readonly<IKeyMapper> = Object.freeze({
  decode: (storageName: string): string => storageName.toLowerCase(),
  encode: (appKey: string): string => appKey.toUpperCase()
});

/**
 * Key mapper that leaves names untouched on both sides
 */
export const identityKeyMapper: Readonly<IKeyMapper> = Object.freeze({
  decode: (storageName: string): string => storageName,
  encode: (appKey: string): string => appKey
});

/**
 * Build a key mapper, filling whichever side is missing from `fallback`
 *
 * @example
 * ```typescript
 * const keys = createKeyMapper({ encode: snakeCase }, identityKeyMapper);
 * ```
 */
export function createKeyMapper(
  keys: Partial<IKeyMapper> = {},
  fallback: Readonly<IKeyMapper> = DEFAULT_KEY_MAPPER
): IKeyMapper {
  return {
    decode: keys.decode ?? fallback.decode,
    encode: keys.encode ?? fallback.encode
  };
}
