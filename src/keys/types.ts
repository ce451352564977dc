/**
 * Key mapping types
 *
 * Application records and storage rows name their fields with different
 * conventions. A key mapper is the pair of functions translating between
 * the two; every other module goes through it and never applies a casing
 * rule of its own.
 */

/**
 * Translates an application key into a storage column name
 */
export type KeyEncoder = (appKey: string) => string;

/**
 * Translates a storage column name into an application key
 */
export type KeyDecoder = (storageName: string) => string;

/**
 * A pair of mutually inverse key translation functions
 */
export interface IKeyMapper {
  /**
   * Storage name → application key, applied when reading rows
   */
  decode: KeyDecoder;

  /**
   * Application key → storage name, applied when writing rows and
   * resolving columns
   */
  encode: KeyEncoder;
}
