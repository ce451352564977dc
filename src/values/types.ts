/**
 * Scalar value types shared by records and rows
 */

import { Decimal } from './decimal';
import { LocalDate } from './local-date';

/**
 * A value an application record may hold. Symbols stand for symbolic
 * tokens and are written to storage as their description.
 */
export type AppValue =
  | number
  | bigint
  | string
  | boolean
  | Date
  | LocalDate
  | Decimal
  | symbol;

/**
 * An application record. A missing key, or one set to `undefined`, is
 * how an optional field says it has no value; `null` is never used.
 */
export type AppRecord = { [key: string]: AppValue | undefined };

/**
 * A value in one slot of a storage row
 */
export type StorageValue =
  | number
  | bigint
  | string
  | boolean
  | Date
  | LocalDate
  | Decimal
  | null;

/**
 * A schema-positioned storage row, one slot per schema field
 */
export type StorageRow = readonly StorageValue[];
