/**
 * Record ↔ row conversion
 *
 * Records are keyed objects where an optional field without a value is a
 * missing key. Rows are schema-positioned arrays where the same field is a
 * null slot. Converting a record to a row and back reproduces the
 * record's key set exactly.
 */

import { KeyDecoder, KeyEncoder } from '../keys/types';
import { SchemaDescriptor } from '../schema/types';
import { AppRecord, AppValue, StorageRow, StorageValue } from '../values/types';
import { RowShapeError } from './errors';

export * from './errors';

/**
 * Storage form of a record value. Symbols become their description;
 * everything else passes through.
 */
export function toStorageValue(value: AppValue | undefined): StorageValue {
  if (value === undefined) {
    return null;
  }
  if (typeof value === 'symbol') {
    return value.description ?? '';
  }
  return value;
}

/**
 * Convert a record into a row positioned by `schema`
 *
 * Keys are matched to fields by `encode(key)`, ignoring case. Fields with
 * no matching key get null; keys with no matching field are dropped.
 *
 * @example
 * ```typescript
 * const schema = [
 *   { name: 'ID', type: DataTypes.Integer, nullable: false },
 *   { name: 'AGE', type: DataTypes.Integer, nullable: true }
 * ];
 * recordToRow({ id: 1 }, schema, key => key.toUpperCase()); // [1, null]
 * ```
 */
export function recordToRow(
  record: AppRecord,
  schema: SchemaDescriptor,
  encode: KeyEncoder
): StorageRow {
  const lookup = new Map<string, AppValue | undefined>();
  for (const key of Object.keys(record)) {
    lookup.set(encode(key).toLowerCase(), record[key]);
  }

  return schema.map(field => toStorageValue(lookup.get(field.name.toLowerCase())));
}

/**
 * Convert a row positioned by `schema` back into a record
 *
 * Null slots are left out of the result rather than set to null.
 *
 * @throws {RowShapeError} If the row and schema lengths differ
 */
export function rowToRecord(
  row: StorageRow,
  schema: SchemaDescriptor,
  decode: KeyDecoder
): AppRecord {
  if (row.length !== schema.length) {
    throw new RowShapeError(
      `Row has ${row.length} values but the schema has ${schema.length} fields`
    );
  }

  const record: AppRecord = {};
  schema.forEach((field, index) => {
    const value = row[index];
    if (value !== null) {
      // Plain assignment would set the prototype for a `__proto__` key
      Object.defineProperty(record, decode(field.name), {
        value,
        enumerable: true,
        writable: true,
        configurable: true
      });
    }
  });
  return record;
}

/**
 * Convert records into rows, one per record, in order
 */
export function recordsToRows(
  records: readonly AppRecord[],
  schema: SchemaDescriptor,
  encode: KeyEncoder
): StorageRow[] {
  return records.map(record => recordToRow(record, schema, encode));
}

/**
 * Convert rows into records, one per row, in order
 */
export function rowsToRecords(
  rows: readonly StorageRow[],
  schema: SchemaDescriptor,
  decode: KeyDecoder
): AppRecord[] {
  return rows.map(row => rowToRecord(row, schema, decode));
}
