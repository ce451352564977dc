/**
 * Schema inference from sample records
 */

import { KeyEncoder } from '../keys/types';
import { AppValue, AppRecord } from '../values/types';
import { Decimal } from '../values/decimal';
import { LocalDate } from '../values/local-date';
import { EmptyInputError } from './errors';
import {
  DEFAULT_DECIMAL_PRECISION,
  DEFAULT_DECIMAL_SCALE,
  DataType,
  DataTypes,
  ISchemaField,
  SchemaDescriptor
} from './types';

/**
 * Ordered value → type rules. The first match wins, so order matters
 * where predicates could overlap.
 */
const INFERENCE_RULES: ReadonlyArray<{
  matches: (value: AppValue | undefined) => boolean;
  type: DataType;
}> = [
  {
    matches: value =>
      (typeof value === 'number' && Number.isInteger(value)) || typeof value === 'bigint',
    type: DataTypes.Integer
  },
  { matches: value => typeof value === 'number', type: DataTypes.Double },
  {
    matches: value => value instanceof Decimal,
    type: DataTypes.decimal(DEFAULT_DECIMAL_PRECISION, DEFAULT_DECIMAL_SCALE)
  },
  { matches: value => typeof value === 'boolean', type: DataTypes.Boolean },
  { matches: value => value instanceof LocalDate, type: DataTypes.Date },
  { matches: value => value instanceof Date, type: DataTypes.Timestamp }
];

/**
 * Storage type for a single value. Strings, symbols and absent values
 * all fall back to string.
 */
export function inferDataType(value: AppValue | undefined): DataType {
  const rule = INFERENCE_RULES.find(candidate => candidate.matches(value));
  return rule ? rule.type : DataTypes.String;
}

/**
 * Infer a schema from records
 *
 * Only the first record is inspected. Fields follow its key order and
 * are all nullable.
 *
 * @param records - Records to sample
 * @param encode - Translates each key into its column name
 * @throws {EmptyInputError} If `records` is empty
 *
 * @example
 * ```typescript
 * inferSchema([{ id: 1, name: 'Ada' }], key => key.toUpperCase());
 * // [{ name: 'ID', type: { kind: 'integer' }, nullable: true },
 * //  { name: 'NAME', type: { kind: 'string' }, nullable: true }]
 * ```
 */
export function inferSchema(
  records: readonly AppRecord[],
  encode: KeyEncoder
): SchemaDescriptor {
  if (records.length === 0) {
    throw new EmptyInputError('Cannot infer schema from empty collection');
  }

  const sample = records[0];
  return Object.keys(sample).map(
    (key): ISchemaField => ({
      name: encode(key),
      type: inferDataType(sample[key]),
      nullable: true
    })
  );
}
