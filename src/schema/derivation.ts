/**
 * Schema derivation from zod object schemas
 */

import { z } from 'zod';
import { KeyEncoder } from '../keys/types';
import { InvalidSchemaError, UnsupportedTypeError } from './errors';
import { DataType, DataTypes, ISchemaField, SchemaDescriptor } from './types';

/**
 * Strip optional/nullable/default/refinement wrappers from a field type,
 * noting whether `.optional()` was among them
 */
function unwrapField(schema: z.ZodTypeAny): { inner: z.ZodTypeAny; optional: boolean } {
  let current = schema;
  let optional = false;

  for (;;) {
    if (current instanceof z.ZodOptional) {
      optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodNullable) {
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      return { inner: current, optional };
    }
  }
}

/**
 * Type shared by every member of an enum or literal
 */
function literalDataType(field: string, values: readonly unknown[]): DataType {
  if (values.every(value => typeof value === 'number' && Number.isInteger(value))) {
    return DataTypes.Integer;
  }
  if (values.every(value => typeof value === 'number')) {
    return DataTypes.Double;
  }
  if (values.every(value => typeof value === 'string')) {
    return DataTypes.String;
  }
  throw new UnsupportedTypeError(
    `Unsupported type for field "${field}": enum values must all be integers, numbers or strings`
  );
}

/**
 * Member values of a TypeScript enum object, without the reverse
 * name lookups numeric enums carry
 */
function nativeEnumValues(enumObject: Record<string, unknown>): unknown[] {
  return Object.entries(enumObject)
    .filter(([key]) => Number.isNaN(Number(key)))
    .map(([, value]) => value);
}

function fieldDataType(field: string, schema: z.ZodTypeAny): DataType {
  if (schema instanceof z.ZodNumber) {
    return schema.isInt ? DataTypes.Integer : DataTypes.Double;
  }
  if (schema instanceof z.ZodBigInt) {
    return DataTypes.Integer;
  }
  if (schema instanceof z.ZodString) {
    return DataTypes.String;
  }
  if (schema instanceof z.ZodBoolean) {
    return DataTypes.Boolean;
  }
  if (schema instanceof z.ZodDate) {
    return DataTypes.Timestamp;
  }
  if (
    schema instanceof z.ZodSymbol ||
    schema instanceof z.ZodAny ||
    schema instanceof z.ZodUnknown ||
    schema instanceof z.ZodNull
  ) {
    return DataTypes.String;
  }
  if (schema instanceof z.ZodEnum) {
    return literalDataType(field, schema.options);
  }
  if (schema instanceof z.ZodNativeEnum) {
    return literalDataType(field, nativeEnumValues(schema.enum));
  }
  if (schema instanceof z.ZodLiteral) {
    return literalDataType(field, [schema.value]);
  }

  throw new UnsupportedTypeError(
    `Unsupported type for field "${field}": ${schema.constructor.name}`
  );
}

/**
 * Derive a schema from a zod object schema
 *
 * Fields keep their declaration order. A field is nullable exactly when
 * it is declared `.optional()`; `.nullable()` alone does not make it so.
 *
 * @param type - A `z.object(...)` schema with scalar fields
 * @param encode - Translates each field key into its column name
 * @throws {InvalidSchemaError} If `type` is not a zod object schema
 * @throws {UnsupportedTypeError} If a field has a nested, collection or
 * otherwise unmodelled type
 *
 * @example
 * ```typescript
 * const Employee = z.object({
 *   id: z.number().int(),
 *   name: z.string(),
 *   age: z.number().int().optional()
 * });
 *
 * deriveSchema(Employee, key => key.toUpperCase());
 * // [{ name: 'ID', type: { kind: 'integer' }, nullable: false },
 * //  { name: 'NAME', type: { kind: 'string' }, nullable: false },
 * //  { name: 'AGE', type: { kind: 'integer' }, nullable: true }]
 * ```
 */
export function deriveSchema(type: z.ZodTypeAny, encode: KeyEncoder): SchemaDescriptor {
  if (!(type instanceof z.ZodType)) {
    throw new InvalidSchemaError('Input must be a valid zod schema');
  }

  const objectType = type instanceof z.ZodEffects ? type.innerType() : type;
  if (!(objectType instanceof z.ZodObject)) {
    throw new InvalidSchemaError('Only object schemas are supported');
  }

  const shape: Record<string, z.ZodTypeAny> = objectType.shape;
  return Object.entries(shape).map(([key, fieldType]): ISchemaField => {
    const { inner, optional } = unwrapField(fieldType);
    return {
      name: encode(key),
      type: fieldDataType(key, inner),
      nullable: optional
    };
  });
}
