/**
 * Schema descriptor types
 */

/**
 * The scalar column types TableKit models
 */
export type DataType =
  | { kind: 'integer' }
  | { kind: 'double' }
  | { kind: 'decimal'; precision: number; scale: number }
  | { kind: 'boolean' }
  | { kind: 'date' }
  | { kind: 'timestamp' }
  | { kind: 'string' };

/**
 * Discriminant of {@link DataType}
 */
export type DataTypeKind = DataType['kind'];

/**
 * Data type constants
 *
 * @example
 * ```typescript
 * const schema: SchemaDescriptor = [
 *   { name: 'ID', type: DataTypes.Integer, nullable: false },
 *   { name: 'PRICE', type: DataTypes.decimal(10, 2), nullable: true }
 * ];
 * ```
 */
export const DataTypes = {
  Integer: { kind: 'integer' },
  Double: { kind: 'double' },
  Boolean: { kind: 'boolean' },
  Date: { kind: 'date' },
  Timestamp: { kind: 'timestamp' },
  String: { kind: 'string' },
  decimal: (precision: number, scale: number): DataType => ({
    kind: 'decimal',
    precision,
    scale
  })
} as const satisfies Record<string, DataType | ((...args: number[]) => DataType)>;

/**
 * Precision and scale given to decimals found during inference
 */
export const DEFAULT_DECIMAL_PRECISION = 38;
export const DEFAULT_DECIMAL_SCALE = 18;

/**
 * One column of a schema descriptor
 */
export interface ISchemaField {
  /**
   * Storage-side column name
   */
  name: string;

  type: DataType;

  /**
   * Whether the slot may hold null
   */
  nullable: boolean;
}

/**
 * Ordered column list. A field's index is its slot in every row built
 * against the schema.
 */
export type SchemaDescriptor = readonly ISchemaField[];

/**
 * Column names of a schema, in order
 */
export function fieldNames(schema: SchemaDescriptor): string[] {
  return schema.map(field => field.name);
}

/**
 * Render a data type the way SQL would spell it
 */
export function formatDataType(type: DataType): string {
  switch (type.kind) {
    case 'decimal':
      return `DECIMAL(${type.precision}, ${type.scale})`;
    case 'double':
      return 'DOUBLE';
    default:
      return type.kind.toUpperCase();
  }
}
