/**
 * Drizzle ORM Adapter for TableKit
 *
 * These handles let drizzle tables back a TableKit session: schemas are
 * read from drizzle's column metadata, column references are drizzle
 * columns, and rows are fetched through the drizzle query builder.
 */

import { Column, SQLWrapper, Table, getTableColumns, getTableName, sql } from 'drizzle-orm';
import { DataType, DataTypes, DEFAULT_DECIMAL_PRECISION, DEFAULT_DECIMAL_SCALE, SchemaDescriptor } from '../../schema/types';
import { Decimal } from '../../values/decimal';
import { LocalDate } from '../../values/local-date';
import { StorageRow, StorageValue } from '../../values/types';
import { ICollectOptions, ISessionHandle, ITableHandle, SaveMode } from '../types';

/**
 * Type for Drizzle ORM database instance
 */
export interface IDrizzleDatabase {
  select: (fields?: Record<string, SQLWrapper>) => { from: (table: unknown) => IDrizzleQueryBuilder };
  insert: (table: unknown) => { values: (rows: Record<string, unknown>[]) => PromiseLike<unknown> };
  delete: (table: unknown) => PromiseLike<unknown>;
}

/**
 * Type for Drizzle query builder
 */
export interface IDrizzleQueryBuilder {
  limit: (limit: number) => IDrizzleQueryBuilder;
  // This is already a Promise due to Drizzle's thenable implementation
  then<TResult1 = unknown, TResult2 = never>(
    onfulfilled?: ((value: unknown[]) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2>;
}

/**
 * Options for the Drizzle session handle
 */
export interface IDrizzleSessionOptions {
  /**
   * The Drizzle ORM database instance
   */
  db: IDrizzleDatabase;

  /**
   * Drizzle table definitions, by the name `table()` looks them up with
   */
  tables: Record<string, Table>;
}

/**
 * Error thrown when adapter operations fail
 */
export class DrizzleAdapterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DrizzleAdapterError';
  }
}

/**
 * Storage type of a drizzle column, read from its column class
 * (`PgInteger`, `PgNumeric`, `SQLiteText`, ...)
 */
export function columnDataType(column: Column): DataType {
  const columnType = column.columnType;

  if (/Numeric|Decimal/.test(columnType)) {
    return DataTypes.decimal(DEFAULT_DECIMAL_PRECISION, DEFAULT_DECIMAL_SCALE);
  }
  if (/Timestamp|DateTime/.test(columnType)) {
    return DataTypes.Timestamp;
  }
  if (/Date/.test(columnType)) {
    return DataTypes.Date;
  }

  switch (column.dataType) {
    case 'number':
    case 'bigint':
      return /Real|Double|Float/.test(columnType) ? DataTypes.Double : DataTypes.Integer;
    case 'boolean':
      return DataTypes.Boolean;
    case 'date':
      return DataTypes.Timestamp;
    default:
      return DataTypes.String;
  }
}

/**
 * Convert a value returned by the driver into a row slot
 *
 * Date and decimal columns commonly come back as strings and are lifted
 * into {@link LocalDate} and {@link Decimal}. Structured values are
 * written as JSON text.
 */
function fromDriverValue(value: unknown, type: DataType): StorageValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    if (type.kind === 'date') {
      return LocalDate.parse(value);
    }
    if (type.kind === 'decimal') {
      return new Decimal(value);
    }
    return value;
  }
  if (
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    value instanceof LocalDate ||
    value instanceof Decimal
  ) {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Driver form of a row slot. Drizzle takes DATE and NUMERIC values as
 * strings.
 */
function toDriverValue(value: StorageValue): unknown {
  return value instanceof LocalDate || value instanceof Decimal ? value.toString() : value;
}

function readProperty(record: unknown, key: string): unknown {
  return typeof record === 'object' && record !== null ? Reflect.get(record, key) : undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function findTable(tables: Record<string, Table>, name: string): Table {
  const table = Object.prototype.hasOwnProperty.call(tables, name) ? tables[name] : undefined;
  if (!table) {
    throw new DrizzleAdapterError(`Table ${name} not found in schema`);
  }
  return table;
}

async function countRows(db: IDrizzleDatabase, table: Table): Promise<number> {
  try {
    const result = await db.select({ count: sql<number>`count(*)`.mapWith(Number) }).from(table);
    return Number(readProperty(result[0], 'count') ?? 0);
  } catch (error) {
    throw new DrizzleAdapterError(`Failed to count rows in ${getTableName(table)}: ${errorMessage(error)}`);
  }
}

/**
 * Write rows positioned by `schema` into the named table. Fields are
 * matched to the target's columns by name, ignoring case.
 */
async function saveRows(
  target: IDrizzleSessionOptions,
  name: string,
  schema: SchemaDescriptor,
  rows: readonly StorageRow[],
  mode: SaveMode
): Promise<void> {
  const table = findTable(target.tables, name);
  const columns = Object.entries(getTableColumns(table));
  const keys = schema.map(field => {
    const match = columns.find(([, column]) => column.name.toLowerCase() === field.name.toLowerCase());
    if (!match) {
      throw new DrizzleAdapterError(`Column ${field.name} not found in table ${name}`);
    }
    return match[0];
  });

  if (mode === 'errorIfExists' || mode === 'ignore') {
    if ((await countRows(target.db, table)) > 0) {
      if (mode === 'ignore') {
        return;
      }
      throw new DrizzleAdapterError(`Table ${name} already exists`);
    }
  }

  try {
    if (mode === 'overwrite') {
      await target.db.delete(table);
    }
    if (rows.length > 0) {
      await target.db
        .insert(table)
        .values(rows.map(row => Object.fromEntries(keys.map((key, index) => [key, toDriverValue(row[index])]))));
    }
  } catch (error) {
    throw new DrizzleAdapterError(`Failed to save rows to ${name}: ${errorMessage(error)}`);
  }
}

/**
 * A drizzle table reached through a database instance
 */
export class DrizzleTableHandle implements ITableHandle<Column> {
  /**
   * @param tables - Tables `saveAsTable` may write to, by name
   */
  constructor(
    private readonly db: IDrizzleDatabase,
    private readonly table: Table,
    private readonly tables: Record<string, Table> = {}
  ) {}

  /**
   * Schema from the table's column definitions, in declaration order
   */
  public schema(): SchemaDescriptor {
    return Object.values(getTableColumns(this.table)).map(column => ({
      name: column.name,
      type: columnDataType(column),
      nullable: !column.notNull
    }));
  }

  public columnRef(name: string): Column {
    const column = Object.values(getTableColumns(this.table)).find(candidate => candidate.name === name);
    if (!column) {
      throw new DrizzleAdapterError(`Column ${name} not found in table ${getTableName(this.table)}`);
    }
    return column;
  }

  public async collect(options: ICollectOptions = {}): Promise<StorageRow[]> {
    const columns = Object.entries(getTableColumns(this.table));

    try {
      let query = this.db.select().from(this.table);
      if (options.limit !== undefined) {
        query = query.limit(options.limit);
      }

      const result = await query;
      return result.map(record =>
        columns.map(([key, column]) => fromDriverValue(readProperty(record, key), columnDataType(column)))
      );
    } catch (error) {
      throw new DrizzleAdapterError(
        `Failed to collect rows from ${getTableName(this.table)}: ${errorMessage(error)}`
      );
    }
  }

  public async count(): Promise<number> {
    return countRows(this.db, this.table);
  }

  public async saveAsTable(name: string, mode: SaveMode): Promise<void> {
    const rows = await this.collect();
    await saveRows({ db: this.db, tables: this.tables }, name, this.schema(), rows, mode);
  }

  public toString(): string {
    return `DrizzleTableHandle(${getTableName(this.table)})`;
  }
}

/**
 * Rows held in memory, with column references as quoted identifiers
 */
export class DrizzleValuesHandle implements ITableHandle<SQLWrapper> {
  private readonly rows: StorageRow[];

  /**
   * @param target - Database and tables `saveAsTable` writes to; values
   * without one cannot be saved
   */
  constructor(
    rows: readonly StorageRow[],
    private readonly fields: SchemaDescriptor,
    private readonly target?: IDrizzleSessionOptions
  ) {
    this.rows = rows.map(row => [...row]);
  }

  public schema(): SchemaDescriptor {
    return this.fields;
  }

  public columnRef(name: string): SQLWrapper {
    if (!this.fields.some(field => field.name === name)) {
      throw new DrizzleAdapterError(`Column ${name} not found in values`);
    }
    return sql.identifier(name);
  }

  public async collect(options: ICollectOptions = {}): Promise<StorageRow[]> {
    const rows = options.limit === undefined ? this.rows : this.rows.slice(0, options.limit);
    return rows.map(row => [...row]);
  }

  public async count(): Promise<number> {
    return this.rows.length;
  }

  public async saveAsTable(name: string, mode: SaveMode): Promise<void> {
    if (!this.target) {
      throw new DrizzleAdapterError(`Cannot save values to ${name}: no database attached`);
    }
    await saveRows(this.target, name, this.fields, this.rows, mode);
  }

  public toString(): string {
    return `DrizzleValuesHandle(${this.rows.length} rows)`;
  }
}

/**
 * Session handle over a drizzle database and its table definitions
 */
export class DrizzleSessionHandle implements ISessionHandle<SQLWrapper> {
  private readonly db: IDrizzleDatabase;
  private readonly tables: Record<string, Table>;

  constructor(options: IDrizzleSessionOptions) {
    if (!options.db) {
      throw new DrizzleAdapterError('Drizzle db instance is required');
    }

    if (!options.tables) {
      throw new DrizzleAdapterError('Table definitions are required');
    }

    this.db = options.db;
    this.tables = options.tables;
  }

  public createRecords(rows: readonly StorageRow[], schema: SchemaDescriptor): DrizzleValuesHandle {
    return new DrizzleValuesHandle(rows, schema, { db: this.db, tables: this.tables });
  }

  public table(name: string): DrizzleTableHandle {
    return new DrizzleTableHandle(this.db, findTable(this.tables, name), this.tables);
  }
}
