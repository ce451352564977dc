/**
 * TableKit Handle Types
 *
 * Handles connect TableKit to a storage engine or a library like Drizzle
 * ORM. TableKit never opens connections itself; it only talks to the
 * handles it is given.
 */

import { SchemaDescriptor } from '../schema/types';
import { StorageRow } from '../values/types';

/**
 * Options for reading rows from a table handle
 */
export interface ICollectOptions {
  /**
   * Maximum number of rows to return
   */
  limit?: number;
}

/**
 * What saving does when the target table already holds rows
 *
 * - `overwrite`: replace its rows
 * - `append`: add to its rows
 * - `errorIfExists`: fail
 * - `ignore`: leave it untouched and write nothing
 */
export type SaveMode = 'overwrite' | 'append' | 'errorIfExists' | 'ignore';

/**
 * A table living in the storage engine
 */
export interface ITableHandle<TColumn = unknown> {
  /**
   * The table's current schema, read fresh on every call
   */
  schema(): SchemaDescriptor;

  /**
   * A reference to one column
   *
   * @param name Storage column name, exactly as `schema()` reports it
   */
  columnRef(name: string): TColumn;

  /**
   * Fetch rows, positioned by `schema()`
   */
  collect(options?: ICollectOptions): Promise<StorageRow[]>;

  /**
   * Number of rows in the table
   */
  count(): Promise<number>;

  /**
   * Write this table's rows into the named table
   */
  saveAsTable(name: string, mode: SaveMode): Promise<void>;
}

/**
 * A connection to the storage engine
 */
export interface ISessionHandle<TColumn = unknown> {
  /**
   * Create a table holding the given rows
   */
  createRecords(rows: readonly StorageRow[], schema: SchemaDescriptor): ITableHandle<TColumn>;

  /**
   * Look up an existing table by name
   */
  table(name: string): ITableHandle<TColumn>;

  /**
   * Release the connection
   */
  close?(): Promise<void>;
}
