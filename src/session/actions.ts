/**
 * Eager table operations
 */

import { ICollectOptions, SaveMode } from '../adapters/types';
import { rowsToRecords } from '../convert';
import { TableFacade } from '../table/facade';
import { AppRecord } from '../values/types';

/**
 * Fetch a table's rows as records, keyed through the table's decoder
 *
 * Null columns are left out of each record.
 */
export async function collect<TColumn>(
  table: TableFacade<TColumn>,
  options?: ICollectOptions
): Promise<AppRecord[]> {
  const rows = await table.handle.collect(options);
  return rowsToRecords(rows, table.handle.schema(), table.keyMapper.decode);
}

/**
 * Fetch at most `n` records
 */
export async function take<TColumn>(table: TableFacade<TColumn>, n: number): Promise<AppRecord[]> {
  return collect(table, { limit: n });
}

/**
 * Number of rows in a table
 */
export async function count<TColumn>(table: TableFacade<TColumn>): Promise<number> {
  return table.handle.count();
}

/**
 * Write a table's rows into the named storage table
 *
 * @param mode - What to do when the target already holds rows; fails by
 * default
 *
 * @example
 * ```typescript
 * const hires = session.createTable([{ id: 7, name: 'Ada' }]);
 * await saveAsTable(hires, 'employees', 'append');
 * ```
 */
export async function saveAsTable<TColumn>(
  table: TableFacade<TColumn>,
  name: string,
  mode: SaveMode = 'errorIfExists'
): Promise<void> {
  return table.handle.saveAsTable(name, mode);
}
