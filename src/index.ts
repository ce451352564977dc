/**
 * TableKit - records ↔ rows for tabular storage engines
 *
 * TableKit converts between application records (plain objects keyed by
 * application field names) and the positional rows a storage engine works
 * with, resolves schemas from sample data or zod types, and exposes a
 * table's columns by application key.
 */

// Core exports
import { ISessionHandle } from './adapters';
import { ITableKitOptions, TableKitSession } from './session';

export {
  // Session exports
  TableKitSession,
  ITableKitOptions
};

// Re-export from modules
export * from './adapters';
export * from './columns';
export * from './convert';
export * from './keys';
export * from './logger';
export * from './schema';
export * from './table';
export * from './values';
export {
  DEFAULT_TABLEKIT_OPTIONS,
  IResolvedTableKitOptions,
  resolveTableKitOptions,
  collect,
  take,
  count,
  saveAsTable
} from './session';

/**
 * Create a new TableKit session
 */
export function createSession<TColumn>(
  handle: ISessionHandle<TColumn>,
  options?: ITableKitOptions
): TableKitSession<TColumn> {
  return new TableKitSession<TColumn>(handle, options);
}
