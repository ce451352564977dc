/**
 * Name-based view over the columns of a live table
 */

import { ITableHandle } from '../adapters/types';
import { columnKey, normalizeColumnName } from '../columns/normalizer';
import { IKeyMapper } from '../keys/types';
import { UnsupportedOperationError } from './errors';

/**
 * Read-only, map-like access to a table's columns by application key
 *
 * Lookups and iteration go back to the handle's schema every time, so the
 * view always reflects the table as it is now. Column references are
 * never cached.
 *
 * @example
 * ```typescript
 * const employees = session.table('EMPLOYEES');
 *
 * employees.col('salary');   // column reference for SALARY
 * employees.get('salary');   // same
 * employees.get('bonus');    // undefined
 *
 * for (const [key, column] of employees) {
 *   // key is decoded: 'id', 'name', 'salary', ...
 * }
 * ```
 */
export class TableFacade<TColumn = unknown> implements Iterable<[string, TColumn]> {
  constructor(
    public readonly handle: ITableHandle<TColumn>,
    public readonly keyMapper: IKeyMapper
  ) {}

  /**
   * Column reference for an application key, or `undefined` when the
   * table has no such column
   */
  public col(key: string): TColumn | undefined {
    return this.resolve(key);
  }

  /**
   * Map-style lookup; identical to {@link col}
   */
  public get(key: string): TColumn | undefined {
    return this.resolve(key);
  }

  public has(key: string): boolean {
    return this.columnIndex().has(this.keyMapper.encode(key));
  }

  /**
   * Number of columns in the table's current schema
   */
  public get size(): number {
    return this.handle.schema().length;
  }

  /**
   * `[application key, column reference]` pairs in schema order. Every
   * other iteration view is built from this one.
   */
  public *entries(): Generator<[string, TColumn], void, undefined> {
    for (const field of this.handle.schema()) {
      yield [
        this.keyMapper.decode(normalizeColumnName(field.name)),
        this.handle.columnRef(field.name)
      ];
    }
  }

  public *keys(): Generator<string, void, undefined> {
    for (const [key] of this.entries()) {
      yield key;
    }
  }

  public *values(): Generator<TColumn, void, undefined> {
    for (const [, column] of this.entries()) {
      yield column;
    }
  }

  public [Symbol.iterator](): Generator<[string, TColumn], void, undefined> {
    return this.entries();
  }

  public forEach(callback: (column: TColumn, key: string, table: this) => void): void {
    for (const [key, column] of this.entries()) {
      callback(column, key, this);
    }
  }

  public set(key: string, _column: TColumn): never {
    throw new UnsupportedOperationError(`Cannot set column "${key}": tables are read-only views`);
  }

  public delete(key: string): never {
    throw new UnsupportedOperationError(`Cannot delete column "${key}": tables are read-only views`);
  }

  public clear(): never {
    throw new UnsupportedOperationError('Cannot clear columns: tables are read-only views');
  }

  /**
   * Whether both views wrap the same handle with the same key mapping
   */
  public equals(other: TableFacade<unknown>): boolean {
    return (
      this.handle === other.handle &&
      this.keyMapper.encode === other.keyMapper.encode &&
      this.keyMapper.decode === other.keyMapper.decode
    );
  }

  public get [Symbol.toStringTag](): string {
    return 'TableFacade';
  }

  public toString(): string {
    return `TableFacade(${String(this.handle)})`;
  }

  /**
   * Normalized column name → name as the engine reports it. Quoted names
   * that do not normalize have no entry and cannot be looked up.
   */
  private columnIndex(): Map<string, string> {
    const index = new Map<string, string>();
    for (const field of this.handle.schema()) {
      const normalized = columnKey(field.name);
      if (normalized !== undefined && !index.has(normalized)) {
        index.set(normalized, field.name);
      }
    }
    return index;
  }

  private resolve(key: string): TColumn | undefined {
    const name = this.columnIndex().get(this.keyMapper.encode(key));
    return name === undefined ? undefined : this.handle.columnRef(name);
  }
}
