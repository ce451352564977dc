import { z } from 'zod';
import { ISessionHandle, ITableHandle } from '../adapters/types';
import { recordsToRows } from '../convert';
import { IKeyMapper } from '../keys/types';
import { ITableKitLogger } from '../logger/types';
import { deriveSchema } from '../schema/derivation';
import { EmptyInputError } from '../schema/errors';
import { inferSchema } from '../schema/inference';
import { SchemaDescriptor, fieldNames } from '../schema/types';
import { TableFacade } from '../table/facade';
import { AppRecord } from '../values/types';
import { ITableKitOptions, IResolvedTableKitOptions, resolveTableKitOptions } from './options';

/**
 * A session handle paired with the key mapping and logger every table it
 * produces will use
 *
 * @example
 * ```typescript
 * const session = new TableKitSession(handle, { keys: identityKeyMapper });
 *
 * const people = session.createTable([
 *   { id: 1, name: 'Ada' },
 *   { id: 2, name: 'Grace', team: 'compilers' }
 * ]);
 * ```
 */
export class TableKitSession<TColumn = unknown> {
  private readonly options: IResolvedTableKitOptions;

  constructor(
    private readonly handle: ISessionHandle<TColumn>,
    options: ITableKitOptions = {}
  ) {
    this.options = resolveTableKitOptions(options);
  }

  public get keys(): IKeyMapper {
    return this.options.keys;
  }

  public get logger(): ITableKitLogger {
    return this.options.logger;
  }

  /**
   * Infer a schema from records using this session's key mapping
   */
  public inferSchema(records: readonly AppRecord[]): SchemaDescriptor {
    return inferSchema(records, this.keys.encode);
  }

  /**
   * Derive a schema from a zod object schema using this session's key
   * mapping
   */
  public deriveSchema(type: z.ZodTypeAny): SchemaDescriptor {
    return deriveSchema(type, this.keys.encode);
  }

  /**
   * Create a table holding `records`
   *
   * @param records - Records to store
   * @param schema - Explicit schema; inferred from the first record when
   * omitted
   * @throws {EmptyInputError} If `records` is empty
   */
  public createTable(records: readonly AppRecord[], schema?: SchemaDescriptor): TableFacade<TColumn> {
    if (records.length === 0) {
      throw new EmptyInputError('Cannot create a table from empty data');
    }

    const fields = schema ?? this.inferSchema(records);
    this.warnOnIgnoredKeys(records, fields);

    const rows = recordsToRows(records, fields, this.keys.encode);
    this.logger.debug('Creating table from records', {
      rows: rows.length,
      fields: fieldNames(fields),
      inferred: schema === undefined
    });

    return this.wrap(this.handle.createRecords(rows, fields));
  }

  /**
   * Open an existing table by its storage name
   */
  public table(name: string): TableFacade<TColumn> {
    this.logger.debug('Opening table', { table: name });
    return this.wrap(this.handle.table(name));
  }

  /**
   * View a table handle through this session's key mapping
   */
  public wrap(table: ITableHandle<TColumn>): TableFacade<TColumn> {
    return new TableFacade(table, this.keys);
  }

  /**
   * Close the underlying session handle, if it supports closing
   */
  public async close(): Promise<void> {
    if (this.handle.close) {
      await this.handle.close();
      this.logger.debug('Session closed');
    }
  }

  /**
   * Keys that have no column in the schema are dropped on write. Report
   * them once per table rather than once per record.
   */
  private warnOnIgnoredKeys(records: readonly AppRecord[], schema: SchemaDescriptor): void {
    const columns = new Set(schema.map(field => field.name.toLowerCase()));
    const ignored = new Set<string>();

    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!columns.has(this.keys.encode(key).toLowerCase())) {
          ignored.add(key);
        }
      }
    }

    if (ignored.size > 0) {
      this.logger.warn('Record keys with no matching column were ignored', {
        keys: [...ignored]
      });
    }
  }
}

