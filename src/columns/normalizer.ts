import { IParsedColumnName } from './types';

/**
 * Error thrown for quoted column names other than aggregate expressions
 */
export class UnsupportedColumnNameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedColumnNameError';
  }
}

const QUOTED_NAME = /^"(.*)"$/s;
const AGGREGATE_NAME = /^(\w+)\((.+)\)$/s;

/**
 * Split a column name by whether it is wrapped in double quotes
 *
 * @example
 * ```typescript
 * parseColumnName('DEPT');            // { raw: 'DEPT', unquoted: 'DEPT' }
 * parseColumnName('"COUNT(DEPT)"');   // { raw: '"COUNT(DEPT)"', quoted: 'COUNT(DEPT)' }
 * ```
 */
export function parseColumnName(raw: string): IParsedColumnName;
export function parseColumnName(raw: null | undefined): undefined;
export function parseColumnName(raw: string | null | undefined): IParsedColumnName | undefined;
export function parseColumnName(raw: string | null | undefined): IParsedColumnName | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }

  const match = QUOTED_NAME.exec(raw);
  return match ? { raw, quoted: match[1] } : { raw, unquoted: raw };
}

/**
 * Record key for a column name, or `undefined` when the name is quoted
 * and not an aggregate expression
 */
export function columnKey(raw: string): string | undefined {
  const parsed = parseColumnName(raw);
  if (parsed.unquoted !== undefined) {
    return parsed.unquoted;
  }

  const aggregate = AGGREGATE_NAME.exec(parsed.quoted ?? '');
  return aggregate ? `${aggregate[1]}-${aggregate[2]}` : undefined;
}

/**
 * Reduce a column name to a single token usable as a record key
 *
 * Engines name computed columns with a quoted expression such as
 * `"COUNT(DEPT)"`; these become `COUNT-DEPT`. Unquoted names are returned
 * as they are.
 *
 * @throws {UnsupportedColumnNameError} For any other quoted name, e.g.
 * `"DEPT"`
 */
export function normalizeColumnName(raw: string): string;
export function normalizeColumnName(raw: null | undefined): undefined;
export function normalizeColumnName(raw: string | null | undefined): string | undefined;
export function normalizeColumnName(raw: string | null | undefined): string | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }

  const key = columnKey(raw);
  if (key === undefined) {
    throw new UnsupportedColumnNameError(`Quoted column names are not supported: ${raw}`);
  }
  return key;
}
