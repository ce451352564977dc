import { DataTypes, SchemaDescriptor } from '../schema/types';
import { Decimal } from '../values/decimal';
import { LocalDate } from '../values/local-date';
import { AppRecord, StorageRow } from '../values/types';
import {
  RowShapeError,
  recordToRow,
  recordsToRows,
  rowToRecord,
  rowsToRecords,
  toStorageValue
} from './index';

const encode = (key: string): string => key.toUpperCase();
const decode = (name: string): string => name.toLowerCase();

const employeeSchema: SchemaDescriptor = [
  { name: 'ID', type: DataTypes.Integer, nullable: false },
  { name: 'NAME', type: DataTypes.String, nullable: false },
  { name: 'DEPARTMENT', type: DataTypes.String, nullable: false },
  { name: 'SALARY', type: DataTypes.Integer, nullable: false },
  { name: 'AGE', type: DataTypes.Integer, nullable: true }
];

describe('toStorageValue', () => {
  it('should turn symbols into their description', () => {
    expect(toStorageValue(Symbol('active'))).toBe('active');
    expect(toStorageValue(Symbol.for('status'))).toBe('status');
    expect(toStorageValue(Symbol())).toBe('');
  });

  it('should pass other scalars through', () => {
    const hired = new LocalDate(2019, 7, 1);
    const price = new Decimal('9.99');
    const at = new Date('2024-01-01T00:00:00Z');

    expect(toStorageValue(42)).toBe(42);
    expect(toStorageValue('text')).toBe('text');
    expect(toStorageValue(true)).toBe(true);
    expect(toStorageValue(10n)).toBe(10n);
    expect(toStorageValue(hired)).toBe(hired);
    expect(toStorageValue(price)).toBe(price);
    expect(toStorageValue(at)).toBe(at);
  });

  it('should turn undefined into null', () => {
    expect(toStorageValue(undefined)).toBeNull();
  });
});

describe('recordToRow', () => {
  it('should position values by schema order', () => {
    const row = recordToRow(
      { salary: 70000, name: 'Alice', id: 1, department: 'Engineering', age: 25 },
      employeeSchema,
      encode
    );

    expect(row).toEqual([1, 'Alice', 'Engineering', 70000, 25]);
  });

  it('should fill missing optional keys with null', () => {
    const row = recordToRow({ id: 2, name: 'Bob', department: 'Sales', salary: 60000 }, employeeSchema, encode);

    expect(row).toEqual([2, 'Bob', 'Sales', 60000, null]);
  });

  it('should treat undefined values as missing', () => {
    const row = recordToRow({ id: 3, age: undefined }, employeeSchema, encode);

    expect(row).toEqual([3, null, null, null, null]);
  });

  it('should ignore keys that are not in the schema', () => {
    const row = recordToRow(
      { id: 1, name: 'Alice', department: 'Sales', salary: 50000, extra: 'not-in-schema' },
      employeeSchema,
      encode
    );

    expect(row).toHaveLength(5);
    expect(row).toEqual([1, 'Alice', 'Sales', 50000, null]);
  });

  it('should match encoded keys to field names ignoring case', () => {
    const schema: SchemaDescriptor = [{ name: 'Id', type: DataTypes.Integer, nullable: false }];

    expect(recordToRow({ id: 9 }, schema, key => key)).toEqual([9]);
  });

  it('should convert symbolic values to strings', () => {
    const schema: SchemaDescriptor = [{ name: 'STATUS', type: DataTypes.String, nullable: true }];

    expect(recordToRow({ status: Symbol('active') }, schema, encode)).toEqual(['active']);
  });

  it('should apply the encode it is given rather than a default', () => {
    const schema: SchemaDescriptor = [
      { name: 'col_id', type: DataTypes.Integer, nullable: false },
      { name: 'ID', type: DataTypes.Integer, nullable: true }
    ];

    expect(recordToRow({ id: 5 }, schema, key => `col_${key}`)).toEqual([5, null]);
  });

  it('should produce one slot per field for an empty schema', () => {
    expect(recordToRow({ id: 1 }, [], encode)).toEqual([]);
  });
});

describe('rowToRecord', () => {
  it('should key values through decode', () => {
    const record = rowToRecord([1, 'Alice', 'Engineering', 70000, 25], employeeSchema, decode);

    expect(record).toEqual({ id: 1, name: 'Alice', department: 'Engineering', salary: 70000, age: 25 });
  });

  it('should omit null slots instead of writing null', () => {
    const record = rowToRecord([2, 'Bob', 'Sales', 60000, null], employeeSchema, decode);

    expect(record).toEqual({ id: 2, name: 'Bob', department: 'Sales', salary: 60000 });
    expect(Object.keys(record)).not.toContain('age');
    expect('age' in record).toBe(false);
  });

  it('should apply the decode it is given rather than a default', () => {
    const record = rowToRecord([1, 'Alice', 'Sales', 1, 2], employeeSchema, name => name);

    expect(Object.keys(record)).toEqual(['ID', 'NAME', 'DEPARTMENT', 'SALARY', 'AGE']);
  });

  it('should keep falsy values that are not null', () => {
    const schema: SchemaDescriptor = [
      { name: 'ZERO', type: DataTypes.Integer, nullable: true },
      { name: 'EMPTY', type: DataTypes.String, nullable: true },
      { name: 'OFF', type: DataTypes.Boolean, nullable: true }
    ];

    expect(rowToRecord([0, '', false], schema, decode)).toEqual({ zero: 0, empty: '', off: false });
  });

  it('should keep a value whose key decodes to __proto__', () => {
    const schema: SchemaDescriptor = [{ name: '__PROTO__', type: DataTypes.String, nullable: true }];

    const record = rowToRecord(['v'], schema, name => name.toLowerCase());

    expect(Object.keys(record)).toEqual(['__proto__']);
    expect(Object.getOwnPropertyDescriptor(record, '__proto__')?.value).toBe('v');
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
  });

  it('should reject rows whose length differs from the schema', () => {
    expect(() => rowToRecord([1, 'Alice'], employeeSchema, decode)).toThrow(RowShapeError);
    expect(() => rowToRecord([1, 'Alice'], employeeSchema, decode)).toThrow(
      'Row has 2 values but the schema has 5 fields'
    );
  });
});

describe('batch conversion', () => {
  const employees: AppRecord[] = [
    { id: 1, name: 'Alice', department: 'Engineering', salary: 70000, age: 25 },
    { id: 2, name: 'Bob', department: 'Engineering', salary: 80000 },
    { id: 3, name: 'Charlie', department: 'Sales', salary: 60000, age: 35 }
  ];

  it('should convert records to rows one to one, in order', () => {
    expect(recordsToRows(employees, employeeSchema, encode)).toEqual([
      [1, 'Alice', 'Engineering', 70000, 25],
      [2, 'Bob', 'Engineering', 80000, null],
      [3, 'Charlie', 'Sales', 60000, 35]
    ]);
  });

  it('should convert rows to records one to one, in order', () => {
    const rows: StorageRow[] = [
      [3, 'Charlie', 'Sales', 60000, null],
      [1, 'Alice', 'Engineering', 70000, 25]
    ];

    expect(rowsToRecords(rows, employeeSchema, decode)).toEqual([
      { id: 3, name: 'Charlie', department: 'Sales', salary: 60000 },
      { id: 1, name: 'Alice', department: 'Engineering', salary: 70000, age: 25 }
    ]);
  });

  it('should handle empty batches', () => {
    expect(recordsToRows([], employeeSchema, encode)).toEqual([]);
    expect(rowsToRecords([], employeeSchema, decode)).toEqual([]);
  });

  it('should reproduce records exactly through a round trip', () => {
    const rows = recordsToRows(employees, employeeSchema, encode);

    expect(rowsToRecords(rows, employeeSchema, decode)).toEqual(employees);
  });

  it('should round-trip every scalar kind with identity mapping', () => {
    const schema: SchemaDescriptor = [
      { name: 'count', type: DataTypes.Integer, nullable: true },
      { name: 'ratio', type: DataTypes.Double, nullable: true },
      { name: 'price', type: DataTypes.decimal(10, 2), nullable: true },
      { name: 'active', type: DataTypes.Boolean, nullable: true },
      { name: 'hired', type: DataTypes.Date, nullable: true },
      { name: 'seen', type: DataTypes.Timestamp, nullable: true },
      { name: 'label', type: DataTypes.String, nullable: true }
    ];
    const record: AppRecord = {
      count: 3,
      ratio: 0.25,
      price: new Decimal('12.50'),
      active: false,
      hired: new LocalDate(2018, 11, 5),
      seen: new Date('2023-06-01T12:00:00Z'),
      label: 'x'
    };
    const identity = (name: string): string => name;

    expect(rowToRecord(recordToRow(record, schema, identity), schema, identity)).toEqual(record);
  });
});
