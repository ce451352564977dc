import {
  UnsupportedColumnNameError,
  columnKey,
  normalizeColumnName,
  parseColumnName
} from './normalizer';

describe('parseColumnName', () => {
  it('should return the unquoted name verbatim', () => {
    expect(parseColumnName('DEPT')).toEqual({ raw: 'DEPT', unquoted: 'DEPT' });
  });

  it('should return the interior of a quoted aggregate name', () => {
    const parsed = parseColumnName('"COUNT(DEPT)"');

    expect(parsed).toEqual({ raw: '"COUNT(DEPT)"', quoted: 'COUNT(DEPT)' });
    expect(parsed.unquoted).toBeUndefined();
  });

  it('should return the interior of a quoted plain identifier', () => {
    expect(parseColumnName('"DEPT"')).toEqual({ raw: '"DEPT"', quoted: 'DEPT' });
  });

  it('should treat the empty string as unquoted', () => {
    expect(parseColumnName('')).toEqual({ raw: '', unquoted: '' });
  });

  it('should treat a lone quote as unquoted', () => {
    expect(parseColumnName('"')).toEqual({ raw: '"', unquoted: '"' });
  });

  it('should return undefined for null and undefined', () => {
    expect(parseColumnName(null)).toBeUndefined();
    expect(parseColumnName(undefined)).toBeUndefined();
  });
});

describe('normalizeColumnName', () => {
  it('should pass unquoted names through', () => {
    expect(normalizeColumnName('DEPT')).toBe('DEPT');
    expect(normalizeColumnName('EMPLOYEE_ID')).toBe('EMPLOYEE_ID');
  });

  it('should turn quoted aggregates into WORD-ARGS', () => {
    expect(normalizeColumnName('"COUNT(DEPT)"')).toBe('COUNT-DEPT');
    expect(normalizeColumnName('"AVG(SALARY)"')).toBe('AVG-SALARY');
    expect(normalizeColumnName('"SUM(AMOUNT)"')).toBe('SUM-AMOUNT');
    expect(normalizeColumnName('"MAX(HIRED_ON)"')).toBe('MAX-HIRED_ON');
  });

  it('should reject quoted plain identifiers', () => {
    expect(() => normalizeColumnName('"DEPT"')).toThrow(UnsupportedColumnNameError);
    expect(() => normalizeColumnName('"DEPT"')).toThrow(
      'Quoted column names are not supported: "DEPT"'
    );
  });

  it('should reject malformed aggregates', () => {
    expect(() => normalizeColumnName('"COUNT"')).toThrow(UnsupportedColumnNameError);
    expect(() => normalizeColumnName('"COUNT()"')).toThrow(UnsupportedColumnNameError);
    expect(() => normalizeColumnName('""')).toThrow(UnsupportedColumnNameError);
  });

  it('should map null and undefined to undefined', () => {
    expect(normalizeColumnName(null)).toBeUndefined();
    expect(normalizeColumnName(undefined)).toBeUndefined();
  });

  it('should map the empty string to the empty string', () => {
    expect(normalizeColumnName('')).toBe('');
  });
});

describe('columnKey', () => {
  it('should match normalizeColumnName for supported names', () => {
    expect(columnKey('DEPT')).toBe('DEPT');
    expect(columnKey('"COUNT(DEPT)"')).toBe('COUNT-DEPT');
  });

  it('should return undefined for unsupported quoted names', () => {
    expect(columnKey('"Dept"')).toBeUndefined();
    expect(columnKey('""')).toBeUndefined();
  });
});
