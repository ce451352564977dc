import { InvalidValueError } from './errors';

const DECIMAL = /^([+-]?)(\d+)(?:\.(\d+))?$/;

/**
 * An arbitrary-precision decimal, carried as its canonical string
 *
 * No arithmetic is offered. The class exists so that NUMERIC/DECIMAL
 * values can travel between records and rows without passing through a
 * binary float.
 */
export class Decimal {
  private readonly text: string;

  /**
   * Number of fractional digits
   */
  public readonly scale: number;

  /**
   * Total number of significant digits
   */
  public readonly precision: number;

  constructor(value: string | bigint) {
    const input = typeof value === 'bigint' ? value.toString() : value.trim();
    const match = DECIMAL.exec(input);
    if (!match) {
      throw new InvalidValueError(`Invalid decimal: ${String(value)}`);
    }

    const integral = match[2].replace(/^0+(?=\d)/, '');
    const fraction = match[3] ?? '';
    const isZero = /^0*$/.test(integral + fraction);
    const sign = match[1] === '-' && !isZero ? '-' : '';

    this.text = fraction ? `${sign}${integral}.${fraction}` : `${sign}${integral}`;
    this.scale = fraction.length;
    this.precision = integral === '0' ? Math.max(fraction.length, 1) : integral.length + fraction.length;
  }

  public equals(other: Decimal): boolean {
    return this.text === other.text;
  }

  public toString(): string {
    return this.text;
  }

  public toJSON(): string {
    return this.text;
  }
}
