import { InvalidValueError } from './errors';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * A calendar date with no time of day and no zone
 *
 * Storage engines distinguish DATE from TIMESTAMP columns, while a
 * JavaScript `Date` is always an instant. Records carry `LocalDate` for
 * date-only fields and `Date` for timestamps.
 *
 * @example
 * ```typescript
 * const hired = LocalDate.parse('2021-03-14');
 * hired.toString(); // '2021-03-14'
 * ```
 */
export class LocalDate {
  public readonly year: number;
  public readonly month: number;
  public readonly day: number;

  constructor(year: number, month: number, day: number) {
    if (!LocalDate.exists(year, month, day)) {
      throw new InvalidValueError(`Invalid date: ${year}-${month}-${day}`);
    }

    this.year = year;
    this.month = month;
    this.day = day;
  }

  /**
   * Parse an ISO `YYYY-MM-DD` string
   */
  public static parse(value: string): LocalDate {
    const match = ISO_DATE.exec(value);
    if (!match) {
      throw new InvalidValueError(`Invalid date: ${value}`);
    }

    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    if (!LocalDate.exists(year, month, day)) {
      throw new InvalidValueError(`Invalid date: ${value}`);
    }
    return new LocalDate(year, month, day);
  }

  /**
   * The UTC calendar date of an instant
   */
  public static fromDate(date: Date): LocalDate {
    return new LocalDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
  }

  private static exists(year: number, month: number, day: number): boolean {
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
      return false;
    }

    // Out-of-range parts roll over, so compare what comes back.
    // setUTCFullYear keeps years below 100 as given.
    const probe = new Date(0);
    probe.setUTCFullYear(year, month - 1, day);
    return (
      probe.getUTCFullYear() === year &&
      probe.getUTCMonth() === month - 1 &&
      probe.getUTCDate() === day
    );
  }

  public equals(other: LocalDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  public toString(): string {
    const pad = (n: number, width: number): string => String(n).padStart(width, '0');
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  public toJSON(): string {
    return this.toString();
  }
}
