import { ValueObject } from './ValueObject';

/**
 * Value object representing a point in time.
 *
 * Canonical representation is epoch milliseconds. Storage adapters
 * convert through `toDate`/`fromDate`; events serialize the number.
 */
export class Timestamp extends ValueObject<number> {
  private constructor(private readonly _value: number) {
    super();
  }

  static now(): Timestamp {
    return new Timestamp(Date.now());
  }

  static fromMillis(value: number): Timestamp {
    if (!Number.isFinite(value)) {
      throw new Error('Timestamp must be a finite number of milliseconds');
    }
    return new Timestamp(value);
  }

  static fromISOString(iso: string): Timestamp {
    const ms = new Date(iso).getTime();
    if (Number.isNaN(ms)) {
      throw new Error('Timestamp is not a valid ISO date');
    }
    return new Timestamp(ms);
  }

  static fromDate(date: Date): Timestamp {
    const ms = date.getTime();
    if (Number.isNaN(ms)) {
      throw new Error('Timestamp is not a valid date');
    }
    return new Timestamp(ms);
  }

  plus(ms: number): Timestamp {
    return Timestamp.fromMillis(this._value + ms);
  }

  /** Drops the sub-second part, the precision validity windows compare at. */
  truncatedToSecond(): Timestamp {
    return new Timestamp(Math.floor(this._value / 1000) * 1000);
  }

  toISOString(): string {
    return new Date(this._value).toISOString();
  }

  toDate(): Date {
    return new Date(this._value);
  }

  isBefore(other: Timestamp): boolean {
    return this._value < other._value;
  }

  isAfter(other: Timestamp): boolean {
    return this._value > other._value;
  }

  override equals(other: Timestamp): boolean {
    return this._value === other._value;
  }

  override toString(): string {
    return this.toISOString();
  }

  get value(): number {
    return this._value;
  }
}
