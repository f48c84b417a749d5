/**
 * Base class for immutable value objects.
 *
 * Concrete value objects expose their canonical representation via
 * `value`; equality is structural on that representation.
 */
export abstract class ValueObject<TValue> {
  abstract get value(): TValue;

  equals(other: ValueObject<TValue>): boolean {
    return Object.is(this.value, other.value);
  }

  toString(): string {
    const v: unknown = this.value;
    if (typeof v === 'string') return v;
    return JSON.stringify(v);
  }
}
