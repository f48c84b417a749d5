import { ValueObject } from './ValueObject';
import { ValidationError } from '../errors';
import { NIL_UUID, isUuid } from '../../utils/uuid';

/**
 * Base class for UUID identifiers.
 *
 * Values are kept in canonical lowercase form so that string equality
 * matches identifier equality. The nil UUID is representable and reported
 * by `isZero()`; it is how storage rows express "not set".
 */
export abstract class Identifier extends ValueObject<string> {
  private readonly _value: string;

  protected constructor(value: string, label: string) {
    super();
    if (!isUuid(value)) {
      throw ValidationError.single(label, 'must be a valid UUID');
    }
    this._value = value.toLowerCase();
  }

  get value(): string {
    return this._value;
  }

  isZero(): boolean {
    return this._value === NIL_UUID;
  }

  override toString(): string {
    return this._value;
  }
}
