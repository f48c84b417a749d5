import { uuidv4 } from '../../utils/uuid';
import { Identifier } from './Identifier';

/**
 * Unique identifier of a single domain event. Consumers dedupe on it.
 */
export class EventId extends Identifier {
  readonly kind = 'EventId';

  private constructor(value: string) {
    super(value, 'eventId');
  }

  static create(): EventId {
    return new EventId(uuidv4());
  }

  static from(value: string): EventId {
    return new EventId(value);
  }
}
