import { EventId } from './vos/EventId';
import { Timestamp } from './vos/Timestamp';
import { TracingCarrier } from './TracingCarrier';

/**
 * Immutable identity of an event: set once when the event is created.
 */
export type EventHeader = Readonly<{
  id: EventId;
  timestamp: Timestamp;
  metadata: Readonly<Record<string, string>>;
}>;

/**
 * Header and tracing overrides. Aggregates leave both unset; decoders
 * pass the stored values when rebuilding an event read from the outbox.
 */
export type EventEnvelope = Readonly<{
  header?: EventHeader;
  tracing?: TracingCarrier;
}>;

export function createEventHeader(
  timestamp: Timestamp,
  metadata: Readonly<Record<string, string>> = {}
): EventHeader {
  return Object.freeze({
    id: EventId.create(),
    timestamp,
    metadata: Object.freeze({ ...metadata }),
  });
}

/**
 * Base class for all domain events.
 *
 * Domain events are immutable facts describing one completed transition.
 * Each concrete event declares its discriminant `eventType` and the
 * `streamName` the outbox files it under, and carries only the fields the
 * transition produced. Subclasses freeze themselves once their own fields
 * are assigned.
 */
export abstract class DomainEvent<TType extends string = string> {
  abstract readonly eventType: TType;
  abstract readonly streamName: string;

  readonly header: EventHeader;
  readonly tracing: TracingCarrier;

  protected constructor(occurredAt: Timestamp, envelope: EventEnvelope = {}) {
    this.header = envelope.header ?? createEventHeader(occurredAt);
    this.tracing = envelope.tracing ?? TracingCarrier.propagate();
  }

  get eventId(): EventId {
    return this.header.id;
  }

  get occurredAt(): Timestamp {
    return this.header.timestamp;
  }
}
