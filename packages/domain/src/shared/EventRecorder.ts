import type { DomainEvent } from './DomainEvent';

/**
 * Buffer of events produced by one use-case invocation.
 *
 * Owned by an aggregate; the aggregate appends as it transitions and
 * persistence reads the buffer inside its transaction. Clearing happens only
 * after the transaction commits, through `RecordsEvents.markEventsAsCommitted`.
 */
export class EventRecorder<E extends DomainEvent> {
  private events: E[] = [];

  record(event: E): void {
    this.events.push(event);
  }

  getUncommittedEvents(): ReadonlyArray<E> {
    return [...this.events];
  }

  clear(): void {
    this.events = [];
  }
}

/**
 * What persistence needs from an aggregate to flush its events.
 */
export interface RecordsEvents<E extends DomainEvent = DomainEvent> {
  getUncommittedEvents(): ReadonlyArray<E>;
  markEventsAsCommitted(): void;
}
