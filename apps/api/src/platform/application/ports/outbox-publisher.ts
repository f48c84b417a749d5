import type { AnyDomainEvent } from '@campus-id/domain';

/**
 * Writes events to the outbox through the caller's transaction, so they
 * become durable exactly when the state change that produced them does.
 */
export abstract class OutboxPublisher<Tx> {
  abstract publish(
    tx: Tx,
    events: ReadonlyArray<AnyDomainEvent>
  ): Promise<void>;
}
