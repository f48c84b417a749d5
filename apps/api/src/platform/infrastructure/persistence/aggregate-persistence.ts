import {
  AlreadyExistsError,
  isPersistableError,
  type AnyDomainEvent,
  type DomainError,
  type RecordsEvents,
} from '@campus-id/domain';
import { OutboxPublisher } from '../../application/ports/outbox-publisher';
import { TransactionRunner } from '../../application/ports/transaction-runner';
import { asUniqueViolation, type UniqueViolation } from './postgres-errors';

export type AggregatePersistence<Tx> = Readonly<{
  runner: TransactionRunner<Tx>;
  outbox: OutboxPublisher<Tx>;
}>;

type Aggregate = RecordsEvents<AnyDomainEvent>;

/**
 * Inserts a new aggregate and its recorded events in one transaction.
 *
 * The buffer is cleared only after commit. A unique violation becomes
 * `onConflict(violation)`, an `AlreadyExistsError` unless overridden.
 */
export async function saveAggregate<Tx, A extends Aggregate>(
  persistence: AggregatePersistence<Tx>,
  params: Readonly<{
    aggregate: A;
    write: (tx: Tx, aggregate: A) => Promise<void>;
    onConflict?: (violation: UniqueViolation, cause: unknown) => Error;
    signal?: AbortSignal;
  }>
): Promise<void> {
  const { aggregate, signal } = params;
  try {
    await persistence.runner.run(
      async (tx) => {
        await params.write(tx, aggregate);
        await persistence.outbox.publish(tx, aggregate.getUncommittedEvents());
        signal?.throwIfAborted();
      },
      { signal }
    );
  } catch (error) {
    const violation = asUniqueViolation(error);
    if (violation) {
      throw params.onConflict
        ? params.onConflict(violation, error)
        : new AlreadyExistsError('Resource already exists', error);
    }
    throw error;
  }
  aggregate.markEventsAsCommitted();
}

/**
 * Loads an aggregate inside a transaction, applies `mutate`, and writes the
 * new state together with the recorded events.
 *
 * A non-persistable error from `mutate` rolls everything back. A
 * persistable one is committed with the state and events, then rethrown.
 * Cancellation is checked before the write and again before commit.
 */
export async function updateAggregate<Tx, A extends Aggregate>(
  persistence: AggregatePersistence<Tx>,
  params: Readonly<{
    load: (tx: Tx) => Promise<A | null>;
    mutate: (aggregate: A) => void | Promise<void>;
    write: (tx: Tx, aggregate: A) => Promise<void>;
    notFound: () => Error;
    signal?: AbortSignal;
  }>
): Promise<A> {
  const { signal } = params;

  const { aggregate, deferred } = await persistence.runner.run(
    async (tx) => {
      const loaded = await params.load(tx);
      if (loaded === null) {
        throw params.notFound();
      }

      let deferredError: DomainError | null = null;
      try {
        await params.mutate(loaded);
      } catch (error) {
        if (!isPersistableError(error)) {
          throw error;
        }
        deferredError = error;
      }

      signal?.throwIfAborted();
      await params.write(tx, loaded);
      await persistence.outbox.publish(tx, loaded.getUncommittedEvents());
      signal?.throwIfAborted();
      return { aggregate: loaded, deferred: deferredError };
    },
    { signal }
  );

  aggregate.markEventsAsCommitted();
  if (deferred) {
    throw deferred;
  }
  return aggregate;
}
