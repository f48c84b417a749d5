import { Injectable } from '@nestjs/common';
import { sql } from 'kysely';
import type { AnyDomainEvent, StreamName } from '@campus-id/domain';
import { OutboxPublisher } from '../../application/ports/outbox-publisher';
import type { KyselyTx } from '../persistence/kysely-transaction.runner';
import { EventCodec } from '../../application/events/event-codec';

const groupByStream = (
  events: ReadonlyArray<AnyDomainEvent>
): Map<StreamName, AnyDomainEvent[]> => {
  const grouped = new Map<StreamName, AnyDomainEvent[]>();
  for (const event of events) {
    const bucket = grouped.get(event.streamName);
    if (bucket) {
      bucket.push(event);
    } else {
      grouped.set(event.streamName, [event]);
    }
  }
  return grouped;
};

/**
 * Appends events to `outbox_events` inside the caller's transaction.
 *
 * Offsets are dense per stream. Writers to the same stream serialize on a
 * transaction-scoped advisory lock keyed by the stream name, so the
 * `max + 1` read cannot race.
 */
@Injectable()
export class KyselyOutboxPublisher extends OutboxPublisher<KyselyTx> {
  async publish(
    tx: KyselyTx,
    events: ReadonlyArray<AnyDomainEvent>
  ): Promise<void> {
    if (events.length === 0) return;

    for (const [streamName, streamEvents] of groupByStream(events)) {
      await sql`select pg_advisory_xact_lock(hashtext(${streamName}))`.execute(
        tx
      );
      const headRow = await tx
        .selectFrom('outbox_events')
        .select(({ fn, val }) =>
          fn.coalesce(fn.max<number>('stream_offset'), val(0)).as('head')
        )
        .where('stream_name', '=', streamName)
        .executeTakeFirst();
      const head = Number(headRow?.head ?? 0);

      await tx
        .insertInto('outbox_events')
        .values(
          streamEvents.map((event, index) => {
            const encoded = EventCodec.encode(event);
            return {
              stream_name: encoded.streamName,
              stream_offset: head + index + 1,
              event_id: encoded.eventId,
              event_type: encoded.eventType,
              payload: JSON.stringify(encoded.payload),
              created_at: encoded.occurredAt,
            };
          })
        )
        .execute();
    }
  }
}
