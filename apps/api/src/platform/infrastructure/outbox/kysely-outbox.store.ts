import { Inject, Injectable } from '@nestjs/common';
import {
  OutboxStore,
  type OutboxRecord,
} from '../../application/ports/outbox-store';
import { DatabaseService } from '../database/database.service';

@Injectable()
export class KyselyOutboxStore extends OutboxStore {
  constructor(
    @Inject(DatabaseService) private readonly database: DatabaseService
  ) {
    super();
  }

  async subscribe(streamName: string, consumerGroup: string): Promise<number> {
    await this.database
      .getDb()
      .insertInto('outbox_offsets')
      .values({
        consumer_group: consumerGroup,
        stream_name: streamName,
        last_offset: 0,
        updated_at: new Date(),
      })
      .onConflict((oc) =>
        oc.columns(['consumer_group', 'stream_name']).doNothing()
      )
      .execute();
    return this.currentOffset(streamName, consumerGroup);
  }

  async currentOffset(
    streamName: string,
    consumerGroup: string
  ): Promise<number> {
    const row = await this.database
      .getDb()
      .selectFrom('outbox_offsets')
      .select('last_offset')
      .where('consumer_group', '=', consumerGroup)
      .where('stream_name', '=', streamName)
      .executeTakeFirst();
    return Number(row?.last_offset ?? 0);
  }

  async fetchAfter(
    streamName: string,
    offset: number,
    limit: number
  ): Promise<OutboxRecord[]> {
    const rows = await this.database
      .getDb()
      .selectFrom('outbox_events')
      .select([
        'stream_name',
        'stream_offset',
        'event_id',
        'event_type',
        'payload',
        'created_at',
      ])
      .where('stream_name', '=', streamName)
      .where('stream_offset', '>', String(offset))
      .orderBy('stream_offset', 'asc')
      .limit(limit)
      .execute();

    return rows.map<OutboxRecord>((row) => ({
      streamName: row.stream_name,
      offset: Number(row.stream_offset),
      eventId: row.event_id,
      eventType: row.event_type,
      payload: row.payload,
      createdAt: new Date(row.created_at),
    }));
  }

  async advance(
    streamName: string,
    consumerGroup: string,
    expected: number,
    next: number
  ): Promise<boolean> {
    const result = await this.database
      .getDb()
      .updateTable('outbox_offsets')
      .set({ last_offset: next, updated_at: new Date() })
      .where('consumer_group', '=', consumerGroup)
      .where('stream_name', '=', streamName)
      .where('last_offset', '=', String(expected))
      .executeTakeFirst();
    return Number(result.numUpdatedRows) === 1;
  }
}
