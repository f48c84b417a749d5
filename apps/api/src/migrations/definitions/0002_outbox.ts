import { Kysely, sql } from 'kysely';
import { Database } from '../../platform/infrastructure/database/database.types';

export async function up(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable('outbox_events')
    .addColumn('stream_name', 'varchar(64)', (col) => col.notNull())
    .addColumn('stream_offset', 'bigint', (col) => col.notNull())
    .addColumn('event_id', 'uuid', (col) => col.notNull())
    .addColumn('event_type', 'varchar(128)', (col) => col.notNull())
    .addColumn('payload', 'jsonb', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addPrimaryKeyConstraint('outbox_events_pkey', [
      'stream_name',
      'stream_offset',
    ])
    .addUniqueConstraint('outbox_events_event_id_key', ['event_id'])
    .execute();

  await db.schema
    .createTable('outbox_offsets')
    .addColumn('consumer_group', 'varchar(128)', (col) => col.notNull())
    .addColumn('stream_name', 'varchar(64)', (col) => col.notNull())
    .addColumn('last_offset', 'bigint', (col) => col.notNull().defaultTo(0))
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addPrimaryKeyConstraint('outbox_offsets_pkey', [
      'consumer_group',
      'stream_name',
    ])
    .execute();
}

export async function down(db: Kysely<Database>): Promise<void> {
  await db.schema.dropTable('outbox_offsets').ifExists().execute();
  await db.schema.dropTable('outbox_events').ifExists().execute();
}
