import { Kysely, sql } from 'kysely';
import { Database } from '../../platform/infrastructure/database/database.types';

export async function up(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable('registrations')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('email', 'varchar(254)', (col) => col.notNull())
    .addColumn('status', 'varchar(16)', (col) => col.notNull())
    .addColumn('verification_code', 'varchar(16)', (col) => col.notNull())
    .addColumn('code_attempts', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('code_expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('resend_timeout', 'timestamptz', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addUniqueConstraint('registrations_email_key', ['email'])
    .execute();

  await db.schema
    .createTable('staff_invitations')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('creator_id', 'uuid', (col) => col.notNull())
    .addColumn('code', 'varchar(32)', (col) => col.notNull())
    .addColumn('recipients_email', sql`text[]`, (col) => col.notNull())
    .addColumn('valid_from', 'timestamptz')
    .addColumn('valid_until', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('deleted_at', 'timestamptz')
    .addUniqueConstraint('staff_invitations_code_key', ['code'])
    .execute();

  await db.schema
    .createIndex('staff_invitations_creator_idx')
    .on('staff_invitations')
    .column('creator_id')
    .execute();

  await db.schema
    .createTable('users')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('barcode', 'varchar(32)', (col) => col.notNull())
    .addColumn('username', 'varchar(64)', (col) => col.notNull())
    .addColumn('email', 'varchar(254)', (col) => col.notNull())
    .addColumn('first_name', 'varchar(100)', (col) => col.notNull())
    .addColumn('last_name', 'varchar(100)', (col) => col.notNull())
    .addColumn('pass_hash', 'text', (col) => col.notNull())
    .addColumn('role', 'varchar(16)', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addUniqueConstraint('users_barcode_key', ['barcode'])
    .addUniqueConstraint('users_username_key', ['username'])
    .addUniqueConstraint('users_email_key', ['email'])
    .execute();

  await db.schema
    .createTable('students')
    .addColumn('user_id', 'uuid', (col) =>
      col.primaryKey().references('users.id').onDelete('cascade')
    )
    .addColumn('group_id', 'uuid', (col) => col.notNull())
    .addColumn('registration_id', 'uuid')
    .addUniqueConstraint('students_registration_id_key', ['registration_id'])
    .execute();

  await db.schema
    .createTable('staff')
    .addColumn('user_id', 'uuid', (col) =>
      col.primaryKey().references('users.id').onDelete('cascade')
    )
    .addColumn('invitation_id', 'uuid')
    .execute();
}

export async function down(db: Kysely<Database>): Promise<void> {
  await db.schema.dropTable('staff').ifExists().execute();
  await db.schema.dropTable('students').ifExists().execute();
  await db.schema.dropTable('users').ifExists().execute();
  await db.schema.dropTable('staff_invitations').ifExists().execute();
  await db.schema.dropTable('registrations').ifExists().execute();
}
