import { ColumnType } from 'kysely';

type TimestampColumn = ColumnType<
  Date,
  Date | string | undefined,
  Date | string
>;

type NullableTimestampColumn = ColumnType<
  Date | null,
  Date | string | null | undefined,
  Date | string | null
>;

/** bigint columns come back from pg as strings. */
type BigIntColumn = ColumnType<string, number | string, number | string>;

export interface RegistrationsTable {
  id: string;
  email: string;
  status: 'pending' | 'verified' | 'completed';
  verification_code: string;
  code_attempts: number;
  code_expires_at: TimestampColumn;
  resend_timeout: TimestampColumn;
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
}

export interface StaffInvitationsTable {
  id: string;
  creator_id: string;
  code: string;
  recipients_email: string[];
  valid_from: NullableTimestampColumn;
  valid_until: NullableTimestampColumn;
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
  deleted_at: NullableTimestampColumn;
}

export interface UsersTable {
  id: string;
  barcode: string;
  username: string;
  email: string;
  first_name: string;
  last_name: string;
  pass_hash: string;
  role: 'student' | 'staff';
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
}

export interface StudentsTable {
  user_id: string;
  group_id: string;
  registration_id: string | null;
}

export interface StaffTable {
  user_id: string;
  invitation_id: string | null;
}

export interface OutboxEventsTable {
  stream_name: string;
  stream_offset: BigIntColumn;
  event_id: string;
  event_type: string;
  payload: ColumnType<unknown, string, never>;
  created_at: TimestampColumn;
}

export interface OutboxOffsetsTable {
  consumer_group: string;
  stream_name: string;
  last_offset: BigIntColumn;
  updated_at: TimestampColumn;
}

export interface Database {
  registrations: RegistrationsTable;
  staff_invitations: StaffInvitationsTable;
  users: UsersTable;
  students: StudentsTable;
  staff: StaffTable;
  outbox_events: OutboxEventsTable;
  outbox_offsets: OutboxOffsetsTable;
}
