import type { Selectable } from 'kysely';
import {
  StaffInvitation,
  StaffInvitationId,
  Timestamp,
  UserId,
} from '@campus-id/domain';
import type { StaffInvitationsTable } from '@platform/infrastructure/database/database.types';

export type StaffInvitationRow = Selectable<StaffInvitationsTable>;

const toDate = (value: Timestamp | null): Date | null =>
  value ? value.toDate() : null;

const toTimestamp = (value: Date | null): Timestamp | null =>
  value ? Timestamp.fromDate(new Date(value)) : null;

export const staffInvitationToRow = (
  invitation: StaffInvitation
): StaffInvitationRow => {
  const snapshot = invitation.toSnapshot();
  return {
    id: snapshot.id.value,
    creator_id: snapshot.creatorId.value,
    code: snapshot.code,
    recipients_email: [...snapshot.recipientsEmail],
    valid_from: toDate(snapshot.validFrom),
    valid_until: toDate(snapshot.validUntil),
    created_at: snapshot.createdAt.toDate(),
    updated_at: snapshot.updatedAt.toDate(),
    deleted_at: toDate(snapshot.deletedAt),
  };
};

export const staffInvitationFromRow = (
  row: StaffInvitationRow
): StaffInvitation =>
  StaffInvitation.rehydrate({
    id: StaffInvitationId.from(row.id),
    code: row.code,
    creatorId: UserId.from(row.creator_id),
    recipientsEmail: row.recipients_email,
    validFrom: toTimestamp(row.valid_from),
    validUntil: toTimestamp(row.valid_until),
    createdAt: Timestamp.fromDate(new Date(row.created_at)),
    updatedAt: Timestamp.fromDate(new Date(row.updated_at)),
    deletedAt: toTimestamp(row.deleted_at),
  });
