import type { Selectable } from 'kysely';
import { Registration, RegistrationId, Timestamp } from '@campus-id/domain';
import type { RegistrationsTable } from '@platform/infrastructure/database/database.types';

export type RegistrationRow = Selectable<RegistrationsTable>;

export const registrationToRow = (
  registration: Registration
): RegistrationRow => {
  const snapshot = registration.toSnapshot();
  return {
    id: snapshot.id.value,
    email: snapshot.email,
    status: snapshot.status,
    verification_code: snapshot.verificationCode,
    code_attempts: snapshot.codeAttempts,
    code_expires_at: snapshot.codeExpiresAt.toDate(),
    resend_timeout: snapshot.resendTimeout.toDate(),
    created_at: snapshot.createdAt.toDate(),
    updated_at: snapshot.updatedAt.toDate(),
  };
};

const toTimestamp = (value: Date): Timestamp =>
  Timestamp.fromDate(new Date(value));

export const registrationFromRow = (row: RegistrationRow): Registration =>
  Registration.rehydrate({
    id: RegistrationId.from(row.id),
    email: row.email,
    status: row.status,
    verificationCode: row.verification_code,
    codeAttempts: row.code_attempts,
    codeExpiresAt: toTimestamp(row.code_expires_at),
    resendTimeout: toTimestamp(row.resend_timeout),
    createdAt: toTimestamp(row.created_at),
    updatedAt: toTimestamp(row.updated_at),
  });
