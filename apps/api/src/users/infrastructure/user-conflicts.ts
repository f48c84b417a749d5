import { AlreadyExistsError, DuplicateEntryError } from '@campus-id/domain';
import { asUniqueViolation } from '@platform/infrastructure/persistence/postgres-errors';
import type { UserIdentityField } from '../application/ports/user-directory';

const fieldByConstraint = new Map<string, UserIdentityField>([
  ['users_email_key', 'email'],
  ['users_barcode_key', 'barcode'],
  ['users_username_key', 'username'],
]);

/**
 * Turns a unique violation on the users table into the field-level
 * conflict; other errors pass through unchanged.
 */
export function toUserConflict(error: unknown): unknown {
  const violation = asUniqueViolation(error);
  if (!violation) return error;
  const field = violation.constraint
    ? fieldByConstraint.get(violation.constraint)
    : undefined;
  return field
    ? new DuplicateEntryError(field, error)
    : new AlreadyExistsError('User already exists', error);
}
