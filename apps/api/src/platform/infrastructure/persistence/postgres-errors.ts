export type UniqueViolation = Readonly<{
  constraint: string | null;
}>;

const UNIQUE_VIOLATION = '23505';

/**
 * Recognizes a Postgres unique violation, as raised by pg or by any
 * stand-in that reports the same SQLSTATE.
 */
export function asUniqueViolation(error: unknown): UniqueViolation | null {
  if (
    typeof error !== 'object' ||
    error === null ||
    !('code' in error) ||
    error.code !== UNIQUE_VIOLATION
  ) {
    return null;
  }
  const constraint =
    'constraint' in error && typeof error.constraint === 'string'
      ? error.constraint
      : null;
  return { constraint };
}
