/**
 * Business error taxonomy shared by aggregates, use cases and adapters.
 *
 * `code` is the stable machine-readable classification the HTTP layer
 * exposes. `persistable` errors are raised after the aggregate already
 * changed state that must still be committed (a counted failed attempt,
 * for instance); repositories commit first and rethrow afterwards.
 */
export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;
  readonly persistable: boolean = false;

  protected constructor(
    message: string,
    override readonly cause?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export type DomainErrorCode =
  | 'VALIDATION_FAILED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'DUPLICATE_ENTRY'
  | 'CODE_EXPIRED'
  | 'INVALID_CODE'
  | 'TOO_MANY_ATTEMPTS'
  | 'TOO_SOON'
  | 'INVALID_STATUS'
  | 'INVALID_INVITATION'
  | 'INVALID_CREDENTIALS'
  | 'NO_ROWS_AFFECTED';

export type FieldError = Readonly<{
  field: string;
  message: string;
}>;

export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_FAILED';

  constructor(readonly fields: ReadonlyArray<FieldError>) {
    super(
      fields.length > 0
        ? fields.map((f) => `${f.field}: ${f.message}`).join('; ')
        : 'Validation failed'
    );
  }

  static single(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }
}

export class ForbiddenError extends DomainError {
  readonly code = 'FORBIDDEN';

  constructor(message = 'Operation is not allowed for this caller') {
    super(message);
  }
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';

  constructor(resource: string) {
    super(`${resource} not found`);
  }
}

/**
 * Missing and soft-deleted resources share the public `NOT_FOUND` code.
 */
export class NotFoundOrDeletedError extends DomainError {
  readonly code = 'NOT_FOUND';

  constructor(resource: string) {
    super(`${resource} not found`);
  }
}

export class AlreadyExistsError extends DomainError {
  readonly code = 'CONFLICT';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}

export class DuplicateEntryError extends DomainError {
  readonly code = 'DUPLICATE_ENTRY';

  constructor(
    readonly field: string,
    cause?: unknown
  ) {
    super(`${field} is already taken`, cause);
  }
}

export class CodeExpiredError extends DomainError {
  readonly code = 'CODE_EXPIRED';

  constructor() {
    super('Verification code has expired');
  }
}

export class InvalidCodeError extends DomainError {
  readonly code = 'INVALID_CODE';

  constructor(
    readonly attemptsLeft: number,
    override readonly persistable: boolean = true
  ) {
    super('Verification code is invalid');
  }
}

export class TooManyAttemptsError extends DomainError {
  readonly code = 'TOO_MANY_ATTEMPTS';

  constructor(override readonly persistable: boolean = false) {
    super('Too many failed verification attempts; registration must be restarted');
  }
}

export class TooSoonError extends DomainError {
  readonly code = 'TOO_SOON';

  constructor(readonly retryAfterMs: number) {
    super('Request repeated too soon');
  }
}

export class InvalidStatusError extends DomainError {
  readonly code = 'INVALID_STATUS';

  constructor(
    readonly status: string,
    operation: string
  ) {
    super(`Cannot ${operation} while ${status}`);
  }
}

export class InvalidInvitationError extends DomainError {
  readonly code = 'INVALID_INVITATION';

  constructor() {
    super('Invitation is invalid for this email or code');
  }
}

export class InvalidCredentialsError extends DomainError {
  readonly code = 'INVALID_CREDENTIALS';

  constructor() {
    super('Invalid credentials');
  }
}

export class NoRowsAffectedError extends DomainError {
  readonly code = 'NO_ROWS_AFFECTED';

  constructor(resource: string) {
    super(`Update of ${resource} affected no rows`);
  }
}

export function isPersistableError(error: unknown): error is DomainError {
  return error instanceof DomainError && error.persistable;
}
