import { z } from 'zod';
import { EventRecorder, type RecordsEvents } from '../shared/EventRecorder';
import {
  ForbiddenError,
  InvalidInvitationError,
  NotFoundOrDeletedError,
  ValidationError,
  type FieldError,
} from '../shared/errors';
import {
  normalizeEmail,
  recipientsSchema,
  validateFields,
} from '../shared/validation';
import { Timestamp } from '../shared/vos/Timestamp';
import { UserId } from '../users/UserId';
import { randomAlphanumericCode } from '../utils/randomCode';
import { StaffInvitationId } from './StaffInvitationId';
import {
  StaffInvitationCreated,
  StaffInvitationDeleted,
  StaffInvitationRecipientsUpdated,
  StaffInvitationValidityUpdated,
  type StaffInvitationEvent,
} from './events';

export const staffInvitationPolicy = {
  codeLength: 10,
  minValidityMs: 60 * 1000,
} as const;

export type StaffInvitationSnapshot = Readonly<{
  id: StaffInvitationId;
  code: string;
  creatorId: UserId;
  recipientsEmail: ReadonlyArray<string>;
  validFrom: Timestamp | null;
  validUntil: Timestamp | null;
  createdAt: Timestamp;
  updatedAt: Timestamp;
  deletedAt: Timestamp | null;
}>;

type StaffInvitationState = {
  -readonly [K in keyof StaffInvitationSnapshot]: StaffInvitationSnapshot[K];
};

const recipientsInputSchema = z.object({ recipientsEmail: recipientsSchema });

const RESOURCE = 'Staff invitation';

/**
 * Invitation for prospective staff members, issued by an existing one.
 *
 * Only the creator may change it. Once deleted it is frozen: every further
 * mutation and access check reports it as not found.
 */
export class StaffInvitation implements RecordsEvents<StaffInvitationEvent> {
  private readonly recorder = new EventRecorder<StaffInvitationEvent>();

  private constructor(private readonly state: StaffInvitationState) {}

  static create(params: {
    creatorId: UserId;
    recipientsEmail: ReadonlyArray<string>;
    validFrom: Timestamp | null;
    validUntil: Timestamp | null;
    createdAt: Timestamp;
  }): StaffInvitation {
    const errors = validityErrors(
      params.validFrom,
      params.validUntil,
      params.createdAt
    );
    if (params.creatorId.isZero()) {
      errors.unshift({ field: 'creatorId', message: 'is required' });
    }
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }
    const recipientsEmail = parseRecipients(params.recipientsEmail);

    const invitation = new StaffInvitation({
      id: StaffInvitationId.create(),
      code: randomAlphanumericCode(staffInvitationPolicy.codeLength),
      creatorId: params.creatorId,
      recipientsEmail,
      validFrom: params.validFrom,
      validUntil: params.validUntil,
      createdAt: params.createdAt,
      updatedAt: params.createdAt,
      deletedAt: null,
    });
    invitation.recorder.record(
      new StaffInvitationCreated({
        staffInvitationId: invitation.id,
        creatorId: invitation.creatorId,
        code: invitation.code,
        recipientsEmail,
        validFrom: params.validFrom,
        validUntil: params.validUntil,
        createdAt: params.createdAt,
      })
    );
    return invitation;
  }

  static rehydrate(snapshot: StaffInvitationSnapshot): StaffInvitation {
    return new StaffInvitation({
      ...snapshot,
      recipientsEmail: [...snapshot.recipientsEmail],
    });
  }

  get id(): StaffInvitationId {
    return this.state.id;
  }

  get code(): string {
    return this.state.code;
  }

  get creatorId(): UserId {
    return this.state.creatorId;
  }

  get recipientsEmail(): ReadonlyArray<string> {
    return [...this.state.recipientsEmail];
  }

  get validFrom(): Timestamp | null {
    return this.state.validFrom;
  }

  get validUntil(): Timestamp | null {
    return this.state.validUntil;
  }

  get createdAt(): Timestamp {
    return this.state.createdAt;
  }

  get updatedAt(): Timestamp {
    return this.state.updatedAt;
  }

  get deletedAt(): Timestamp | null {
    return this.state.deletedAt;
  }

  get isDeleted(): boolean {
    return this.state.deletedAt !== null;
  }

  /**
   * Replaces the recipient list. Order is not significant: a list holding
   * the same addresses as the current one changes nothing.
   */
  updateRecipients(params: {
    callerId: UserId;
    recipientsEmail: ReadonlyArray<string>;
    changedAt: Timestamp;
  }): void {
    this.assertMutableBy(params.callerId);
    const next = parseRecipients(params.recipientsEmail);

    const current = new Set(this.state.recipientsEmail);
    if (next.length === current.size && next.every((e) => current.has(e))) {
      return;
    }
    const added = next.filter((email) => !current.has(email));

    this.state.recipientsEmail = next;
    this.state.updatedAt = params.changedAt;
    this.recorder.record(
      new StaffInvitationRecipientsUpdated({
        staffInvitationId: this.state.id,
        code: this.state.code,
        addedRecipientsEmail: added,
        currentRecipientsEmail: next,
        changedAt: params.changedAt,
      })
    );
  }

  updateValidity(params: {
    callerId: UserId;
    validFrom: Timestamp | null;
    validUntil: Timestamp | null;
    changedAt: Timestamp;
  }): void {
    this.assertMutableBy(params.callerId);
    const errors = validityErrors(
      params.validFrom,
      params.validUntil,
      params.changedAt
    );
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }
    if (
      sameSecond(this.state.validFrom, params.validFrom) &&
      sameSecond(this.state.validUntil, params.validUntil)
    ) {
      return;
    }

    this.state.validFrom = params.validFrom;
    this.state.validUntil = params.validUntil;
    this.state.updatedAt = params.changedAt;
    this.recorder.record(
      new StaffInvitationValidityUpdated({
        staffInvitationId: this.state.id,
        validFrom: params.validFrom,
        validUntil: params.validUntil,
        changedAt: params.changedAt,
      })
    );
  }

  markDeleted(params: { callerId: UserId; deletedAt: Timestamp }): void {
    if (!params.callerId.equals(this.state.creatorId)) {
      throw new ForbiddenError('Only the creator may delete this invitation');
    }
    if (this.state.deletedAt !== null) {
      return;
    }

    this.state.deletedAt = params.deletedAt;
    this.state.updatedAt = params.deletedAt;
    this.recorder.record(
      new StaffInvitationDeleted({
        staffInvitationId: this.state.id,
        deletedAt: params.deletedAt,
      })
    );
  }

  /**
   * Checks that `email` may accept this invitation with `code` at
   * `checkedAt`. Deletion is reported before anything else.
   */
  validateInvitationAccess(params: {
    email: string;
    code: string;
    checkedAt: Timestamp;
  }): void {
    if (this.state.deletedAt !== null) {
      throw new NotFoundOrDeletedError(RESOURCE);
    }
    const email = normalizeEmail(params.email);
    if (email === '' || params.code === '') {
      throw new InvalidInvitationError();
    }
    if (params.code !== this.state.code) {
      throw new InvalidInvitationError();
    }
    if (!this.state.recipientsEmail.includes(email)) {
      throw new InvalidInvitationError();
    }
    const { validFrom, validUntil } = this.state;
    if (validFrom !== null && params.checkedAt.isBefore(validFrom)) {
      throw new InvalidInvitationError();
    }
    if (validUntil !== null && params.checkedAt.isAfter(validUntil)) {
      throw new InvalidInvitationError();
    }
  }

  toSnapshot(): StaffInvitationSnapshot {
    return Object.freeze({
      ...this.state,
      recipientsEmail: Object.freeze([...this.state.recipientsEmail]),
    });
  }

  getUncommittedEvents(): ReadonlyArray<StaffInvitationEvent> {
    return this.recorder.getUncommittedEvents();
  }

  markEventsAsCommitted(): void {
    this.recorder.clear();
  }

  private assertMutableBy(callerId: UserId): void {
    if (!callerId.equals(this.state.creatorId)) {
      throw new ForbiddenError('Only the creator may change this invitation');
    }
    if (this.state.deletedAt !== null) {
      throw new NotFoundOrDeletedError(RESOURCE);
    }
  }
}

function parseRecipients(emails: ReadonlyArray<string>): string[] {
  const { recipientsEmail } = validateFields(recipientsInputSchema, {
    recipientsEmail: emails.map(normalizeEmail),
  });
  return recipientsEmail;
}

function validityErrors(
  validFrom: Timestamp | null,
  validUntil: Timestamp | null,
  now: Timestamp
): FieldError[] {
  const errors: FieldError[] = [];
  if (validFrom !== null && validFrom.isBefore(now)) {
    errors.push({ field: 'validFrom', message: 'must not be in the past' });
  }
  if (validUntil !== null && validUntil.isBefore(now)) {
    errors.push({ field: 'validUntil', message: 'must not be in the past' });
  } else if (
    validFrom !== null &&
    validUntil !== null &&
    validUntil.isBefore(validFrom.plus(staffInvitationPolicy.minValidityMs))
  ) {
    errors.push({
      field: 'validUntil',
      message: 'must be at least 1 minute after validFrom',
    });
  }
  return errors;
}

function sameSecond(a: Timestamp | null, b: Timestamp | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.truncatedToSecond().equals(b.truncatedToSecond());
}
