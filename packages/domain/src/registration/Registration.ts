import { z } from 'zod';
import { EventRecorder, type RecordsEvents } from '../shared/EventRecorder';
import {
  CodeExpiredError,
  InvalidCodeError,
  InvalidStatusError,
  TooManyAttemptsError,
  TooSoonError,
  ValidationError,
} from '../shared/errors';
import {
  barcodeSchema,
  emailSchema,
  normalizeEmail,
  personNameSchema,
  toFieldErrors,
  validateFields,
} from '../shared/validation';
import { Timestamp } from '../shared/vos/Timestamp';
import { GroupId } from '../users/GroupId';
import { randomAlphanumericCode } from '../utils/randomCode';
import { RegistrationId } from './RegistrationId';
import {
  RegistrationCodeResent,
  RegistrationCompleted,
  RegistrationFailed,
  RegistrationStarted,
  RegistrationVerified,
  type RegistrationEvent,
} from './events';

export const registrationPolicy = {
  codeLength: 6,
  codeTtlMs: 10 * 60 * 1000,
  resendCooldownMs: 60 * 1000,
  maxCodeAttempts: 3,
} as const;

export const TOO_MANY_ATTEMPTS_REASON = 'too many failed attempts';

/** Statuses that are stored. `expired` is only ever derived. */
export type StoredRegistrationStatus = 'pending' | 'verified' | 'completed';
export type RegistrationStatus = StoredRegistrationStatus | 'expired';

export type RegistrationSnapshot = Readonly<{
  id: RegistrationId;
  email: string;
  status: StoredRegistrationStatus;
  verificationCode: string;
  codeAttempts: number;
  codeExpiresAt: Timestamp;
  resendTimeout: Timestamp;
  createdAt: Timestamp;
  updatedAt: Timestamp;
}>;

type RegistrationState = {
  -readonly [K in keyof RegistrationSnapshot]: RegistrationSnapshot[K];
};

const profileSchema = z.object({
  barcode: barcodeSchema,
  firstName: personNameSchema,
  lastName: personNameSchema,
});

/**
 * Student self-registration aggregate.
 *
 * pending -> verified -> completed. A pending registration whose code
 * expired, or whose attempts ran out, reads as `expired`; it can be revived
 * only by resending a code.
 *
 * Repeating a transition that already happened is a no-op and records
 * nothing, so client retries are safe.
 */
export class Registration implements RecordsEvents<RegistrationEvent> {
  private readonly recorder = new EventRecorder<RegistrationEvent>();

  private constructor(private readonly state: RegistrationState) {}

  static start(params: { email: string; startedAt: Timestamp }): Registration {
    const email = validateFields(
      emailSchema,
      normalizeEmail(params.email),
      'email'
    );
    const code = randomAlphanumericCode(registrationPolicy.codeLength);
    const codeExpiresAt = params.startedAt.plus(registrationPolicy.codeTtlMs);

    const registration = new Registration({
      id: RegistrationId.create(),
      email,
      status: 'pending',
      verificationCode: code,
      codeAttempts: 0,
      codeExpiresAt,
      resendTimeout: params.startedAt.plus(registrationPolicy.resendCooldownMs),
      createdAt: params.startedAt,
      updatedAt: params.startedAt,
    });
    registration.recorder.record(
      new RegistrationStarted({
        registrationId: registration.id,
        email,
        verificationCode: code,
        codeExpiresAt,
        startedAt: params.startedAt,
      })
    );
    return registration;
  }

  /**
   * Trusted path for rows loaded from storage: no validation, no events.
   */
  static rehydrate(snapshot: RegistrationSnapshot): Registration {
    return new Registration({ ...snapshot });
  }

  get id(): RegistrationId {
    return this.state.id;
  }

  get email(): string {
    return this.state.email;
  }

  get storedStatus(): StoredRegistrationStatus {
    return this.state.status;
  }

  get verificationCode(): string {
    return this.state.verificationCode;
  }

  get codeAttempts(): number {
    return this.state.codeAttempts;
  }

  get codeExpiresAt(): Timestamp {
    return this.state.codeExpiresAt;
  }

  get resendTimeout(): Timestamp {
    return this.state.resendTimeout;
  }

  get createdAt(): Timestamp {
    return this.state.createdAt;
  }

  get updatedAt(): Timestamp {
    return this.state.updatedAt;
  }

  statusAt(now: Timestamp): RegistrationStatus {
    if (this.state.status === 'pending' && this.isExpiredAt(now)) {
      return 'expired';
    }
    return this.state.status;
  }

  isExpiredAt(now: Timestamp): boolean {
    return (
      this.state.status === 'pending' &&
      (now.isAfter(this.state.codeExpiresAt) ||
        this.state.codeAttempts >= registrationPolicy.maxCodeAttempts)
    );
  }

  /**
   * Checks a submitted code.
   *
   * Once past verification, the original code verifies again as a no-op;
   * any other code is rejected without counting an attempt. A pending
   * mismatch counts an attempt and raises a persistable error so that the
   * count survives the failed request.
   */
  verifyCode(params: { code: string; attemptedAt: Timestamp }): void {
    const { code, attemptedAt } = params;

    if (this.state.status !== 'pending') {
      if (code !== this.state.verificationCode) {
        throw new InvalidCodeError(0, false);
      }
      return;
    }
    if (attemptedAt.isAfter(this.state.codeExpiresAt)) {
      throw new CodeExpiredError();
    }
    if (this.state.codeAttempts >= registrationPolicy.maxCodeAttempts) {
      throw new TooManyAttemptsError();
    }

    if (code !== this.state.verificationCode) {
      this.state.codeAttempts += 1;
      this.state.updatedAt = attemptedAt;
      const attemptsLeft =
        registrationPolicy.maxCodeAttempts - this.state.codeAttempts;
      if (attemptsLeft > 0) {
        throw new InvalidCodeError(attemptsLeft);
      }
      this.recorder.record(
        new RegistrationFailed({
          registrationId: this.state.id,
          email: this.state.email,
          reason: TOO_MANY_ATTEMPTS_REASON,
          failedAt: attemptedAt,
        })
      );
      throw new TooManyAttemptsError(true);
    }

    this.state.status = 'verified';
    this.state.updatedAt = attemptedAt;
    this.recorder.record(
      new RegistrationVerified({
        registrationId: this.state.id,
        email: this.state.email,
        verifiedAt: attemptedAt,
      })
    );
  }

  /**
   * Issues a fresh code, expiry and cooldown, and resets the attempt count.
   */
  resendCode(params: { requestedAt: Timestamp }): void {
    const { requestedAt } = params;
    if (this.state.status !== 'pending') {
      throw new InvalidStatusError(this.state.status, 'resend a code');
    }
    if (requestedAt.isBefore(this.state.resendTimeout)) {
      throw new TooSoonError(
        this.state.resendTimeout.value - requestedAt.value
      );
    }

    this.state.verificationCode = randomAlphanumericCode(
      registrationPolicy.codeLength
    );
    this.state.codeAttempts = 0;
    this.state.codeExpiresAt = requestedAt.plus(registrationPolicy.codeTtlMs);
    this.state.resendTimeout = requestedAt.plus(
      registrationPolicy.resendCooldownMs
    );
    this.state.updatedAt = requestedAt;
    this.recorder.record(
      new RegistrationCodeResent({
        registrationId: this.state.id,
        email: this.state.email,
        verificationCode: this.state.verificationCode,
        codeExpiresAt: this.state.codeExpiresAt,
        resentAt: requestedAt,
      })
    );
  }

  complete(params: {
    barcode: string;
    firstName: string;
    lastName: string;
    groupId: GroupId;
    passwordHash: string;
    completedAt: Timestamp;
  }): void {
    if (this.state.status === 'completed') {
      return;
    }
    if (this.state.status !== 'verified') {
      throw new InvalidStatusError(
        this.statusAt(params.completedAt),
        'complete registration'
      );
    }

    const parsed = profileSchema.safeParse({
      barcode: params.barcode,
      firstName: params.firstName,
      lastName: params.lastName,
    });
    const errors = parsed.success
      ? []
      : toFieldErrors(parsed.error.issues, 'profile');
    if (params.groupId.isZero()) {
      errors.push({ field: 'groupId', message: 'is required' });
    }
    if (params.passwordHash.length === 0) {
      errors.push({ field: 'passwordHash', message: 'is required' });
    }
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }

    this.state.status = 'completed';
    this.state.updatedAt = params.completedAt;
    this.recorder.record(
      new RegistrationCompleted({
        registrationId: this.state.id,
        email: this.state.email,
        barcode: params.barcode,
        firstName: params.firstName,
        lastName: params.lastName,
        groupId: params.groupId,
        passwordHash: params.passwordHash,
        completedAt: params.completedAt,
      })
    );
  }

  toSnapshot(): RegistrationSnapshot {
    return Object.freeze({ ...this.state });
  }

  getUncommittedEvents(): ReadonlyArray<RegistrationEvent> {
    return this.recorder.getUncommittedEvents();
  }

  markEventsAsCommitted(): void {
    this.recorder.clear();
  }
}
