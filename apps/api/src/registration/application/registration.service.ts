import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AlreadyExistsError,
  DuplicateEntryError,
  GroupId,
  NotFoundError,
  Registration,
  emailSchema,
  normalizeEmail,
  passwordSchema,
  validateFields,
  type RegistrationStatus,
  type Timestamp,
} from '@campus-id/domain';
import { Clock } from '@platform/application/ports/clock';
import { OutboxPublisher } from '@platform/application/ports/outbox-publisher';
import { PasswordHasher } from '@platform/application/ports/password-hasher';
import { TransactionRunner } from '@platform/application/ports/transaction-runner';
import {
  saveAggregate,
  updateAggregate,
  type AggregatePersistence,
} from '@platform/infrastructure/persistence/aggregate-persistence';
import { redactEmail } from '@platform/logging/redact';
import { UserDirectory } from '@users/application/ports/user-directory';
import { RegistrationRepository } from './ports/registration-repository';

export type RegistrationView = Readonly<{
  email: string;
  status: RegistrationStatus;
  codeExpiresAt: string;
  resendAvailableAt: string;
}>;

export type CompleteStudentRegistrationInput = Readonly<{
  email: string;
  code: string;
  barcode: string;
  firstName: string;
  lastName: string;
  groupId: string;
  password: string;
}>;

const toView = (
  registration: Registration,
  now: Timestamp
): RegistrationView => ({
  email: registration.email,
  status: registration.statusAt(now),
  codeExpiresAt: registration.codeExpiresAt.toISOString(),
  resendAvailableAt: registration.resendTimeout.toISOString(),
});

const REGISTRATION = 'Registration';

@Injectable()
export class RegistrationService<Tx = unknown> {
  private readonly logger = new Logger(RegistrationService.name);

  constructor(
    @Inject(TransactionRunner) private readonly runner: TransactionRunner<Tx>,
    @Inject(OutboxPublisher) private readonly outbox: OutboxPublisher<Tx>,
    @Inject(RegistrationRepository)
    private readonly registrations: RegistrationRepository<Tx>,
    @Inject(UserDirectory) private readonly users: UserDirectory<Tx>,
    @Inject(PasswordHasher) private readonly hasher: PasswordHasher,
    @Inject(Clock) private readonly clock: Clock
  ) {}

  private get persistence(): AggregatePersistence<Tx> {
    return { runner: this.runner, outbox: this.outbox };
  }

  /**
   * Opens a registration for `email`, or reissues the code of an expired
   * one. Any other existing registration, or an existing user, conflicts.
   */
  async startStudentRegistration(
    input: { email: string },
    signal?: AbortSignal
  ): Promise<RegistrationView> {
    const email = validateFields(
      emailSchema,
      normalizeEmail(input.email),
      'email'
    );

    const { existing, conflict } = await this.runner.run(
      async (tx) => ({
        existing: await this.registrations.findByEmail(tx, email),
        conflict: await this.users.findConflict(tx, { email }),
      }),
      { signal }
    );
    if (conflict) {
      throw new AlreadyExistsError('A user with this email already exists');
    }

    if (existing) {
      if (existing.statusAt(this.clock.now()) !== 'expired') {
        throw new AlreadyExistsError('A registration for this email exists');
      }
      this.logger.log(
        `Registration ${existing.id.value} expired; issuing a new code`
      );
      return this.resendCode({ email }, signal);
    }

    const now = this.clock.now();
    const registration = Registration.start({ email, startedAt: now });
    await saveAggregate(this.persistence, {
      aggregate: registration,
      write: (tx, aggregate) => this.registrations.insert(tx, aggregate),
      onConflict: (_violation, cause) =>
        new AlreadyExistsError('A registration for this email exists', cause),
      signal,
    });
    this.logger.log(
      `Registration ${registration.id.value} started for ${redactEmail(email)}`
    );
    return toView(registration, now);
  }

  async verifyCode(
    input: { email: string; code: string },
    signal?: AbortSignal
  ): Promise<RegistrationView> {
    const email = normalizeEmail(input.email);
    const now = this.clock.now();
    const registration = await updateAggregate(this.persistence, {
      load: (tx) =>
        this.registrations.findByEmail(tx, email, { forUpdate: true }),
      mutate: (aggregate) =>
        aggregate.verifyCode({ code: input.code, attemptedAt: now }),
      write: (tx, aggregate) => this.registrations.update(tx, aggregate),
      notFound: () => new NotFoundError(REGISTRATION),
      signal,
    });
    return toView(registration, now);
  }

  async resendCode(
    input: { email: string },
    signal?: AbortSignal
  ): Promise<RegistrationView> {
    const email = normalizeEmail(input.email);
    const now = this.clock.now();
    const registration = await updateAggregate(this.persistence, {
      load: (tx) =>
        this.registrations.findByEmail(tx, email, { forUpdate: true }),
      mutate: (aggregate) => aggregate.resendCode({ requestedAt: now }),
      write: (tx, aggregate) => this.registrations.update(tx, aggregate),
      notFound: () => new NotFoundError(REGISTRATION),
      signal,
    });
    this.logger.log(`Code resent for registration ${registration.id.value}`);
    return toView(registration, now);
  }

  /**
   * Verifies the code if that has not happened yet, then completes the
   * registration with a hashed password. The student account itself is
   * created by the `RegistrationCompleted` consumer.
   */
  async completeStudentRegistration(
    input: CompleteStudentRegistrationInput,
    signal?: AbortSignal
  ): Promise<RegistrationView> {
    const email = normalizeEmail(input.email);
    const password = validateFields(passwordSchema, input.password, 'password');
    const groupId = GroupId.from(input.groupId);

    const conflict = await this.runner.run(
      (tx) => this.users.findConflict(tx, { email, barcode: input.barcode }),
      { signal }
    );
    if (conflict === 'email') {
      throw new AlreadyExistsError('A user with this email already exists');
    }
    if (conflict) {
      throw new DuplicateEntryError(conflict);
    }

    const passwordHash = await this.hasher.hash(password);
    const now = this.clock.now();
    const registration = await updateAggregate(this.persistence, {
      load: (tx) =>
        this.registrations.findByEmail(tx, email, { forUpdate: true }),
      mutate: (aggregate) => {
        aggregate.verifyCode({ code: input.code, attemptedAt: now });
        aggregate.complete({
          barcode: input.barcode,
          firstName: input.firstName,
          lastName: input.lastName,
          groupId,
          passwordHash,
          completedAt: now,
        });
      },
      write: (tx, aggregate) => this.registrations.update(tx, aggregate),
      notFound: () => new NotFoundError(REGISTRATION),
      signal,
    });
    this.logger.log(`Registration ${registration.id.value} completed`);
    return toView(registration, now);
  }
}
