import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DuplicateEntryError,
  NotFoundOrDeletedError,
  Staff,
  normalizeEmail,
  passwordSchema,
  validateFields,
} from '@campus-id/domain';
import { Clock } from '@platform/application/ports/clock';
import { OutboxPublisher } from '@platform/application/ports/outbox-publisher';
import { PasswordHasher } from '@platform/application/ports/password-hasher';
import { TransactionRunner } from '@platform/application/ports/transaction-runner';
import { saveAggregate } from '@platform/infrastructure/persistence/aggregate-persistence';
import { redactEmail } from '@platform/logging/redact';
import { StaffRepository } from '@users/application/ports/staff-repository';
import { UserDirectory } from '@users/application/ports/user-directory';
import { StaffInvitationRepository } from './ports/staff-invitation-repository';

export type AcceptInvitationInput = Readonly<{
  code: string;
  email: string;
  barcode: string;
  username: string;
  firstName: string;
  lastName: string;
  password: string;
}>;

/**
 * Turns an invitation into a staff account.
 */
@Injectable()
export class StaffRegistrationService<Tx = unknown> {
  private readonly logger = new Logger(StaffRegistrationService.name);

  constructor(
    @Inject(TransactionRunner) private readonly runner: TransactionRunner<Tx>,
    @Inject(OutboxPublisher) private readonly outbox: OutboxPublisher<Tx>,
    @Inject(StaffInvitationRepository)
    private readonly invitations: StaffInvitationRepository<Tx>,
    @Inject(StaffRepository) private readonly staff: StaffRepository<Tx>,
    @Inject(UserDirectory) private readonly users: UserDirectory<Tx>,
    @Inject(PasswordHasher) private readonly hasher: PasswordHasher,
    @Inject(Clock) private readonly clock: Clock
  ) {}

  async acceptInvitation(
    input: AcceptInvitationInput,
    signal?: AbortSignal
  ): Promise<{ userId: string }> {
    const email = normalizeEmail(input.email);
    const password = validateFields(passwordSchema, input.password, 'password');
    const now = this.clock.now();

    const { invitation, conflict } = await this.runner.run(
      async (tx) => ({
        invitation: await this.invitations.findByCode(tx, input.code),
        conflict: await this.users.findConflict(tx, {
          email,
          barcode: input.barcode,
          username: input.username,
        }),
      }),
      { signal }
    );
    if (!invitation) {
      throw new NotFoundOrDeletedError('Staff invitation');
    }
    invitation.validateInvitationAccess({
      email,
      code: input.code,
      checkedAt: now,
    });
    if (conflict) {
      throw new DuplicateEntryError(conflict);
    }

    const passwordHash = await this.hasher.hash(password);
    const staff = Staff.register({
      barcode: input.barcode,
      username: input.username,
      email,
      firstName: input.firstName,
      lastName: input.lastName,
      passwordHash,
      invitationId: invitation.id,
      registeredAt: now,
    });
    await saveAggregate(
      { runner: this.runner, outbox: this.outbox },
      {
        aggregate: staff,
        write: (tx, aggregate) => this.staff.insert(tx, aggregate),
        signal,
      }
    );
    this.logger.log(
      `Staff ${staff.id.value} registered from invitation ${invitation.id.value} (${redactEmail(email)})`
    );
    return { userId: staff.id.value };
  }
}
