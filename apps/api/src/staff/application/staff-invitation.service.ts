import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AlreadyExistsError,
  ForbiddenError,
  NotFoundOrDeletedError,
  StaffInvitation,
  type StaffInvitationId,
  type Timestamp,
  type UserId,
} from '@campus-id/domain';
import { Clock } from '@platform/application/ports/clock';
import { OutboxPublisher } from '@platform/application/ports/outbox-publisher';
import { TransactionRunner } from '@platform/application/ports/transaction-runner';
import {
  saveAggregate,
  updateAggregate,
  type AggregatePersistence,
} from '@platform/infrastructure/persistence/aggregate-persistence';
import { StaffInvitationRepository } from './ports/staff-invitation-repository';

export type StaffInvitationView = Readonly<{
  id: string;
  code: string;
  creatorId: string;
  recipientsEmail: ReadonlyArray<string>;
  validFrom: string | null;
  validUntil: string | null;
  createdAt: string;
  updatedAt: string;
}>;

export const toStaffInvitationView = (
  invitation: StaffInvitation
): StaffInvitationView => ({
  id: invitation.id.value,
  code: invitation.code,
  creatorId: invitation.creatorId.value,
  recipientsEmail: [...invitation.recipientsEmail],
  validFrom: invitation.validFrom ? invitation.validFrom.toISOString() : null,
  validUntil: invitation.validUntil
    ? invitation.validUntil.toISOString()
    : null,
  createdAt: invitation.createdAt.toISOString(),
  updatedAt: invitation.updatedAt.toISOString(),
});

const INVITATION = 'Staff invitation';

type Target = Readonly<{
  callerId: UserId;
  invitationId: StaffInvitationId;
}>;

/**
 * Creator-side management of staff invitations.
 */
@Injectable()
export class StaffInvitationService<Tx = unknown> {
  private readonly logger = new Logger(StaffInvitationService.name);

  constructor(
    @Inject(TransactionRunner) private readonly runner: TransactionRunner<Tx>,
    @Inject(OutboxPublisher) private readonly outbox: OutboxPublisher<Tx>,
    @Inject(StaffInvitationRepository)
    private readonly invitations: StaffInvitationRepository<Tx>,
    @Inject(Clock) private readonly clock: Clock
  ) {}

  private get persistence(): AggregatePersistence<Tx> {
    return { runner: this.runner, outbox: this.outbox };
  }

  async create(
    input: {
      creatorId: UserId;
      recipientsEmail: ReadonlyArray<string>;
      validFrom: Timestamp | null;
      validUntil: Timestamp | null;
    },
    signal?: AbortSignal
  ): Promise<StaffInvitationView> {
    const invitation = StaffInvitation.create({
      ...input,
      createdAt: this.clock.now(),
    });
    await saveAggregate(this.persistence, {
      aggregate: invitation,
      write: (tx, aggregate) => this.invitations.insert(tx, aggregate),
      onConflict: (_violation, cause) =>
        new AlreadyExistsError('Invitation code collision; retry', cause),
      signal,
    });
    this.logger.log(
      `Staff invitation ${invitation.id.value} created by ${input.creatorId.value} for ${invitation.recipientsEmail.length} recipient(s)`
    );
    return toStaffInvitationView(invitation);
  }

  async get(target: Target, signal?: AbortSignal): Promise<StaffInvitationView> {
    const invitation = await this.runner.run(
      (tx) => this.invitations.findById(tx, target.invitationId),
      { signal }
    );
    if (!invitation) {
      throw new NotFoundOrDeletedError(INVITATION);
    }
    if (!invitation.creatorId.equals(target.callerId)) {
      throw new ForbiddenError('Only the creator may view this invitation');
    }
    if (invitation.isDeleted) {
      throw new NotFoundOrDeletedError(INVITATION);
    }
    return toStaffInvitationView(invitation);
  }

  async updateRecipients(
    target: Target & { recipientsEmail: ReadonlyArray<string> },
    signal?: AbortSignal
  ): Promise<StaffInvitationView> {
    const now = this.clock.now();
    return this.mutate(
      target,
      (invitation) =>
        invitation.updateRecipients({
          callerId: target.callerId,
          recipientsEmail: target.recipientsEmail,
          changedAt: now,
        }),
      signal
    );
  }

  async updateValidity(
    target: Target & {
      validFrom: Timestamp | null;
      validUntil: Timestamp | null;
    },
    signal?: AbortSignal
  ): Promise<StaffInvitationView> {
    const now = this.clock.now();
    return this.mutate(
      target,
      (invitation) =>
        invitation.updateValidity({
          callerId: target.callerId,
          validFrom: target.validFrom,
          validUntil: target.validUntil,
          changedAt: now,
        }),
      signal
    );
  }

  async delete(target: Target, signal?: AbortSignal): Promise<void> {
    const now = this.clock.now();
    await this.mutate(
      target,
      (invitation) =>
        invitation.markDeleted({ callerId: target.callerId, deletedAt: now }),
      signal
    );
    this.logger.log(`Staff invitation ${target.invitationId.value} deleted`);
  }

  private async mutate(
    target: Target,
    change: (invitation: StaffInvitation) => void,
    signal?: AbortSignal
  ): Promise<StaffInvitationView> {
    const invitation = await updateAggregate(this.persistence, {
      load: (tx) =>
        this.invitations.findById(tx, target.invitationId, { forUpdate: true }),
      mutate: change,
      write: (tx, aggregate) => this.invitations.update(tx, aggregate),
      notFound: () => new NotFoundOrDeletedError(INVITATION),
      signal,
    });
    return toStaffInvitationView(invitation);
  }
}
