import type { StaffInvitation, StaffInvitationId } from '@campus-id/domain';

export type FindOptions = Readonly<{
  forUpdate?: boolean;
}>;

/**
 * Soft-deleted invitations are still returned; the aggregate decides how
 * to report them.
 */
export abstract class StaffInvitationRepository<Tx> {
  abstract findById(
    tx: Tx,
    id: StaffInvitationId,
    options?: FindOptions
  ): Promise<StaffInvitation | null>;

  abstract findByCode(
    tx: Tx,
    code: string,
    options?: FindOptions
  ): Promise<StaffInvitation | null>;

  abstract insert(tx: Tx, invitation: StaffInvitation): Promise<void>;

  /** Throws `NoRowsAffectedError` when the row is gone. */
  abstract update(tx: Tx, invitation: StaffInvitation): Promise<void>;
}
