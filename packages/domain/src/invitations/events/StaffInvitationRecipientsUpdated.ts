import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { StaffInvitationId } from '../StaffInvitationId';
import { staffInvitationEventTypes } from './eventTypes';

export interface StaffInvitationRecipientsUpdatedPayload {
  staffInvitationId: StaffInvitationId;
  code: string;
  addedRecipientsEmail: ReadonlyArray<string>;
  currentRecipientsEmail: ReadonlyArray<string>;
  changedAt: Timestamp;
}

/**
 * `addedRecipientsEmail` holds only addresses absent from the previous list;
 * those are the ones that still need the invitation mail.
 */
export class StaffInvitationRecipientsUpdated
  extends DomainEvent<
    typeof staffInvitationEventTypes.staffInvitationRecipientsUpdated
  >
  implements StaffInvitationRecipientsUpdatedPayload
{
  readonly eventType =
    staffInvitationEventTypes.staffInvitationRecipientsUpdated;
  readonly streamName = streams.staffInvitation;

  readonly staffInvitationId: StaffInvitationId;
  readonly code: string;
  readonly addedRecipientsEmail: ReadonlyArray<string>;
  readonly currentRecipientsEmail: ReadonlyArray<string>;
  readonly changedAt: Timestamp;

  constructor(
    payload: StaffInvitationRecipientsUpdatedPayload,
    envelope?: EventEnvelope
  ) {
    super(payload.changedAt, envelope);
    this.staffInvitationId = payload.staffInvitationId;
    this.code = payload.code;
    this.addedRecipientsEmail = Object.freeze([
      ...payload.addedRecipientsEmail,
    ]);
    this.currentRecipientsEmail = Object.freeze([
      ...payload.currentRecipientsEmail,
    ]);
    this.changedAt = payload.changedAt;
    Object.freeze(this);
  }
}
