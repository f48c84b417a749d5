import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { StaffInvitationId } from '../StaffInvitationId';
import { staffInvitationEventTypes } from './eventTypes';

export interface StaffInvitationValidityUpdatedPayload {
  staffInvitationId: StaffInvitationId;
  validFrom: Timestamp | null;
  validUntil: Timestamp | null;
  changedAt: Timestamp;
}

export class StaffInvitationValidityUpdated
  extends DomainEvent<
    typeof staffInvitationEventTypes.staffInvitationValidityUpdated
  >
  implements StaffInvitationValidityUpdatedPayload
{
  readonly eventType = staffInvitationEventTypes.staffInvitationValidityUpdated;
  readonly streamName = streams.staffInvitation;

  readonly staffInvitationId: StaffInvitationId;
  readonly validFrom: Timestamp | null;
  readonly validUntil: Timestamp | null;
  readonly changedAt: Timestamp;

  constructor(
    payload: StaffInvitationValidityUpdatedPayload,
    envelope?: EventEnvelope
  ) {
    super(payload.changedAt, envelope);
    this.staffInvitationId = payload.staffInvitationId;
    this.validFrom = payload.validFrom;
    this.validUntil = payload.validUntil;
    this.changedAt = payload.changedAt;
    Object.freeze(this);
  }
}
