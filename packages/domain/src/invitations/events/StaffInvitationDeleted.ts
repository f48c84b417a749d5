import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { StaffInvitationId } from '../StaffInvitationId';
import { staffInvitationEventTypes } from './eventTypes';

export interface StaffInvitationDeletedPayload {
  staffInvitationId: StaffInvitationId;
  deletedAt: Timestamp;
}

export class StaffInvitationDeleted
  extends DomainEvent<typeof staffInvitationEventTypes.staffInvitationDeleted>
  implements StaffInvitationDeletedPayload
{
  readonly eventType = staffInvitationEventTypes.staffInvitationDeleted;
  readonly streamName = streams.staffInvitation;

  readonly staffInvitationId: StaffInvitationId;
  readonly deletedAt: Timestamp;

  constructor(payload: StaffInvitationDeletedPayload, envelope?: EventEnvelope) {
    super(payload.deletedAt, envelope);
    this.staffInvitationId = payload.staffInvitationId;
    this.deletedAt = payload.deletedAt;
    Object.freeze(this);
  }
}
