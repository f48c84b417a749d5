import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { UserId } from '../../users/UserId';
import { StaffInvitationId } from '../StaffInvitationId';
import { staffInvitationEventTypes } from './eventTypes';

export interface StaffInvitationCreatedPayload {
  staffInvitationId: StaffInvitationId;
  creatorId: UserId;
  code: string;
  recipientsEmail: ReadonlyArray<string>;
  validFrom: Timestamp | null;
  validUntil: Timestamp | null;
  createdAt: Timestamp;
}

export class StaffInvitationCreated
  extends DomainEvent<typeof staffInvitationEventTypes.staffInvitationCreated>
  implements StaffInvitationCreatedPayload
{
  readonly eventType = staffInvitationEventTypes.staffInvitationCreated;
  readonly streamName = streams.staffInvitation;

  readonly staffInvitationId: StaffInvitationId;
  readonly creatorId: UserId;
  readonly code: string;
  readonly recipientsEmail: ReadonlyArray<string>;
  readonly validFrom: Timestamp | null;
  readonly validUntil: Timestamp | null;
  readonly createdAt: Timestamp;

  constructor(payload: StaffInvitationCreatedPayload, envelope?: EventEnvelope) {
    super(payload.createdAt, envelope);
    this.staffInvitationId = payload.staffInvitationId;
    this.creatorId = payload.creatorId;
    this.code = payload.code;
    this.recipientsEmail = Object.freeze([...payload.recipientsEmail]);
    this.validFrom = payload.validFrom;
    this.validUntil = payload.validUntil;
    this.createdAt = payload.createdAt;
    Object.freeze(this);
  }
}
