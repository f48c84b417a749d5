import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { StaffInvitationId } from '../../invitations/StaffInvitationId';
import { UserId } from '../UserId';
import { userEventTypes } from './eventTypes';

export interface StaffRegisteredPayload {
  userId: UserId;
  barcode: string;
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  invitationId: StaffInvitationId;
  registeredAt: Timestamp;
}

export class StaffRegistered
  extends DomainEvent<typeof userEventTypes.staffRegistered>
  implements StaffRegisteredPayload
{
  readonly eventType = userEventTypes.staffRegistered;
  readonly streamName = streams.staff;

  readonly userId: UserId;
  readonly barcode: string;
  readonly username: string;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly invitationId: StaffInvitationId;
  readonly registeredAt: Timestamp;

  constructor(payload: StaffRegisteredPayload, envelope?: EventEnvelope) {
    super(payload.registeredAt, envelope);
    this.userId = payload.userId;
    this.barcode = payload.barcode;
    this.username = payload.username;
    this.email = payload.email;
    this.firstName = payload.firstName;
    this.lastName = payload.lastName;
    this.invitationId = payload.invitationId;
    this.registeredAt = payload.registeredAt;
    Object.freeze(this);
  }
}
