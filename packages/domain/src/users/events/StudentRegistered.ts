import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { RegistrationId } from '../../registration/RegistrationId';
import { GroupId } from '../GroupId';
import { UserId } from '../UserId';
import { userEventTypes } from './eventTypes';

export interface StudentRegisteredPayload {
  userId: UserId;
  barcode: string;
  email: string;
  firstName: string;
  lastName: string;
  groupId: GroupId;
  registrationId: RegistrationId | null;
  registeredAt: Timestamp;
}

export class StudentRegistered
  extends DomainEvent<typeof userEventTypes.studentRegistered>
  implements StudentRegisteredPayload
{
  readonly eventType = userEventTypes.studentRegistered;
  readonly streamName = streams.student;

  readonly userId: UserId;
  readonly barcode: string;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly groupId: GroupId;
  readonly registrationId: RegistrationId | null;
  readonly registeredAt: Timestamp;

  constructor(payload: StudentRegisteredPayload, envelope?: EventEnvelope) {
    super(payload.registeredAt, envelope);
    this.userId = payload.userId;
    this.barcode = payload.barcode;
    this.email = payload.email;
    this.firstName = payload.firstName;
    this.lastName = payload.lastName;
    this.groupId = payload.groupId;
    this.registrationId = payload.registrationId;
    this.registeredAt = payload.registeredAt;
    Object.freeze(this);
  }
}
