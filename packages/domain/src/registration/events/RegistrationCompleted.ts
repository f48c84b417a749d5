import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { GroupId } from '../../users/GroupId';
import { RegistrationId } from '../RegistrationId';
import { registrationEventTypes } from './eventTypes';

export interface RegistrationCompletedPayload {
  registrationId: RegistrationId;
  email: string;
  barcode: string;
  firstName: string;
  lastName: string;
  groupId: GroupId;
  passwordHash: string;
  completedAt: Timestamp;
}

/**
 * Emitted when a verified registration submits its profile. The student
 * consumer creates the account from this snapshot; the password is only
 * ever carried hashed.
 */
export class RegistrationCompleted
  extends DomainEvent<typeof registrationEventTypes.registrationCompleted>
  implements RegistrationCompletedPayload
{
  readonly eventType = registrationEventTypes.registrationCompleted;
  readonly streamName = streams.registration;

  readonly registrationId: RegistrationId;
  readonly email: string;
  readonly barcode: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly groupId: GroupId;
  readonly passwordHash: string;
  readonly completedAt: Timestamp;

  constructor(payload: RegistrationCompletedPayload, envelope?: EventEnvelope) {
    super(payload.completedAt, envelope);
    this.registrationId = payload.registrationId;
    this.email = payload.email;
    this.barcode = payload.barcode;
    this.firstName = payload.firstName;
    this.lastName = payload.lastName;
    this.groupId = payload.groupId;
    this.passwordHash = payload.passwordHash;
    this.completedAt = payload.completedAt;
    Object.freeze(this);
  }
}
