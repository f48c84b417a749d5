import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { RegistrationId } from '../RegistrationId';
import { registrationEventTypes } from './eventTypes';

export interface RegistrationVerifiedPayload {
  registrationId: RegistrationId;
  email: string;
  verifiedAt: Timestamp;
}

export class RegistrationVerified
  extends DomainEvent<typeof registrationEventTypes.registrationVerified>
  implements RegistrationVerifiedPayload
{
  readonly eventType = registrationEventTypes.registrationVerified;
  readonly streamName = streams.registration;

  readonly registrationId: RegistrationId;
  readonly email: string;
  readonly verifiedAt: Timestamp;

  constructor(payload: RegistrationVerifiedPayload, envelope?: EventEnvelope) {
    super(payload.verifiedAt, envelope);
    this.registrationId = payload.registrationId;
    this.email = payload.email;
    this.verifiedAt = payload.verifiedAt;
    Object.freeze(this);
  }
}
