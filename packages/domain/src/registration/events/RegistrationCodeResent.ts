import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { RegistrationId } from '../RegistrationId';
import { registrationEventTypes } from './eventTypes';

export interface RegistrationCodeResentPayload {
  registrationId: RegistrationId;
  email: string;
  verificationCode: string;
  codeExpiresAt: Timestamp;
  resentAt: Timestamp;
}

export class RegistrationCodeResent
  extends DomainEvent<typeof registrationEventTypes.registrationCodeResent>
  implements RegistrationCodeResentPayload
{
  readonly eventType = registrationEventTypes.registrationCodeResent;
  readonly streamName = streams.registration;

  readonly registrationId: RegistrationId;
  readonly email: string;
  readonly verificationCode: string;
  readonly codeExpiresAt: Timestamp;
  readonly resentAt: Timestamp;

  constructor(payload: RegistrationCodeResentPayload, envelope?: EventEnvelope) {
    super(payload.resentAt, envelope);
    this.registrationId = payload.registrationId;
    this.email = payload.email;
    this.verificationCode = payload.verificationCode;
    this.codeExpiresAt = payload.codeExpiresAt;
    this.resentAt = payload.resentAt;
    Object.freeze(this);
  }
}
