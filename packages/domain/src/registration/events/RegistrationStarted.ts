import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { RegistrationId } from '../RegistrationId';
import { registrationEventTypes } from './eventTypes';

export interface RegistrationStartedPayload {
  registrationId: RegistrationId;
  email: string;
  verificationCode: string;
  codeExpiresAt: Timestamp;
  startedAt: Timestamp;
}

/**
 * Emitted when a student registration is opened. Carries the code so the
 * mail consumer can deliver it.
 */
export class RegistrationStarted
  extends DomainEvent<typeof registrationEventTypes.registrationStarted>
  implements RegistrationStartedPayload
{
  readonly eventType = registrationEventTypes.registrationStarted;
  readonly streamName = streams.registration;

  readonly registrationId: RegistrationId;
  readonly email: string;
  readonly verificationCode: string;
  readonly codeExpiresAt: Timestamp;
  readonly startedAt: Timestamp;

  constructor(payload: RegistrationStartedPayload, envelope?: EventEnvelope) {
    super(payload.startedAt, envelope);
    this.registrationId = payload.registrationId;
    this.email = payload.email;
    this.verificationCode = payload.verificationCode;
    this.codeExpiresAt = payload.codeExpiresAt;
    this.startedAt = payload.startedAt;
    Object.freeze(this);
  }
}
