import { DomainEvent, type EventEnvelope } from '../../shared/DomainEvent';
import { Timestamp } from '../../shared/vos/Timestamp';
import { streams } from '../../events/streams';
import { RegistrationId } from '../RegistrationId';
import { registrationEventTypes } from './eventTypes';

export interface RegistrationFailedPayload {
  registrationId: RegistrationId;
  email: string;
  reason: string;
  failedAt: Timestamp;
}

/**
 * Emitted once, on the attempt that exhausts the verification budget.
 */
export class RegistrationFailed
  extends DomainEvent<typeof registrationEventTypes.registrationFailed>
  implements RegistrationFailedPayload
{
  readonly eventType = registrationEventTypes.registrationFailed;
  readonly streamName = streams.registration;

  readonly registrationId: RegistrationId;
  readonly email: string;
  readonly reason: string;
  readonly failedAt: Timestamp;

  constructor(payload: RegistrationFailedPayload, envelope?: EventEnvelope) {
    super(payload.failedAt, envelope);
    this.registrationId = payload.registrationId;
    this.email = payload.email;
    this.reason = payload.reason;
    this.failedAt = payload.failedAt;
    Object.freeze(this);
  }
}
