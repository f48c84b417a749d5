import {
  registrationEventTypes,
  type RegistrationEvent,
} from '../registration/events';
import {
  staffInvitationEventTypes,
  type StaffInvitationEvent,
} from '../invitations/events';
import {
  userEventTypes,
  type StaffRegistered,
  type StudentRegistered,
} from '../users/events';
import { streams, type StreamName } from './streams';

export * from './streams';

/**
 * Every event the domain can produce, discriminated by `eventType`.
 */
export type AnyDomainEvent =
  | RegistrationEvent
  | StaffInvitationEvent
  | StudentRegistered
  | StaffRegistered;

export type DomainEventType = AnyDomainEvent['eventType'];

export type EventOfType<T extends DomainEventType> = Extract<
  AnyDomainEvent,
  { eventType: T }
>;

/**
 * Stream each event type is published to.
 */
export const eventStreams: { readonly [T in DomainEventType]: StreamName } = {
  [registrationEventTypes.registrationStarted]: streams.registration,
  [registrationEventTypes.registrationVerified]: streams.registration,
  [registrationEventTypes.registrationFailed]: streams.registration,
  [registrationEventTypes.registrationCodeResent]: streams.registration,
  [registrationEventTypes.registrationCompleted]: streams.registration,
  [staffInvitationEventTypes.staffInvitationCreated]: streams.staffInvitation,
  [staffInvitationEventTypes.staffInvitationRecipientsUpdated]:
    streams.staffInvitation,
  [staffInvitationEventTypes.staffInvitationValidityUpdated]:
    streams.staffInvitation,
  [staffInvitationEventTypes.staffInvitationDeleted]: streams.staffInvitation,
  [userEventTypes.studentRegistered]: streams.student,
  [userEventTypes.staffRegistered]: streams.staff,
};

export function isEventOfType<T extends DomainEventType>(
  event: AnyDomainEvent,
  eventType: T
): event is EventOfType<T> {
  return event.eventType === eventType;
}
