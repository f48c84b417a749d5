import {
  EventId,
  GroupId,
  RegistrationCodeResent,
  RegistrationCompleted,
  RegistrationFailed,
  RegistrationId,
  RegistrationStarted,
  RegistrationVerified,
  StaffInvitationCreated,
  StaffInvitationDeleted,
  StaffInvitationId,
  StaffInvitationRecipientsUpdated,
  StaffInvitationValidityUpdated,
  StaffRegistered,
  StudentRegistered,
  Timestamp,
  TracingCarrier,
  UserId,
  eventStreams,
  registrationEventTypes,
  staffInvitationEventTypes,
  userEventTypes,
  type AnyDomainEvent,
  type DomainEventType,
  type EventEnvelope,
  type StreamName,
} from '@campus-id/domain';
import { z } from 'zod';

const storedPayloadV1 = z.object({
  header: z.object({
    id: z.string(),
    timestamp: z.number(),
    metadata: z.record(z.string()),
  }),
  tracing: z.record(z.string()),
  data: z.unknown(),
});

export type StoredEventPayload = {
  header: { id: string; timestamp: number; metadata: Record<string, string> };
  tracing: Record<string, string>;
  data: Record<string, unknown>;
};

export type EncodedEvent = Readonly<{
  eventId: string;
  eventType: DomainEventType;
  streamName: StreamName;
  occurredAt: Date;
  payload: StoredEventPayload;
}>;

export type DecodedEvent =
  | Readonly<{ kind: 'event'; event: AnyDomainEvent }>
  | Readonly<{ kind: 'unknown'; eventType: string }>;

const registrationStartedV1 = z.object({
  registrationId: z.string(),
  email: z.string(),
  verificationCode: z.string(),
  codeExpiresAt: z.number(),
  startedAt: z.number(),
});

const registrationVerifiedV1 = z.object({
  registrationId: z.string(),
  email: z.string(),
  verifiedAt: z.number(),
});

const registrationFailedV1 = z.object({
  registrationId: z.string(),
  email: z.string(),
  reason: z.string(),
  failedAt: z.number(),
});

const registrationCodeResentV1 = z.object({
  registrationId: z.string(),
  email: z.string(),
  verificationCode: z.string(),
  codeExpiresAt: z.number(),
  resentAt: z.number(),
});

const registrationCompletedV1 = z.object({
  registrationId: z.string(),
  email: z.string(),
  barcode: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  groupId: z.string(),
  passwordHash: z.string(),
  completedAt: z.number(),
});

const invitationCreatedV1 = z.object({
  staffInvitationId: z.string(),
  creatorId: z.string(),
  code: z.string(),
  recipientsEmail: z.array(z.string()),
  validFrom: z.number().nullable(),
  validUntil: z.number().nullable(),
  createdAt: z.number(),
});

const invitationRecipientsUpdatedV1 = z.object({
  staffInvitationId: z.string(),
  code: z.string(),
  addedRecipientsEmail: z.array(z.string()),
  currentRecipientsEmail: z.array(z.string()),
  changedAt: z.number(),
});

const invitationValidityUpdatedV1 = z.object({
  staffInvitationId: z.string(),
  validFrom: z.number().nullable(),
  validUntil: z.number().nullable(),
  changedAt: z.number(),
});

const invitationDeletedV1 = z.object({
  staffInvitationId: z.string(),
  deletedAt: z.number(),
});

const studentRegisteredV1 = z.object({
  userId: z.string(),
  barcode: z.string(),
  email: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  groupId: z.string(),
  registrationId: z.string().nullable(),
  registeredAt: z.number(),
});

const staffRegisteredV1 = z.object({
  userId: z.string(),
  barcode: z.string(),
  username: z.string(),
  email: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  invitationId: z.string(),
  registeredAt: z.number(),
});

const millis = (value: Timestamp | null): number | null =>
  value ? value.value : null;

const fromMillis = (value: number | null): Timestamp | null =>
  value === null ? null : Timestamp.fromMillis(value);

const serializeData = (event: AnyDomainEvent): Record<string, unknown> => {
  switch (event.eventType) {
    case registrationEventTypes.registrationStarted:
      return {
        registrationId: event.registrationId.value,
        email: event.email,
        verificationCode: event.verificationCode,
        codeExpiresAt: event.codeExpiresAt.value,
        startedAt: event.startedAt.value,
      };
    case registrationEventTypes.registrationVerified:
      return {
        registrationId: event.registrationId.value,
        email: event.email,
        verifiedAt: event.verifiedAt.value,
      };
    case registrationEventTypes.registrationFailed:
      return {
        registrationId: event.registrationId.value,
        email: event.email,
        reason: event.reason,
        failedAt: event.failedAt.value,
      };
    case registrationEventTypes.registrationCodeResent:
      return {
        registrationId: event.registrationId.value,
        email: event.email,
        verificationCode: event.verificationCode,
        codeExpiresAt: event.codeExpiresAt.value,
        resentAt: event.resentAt.value,
      };
    case registrationEventTypes.registrationCompleted:
      return {
        registrationId: event.registrationId.value,
        email: event.email,
        barcode: event.barcode,
        firstName: event.firstName,
        lastName: event.lastName,
        groupId: event.groupId.value,
        passwordHash: event.passwordHash,
        completedAt: event.completedAt.value,
      };
    case staffInvitationEventTypes.staffInvitationCreated:
      return {
        staffInvitationId: event.staffInvitationId.value,
        creatorId: event.creatorId.value,
        code: event.code,
        recipientsEmail: [...event.recipientsEmail],
        validFrom: millis(event.validFrom),
        validUntil: millis(event.validUntil),
        createdAt: event.createdAt.value,
      };
    case staffInvitationEventTypes.staffInvitationRecipientsUpdated:
      return {
        staffInvitationId: event.staffInvitationId.value,
        code: event.code,
        addedRecipientsEmail: [...event.addedRecipientsEmail],
        currentRecipientsEmail: [...event.currentRecipientsEmail],
        changedAt: event.changedAt.value,
      };
    case staffInvitationEventTypes.staffInvitationValidityUpdated:
      return {
        staffInvitationId: event.staffInvitationId.value,
        validFrom: millis(event.validFrom),
        validUntil: millis(event.validUntil),
        changedAt: event.changedAt.value,
      };
    case staffInvitationEventTypes.staffInvitationDeleted:
      return {
        staffInvitationId: event.staffInvitationId.value,
        deletedAt: event.deletedAt.value,
      };
    case userEventTypes.studentRegistered:
      return {
        userId: event.userId.value,
        barcode: event.barcode,
        email: event.email,
        firstName: event.firstName,
        lastName: event.lastName,
        groupId: event.groupId.value,
        registrationId: event.registrationId
          ? event.registrationId.value
          : null,
        registeredAt: event.registeredAt.value,
      };
    case userEventTypes.staffRegistered:
      return {
        userId: event.userId.value,
        barcode: event.barcode,
        username: event.username,
        email: event.email,
        firstName: event.firstName,
        lastName: event.lastName,
        invitationId: event.invitationId.value,
        registeredAt: event.registeredAt.value,
      };
    default: {
      const _exhaustiveCheck: never = event;
      throw new Error('Unsupported domain event type');
    }
  }
};

type Decoder = (raw: unknown, envelope: EventEnvelope) => AnyDomainEvent;

const decoder =
  <T>(
    eventType: DomainEventType,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    build: (data: T, envelope: EventEnvelope) => AnyDomainEvent
  ): Decoder =>
  (raw, envelope) => {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => i.message).join('; ');
      throw new Error(`Invalid payload for ${eventType}: ${issues}`);
    }
    return build(parsed.data, envelope);
  };

const toDomain: { readonly [K in DomainEventType]: Decoder } = {
  [registrationEventTypes.registrationStarted]: decoder(
    registrationEventTypes.registrationStarted,
    registrationStartedV1,
    (data, envelope) =>
      new RegistrationStarted(
        {
          registrationId: RegistrationId.from(data.registrationId),
          email: data.email,
          verificationCode: data.verificationCode,
          codeExpiresAt: Timestamp.fromMillis(data.codeExpiresAt),
          startedAt: Timestamp.fromMillis(data.startedAt),
        },
        envelope
      )
  ),
  [registrationEventTypes.registrationVerified]: decoder(
    registrationEventTypes.registrationVerified,
    registrationVerifiedV1,
    (data, envelope) =>
      new RegistrationVerified(
        {
          registrationId: RegistrationId.from(data.registrationId),
          email: data.email,
          verifiedAt: Timestamp.fromMillis(data.verifiedAt),
        },
        envelope
      )
  ),
  [registrationEventTypes.registrationFailed]: decoder(
    registrationEventTypes.registrationFailed,
    registrationFailedV1,
    (data, envelope) =>
      new RegistrationFailed(
        {
          registrationId: RegistrationId.from(data.registrationId),
          email: data.email,
          reason: data.reason,
          failedAt: Timestamp.fromMillis(data.failedAt),
        },
        envelope
      )
  ),
  [registrationEventTypes.registrationCodeResent]: decoder(
    registrationEventTypes.registrationCodeResent,
    registrationCodeResentV1,
    (data, envelope) =>
      new RegistrationCodeResent(
        {
          registrationId: RegistrationId.from(data.registrationId),
          email: data.email,
          verificationCode: data.verificationCode,
          codeExpiresAt: Timestamp.fromMillis(data.codeExpiresAt),
          resentAt: Timestamp.fromMillis(data.resentAt),
        },
        envelope
      )
  ),
  [registrationEventTypes.registrationCompleted]: decoder(
    registrationEventTypes.registrationCompleted,
    registrationCompletedV1,
    (data, envelope) =>
      new RegistrationCompleted(
        {
          registrationId: RegistrationId.from(data.registrationId),
          email: data.email,
          barcode: data.barcode,
          firstName: data.firstName,
          lastName: data.lastName,
          groupId: GroupId.from(data.groupId),
          passwordHash: data.passwordHash,
          completedAt: Timestamp.fromMillis(data.completedAt),
        },
        envelope
      )
  ),
  [staffInvitationEventTypes.staffInvitationCreated]: decoder(
    staffInvitationEventTypes.staffInvitationCreated,
    invitationCreatedV1,
    (data, envelope) =>
      new StaffInvitationCreated(
        {
          staffInvitationId: StaffInvitationId.from(data.staffInvitationId),
          creatorId: UserId.from(data.creatorId),
          code: data.code,
          recipientsEmail: data.recipientsEmail,
          validFrom: fromMillis(data.validFrom),
          validUntil: fromMillis(data.validUntil),
          createdAt: Timestamp.fromMillis(data.createdAt),
        },
        envelope
      )
  ),
  [staffInvitationEventTypes.staffInvitationRecipientsUpdated]: decoder(
    staffInvitationEventTypes.staffInvitationRecipientsUpdated,
    invitationRecipientsUpdatedV1,
    (data, envelope) =>
      new StaffInvitationRecipientsUpdated(
        {
          staffInvitationId: StaffInvitationId.from(data.staffInvitationId),
          code: data.code,
          addedRecipientsEmail: data.addedRecipientsEmail,
          currentRecipientsEmail: data.currentRecipientsEmail,
          changedAt: Timestamp.fromMillis(data.changedAt),
        },
        envelope
      )
  ),
  [staffInvitationEventTypes.staffInvitationValidityUpdated]: decoder(
    staffInvitationEventTypes.staffInvitationValidityUpdated,
    invitationValidityUpdatedV1,
    (data, envelope) =>
      new StaffInvitationValidityUpdated(
        {
          staffInvitationId: StaffInvitationId.from(data.staffInvitationId),
          validFrom: fromMillis(data.validFrom),
          validUntil: fromMillis(data.validUntil),
          changedAt: Timestamp.fromMillis(data.changedAt),
        },
        envelope
      )
  ),
  [staffInvitationEventTypes.staffInvitationDeleted]: decoder(
    staffInvitationEventTypes.staffInvitationDeleted,
    invitationDeletedV1,
    (data, envelope) =>
      new StaffInvitationDeleted(
        {
          staffInvitationId: StaffInvitationId.from(data.staffInvitationId),
          deletedAt: Timestamp.fromMillis(data.deletedAt),
        },
        envelope
      )
  ),
  [userEventTypes.studentRegistered]: decoder(
    userEventTypes.studentRegistered,
    studentRegisteredV1,
    (data, envelope) =>
      new StudentRegistered(
        {
          userId: UserId.from(data.userId),
          barcode: data.barcode,
          email: data.email,
          firstName: data.firstName,
          lastName: data.lastName,
          groupId: GroupId.from(data.groupId),
          registrationId: data.registrationId
            ? RegistrationId.from(data.registrationId)
            : null,
          registeredAt: Timestamp.fromMillis(data.registeredAt),
        },
        envelope
      )
  ),
  [userEventTypes.staffRegistered]: decoder(
    userEventTypes.staffRegistered,
    staffRegisteredV1,
    (data, envelope) =>
      new StaffRegistered(
        {
          userId: UserId.from(data.userId),
          barcode: data.barcode,
          username: data.username,
          email: data.email,
          firstName: data.firstName,
          lastName: data.lastName,
          invitationId: StaffInvitationId.from(data.invitationId),
          registeredAt: Timestamp.fromMillis(data.registeredAt),
        },
        envelope
      )
  ),
};

const isKnownEventType = (eventType: string): eventType is DomainEventType =>
  Object.hasOwn(eventStreams, eventType);

/**
 * Outbox payload format: `{ header, tracing, data }`, with timestamps as
 * epoch milliseconds. Decoding restores the original header and tracing
 * carrier, so event ids survive redelivery.
 */
export const EventCodec = {
  encode(event: AnyDomainEvent): EncodedEvent {
    return {
      eventId: event.eventId.value,
      eventType: event.eventType,
      streamName: event.streamName,
      occurredAt: event.occurredAt.toDate(),
      payload: {
        header: {
          id: event.header.id.value,
          timestamp: event.header.timestamp.value,
          metadata: { ...event.header.metadata },
        },
        tracing: { ...event.tracing.carrier },
        data: serializeData(event),
      },
    };
  },

  decode(eventType: string, rawPayload: unknown): DecodedEvent {
    if (!isKnownEventType(eventType)) {
      return { kind: 'unknown', eventType };
    }
    const parsed = storedPayloadV1.safeParse(rawPayload);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => i.message).join('; ');
      throw new Error(`Invalid envelope for ${eventType}: ${issues}`);
    }
    const { header, tracing, data } = parsed.data;
    const envelope: EventEnvelope = {
      header: Object.freeze({
        id: EventId.from(header.id),
        timestamp: Timestamp.fromMillis(header.timestamp),
        metadata: Object.freeze({ ...header.metadata }),
      }),
      tracing: TracingCarrier.from(tracing),
    };
    return { kind: 'event', event: toDomain[eventType](data, envelope) };
  },
};
