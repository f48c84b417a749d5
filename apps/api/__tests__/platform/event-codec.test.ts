import { describe, expect, it } from 'vitest';
import {
  StaffInvitation,
  StaffInvitationCreated,
  Timestamp,
  TracingCarrier,
  UserId,
} from '@campus-id/domain';
import { EventCodec } from '../../src/platform/application/events/event-codec';
import { T0 } from '../support/harness';

const CREATOR = UserId.from('5b9d1f0e-2c4a-4e8b-9f3d-7a6c5e4b3a21');

function createdEvent(): StaffInvitationCreated {
  const [event] = StaffInvitation.create({
    creatorId: CREATOR,
    recipientsEmail: ['one@example.com'],
    validFrom: null,
    validUntil: T0.plus(60 * 60 * 1000),
    createdAt: T0,
  }).getUncommittedEvents();
  if (!(event instanceof StaffInvitationCreated)) {
    throw new Error('expected StaffInvitationCreated');
  }
  return event;
}

describe('EventCodec', () => {
  it('stores header, tracing and data with millisecond timestamps', () => {
    const event = createdEvent();

    const encoded = EventCodec.encode(event);

    expect(encoded).toMatchObject({
      eventId: event.eventId.value,
      eventType: 'StaffInvitationCreated',
      streamName: 'events_staff_invitation',
      occurredAt: T0.toDate(),
      payload: {
        header: { id: event.eventId.value, timestamp: T0.value, metadata: {} },
        data: {
          staffInvitationId: event.staffInvitationId.value,
          creatorId: CREATOR.value,
          code: event.code,
          recipientsEmail: ['one@example.com'],
          validFrom: null,
          validUntil: T0.value + 60 * 60 * 1000,
          createdAt: T0.value,
        },
      },
    });
  });

  it('restores the event id and tracing carrier', () => {
    const original = new StaffInvitationCreated(
      {
        staffInvitationId: createdEvent().staffInvitationId,
        creatorId: CREATOR,
        code: 'AB12CD34EF',
        recipientsEmail: ['one@example.com'],
        validFrom: null,
        validUntil: null,
        createdAt: T0,
      },
      {
        tracing: TracingCarrier.from({
          traceparent: '00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01',
        }),
      }
    );
    const stored = JSON.parse(JSON.stringify(EventCodec.encode(original).payload));

    const decoded = EventCodec.decode('StaffInvitationCreated', stored);

    if (decoded.kind !== 'event') throw new Error('expected a known event');
    expect(decoded.event).toBeInstanceOf(StaffInvitationCreated);
    expect(decoded.event.eventId.value).toBe(original.eventId.value);
    expect(decoded.event.occurredAt.equals(T0)).toBe(true);
    expect(decoded.event.tracing.carrier).toEqual(original.tracing.carrier);
  });

  it('reports event types it does not know', () => {
    expect(EventCodec.decode('RegistrationArchived', {})).toEqual({
      kind: 'unknown',
      eventType: 'RegistrationArchived',
    });
  });

  it('ignores inherited property names when matching types', () => {
    expect(EventCodec.decode('toString', {})).toEqual({
      kind: 'unknown',
      eventType: 'toString',
    });
  });

  it('rejects a payload that does not match the type', () => {
    const stored = JSON.parse(JSON.stringify(EventCodec.encode(createdEvent()).payload));
    stored.data.createdAt = 'yesterday';

    expect(() => EventCodec.decode('StaffInvitationCreated', stored)).toThrow(
      /^Invalid payload for StaffInvitationCreated: /
    );
  });

  it('keeps a decoded timestamp exact', () => {
    const stored = JSON.parse(JSON.stringify(EventCodec.encode(createdEvent()).payload));

    const decoded = EventCodec.decode('StaffInvitationCreated', stored);

    if (decoded.kind !== 'event' || !(decoded.event instanceof StaffInvitationCreated)) {
      throw new Error('expected StaffInvitationCreated');
    }
    expect(decoded.event.validUntil?.equals(Timestamp.fromMillis(T0.value + 3_600_000))).toBe(true);
  });
});
