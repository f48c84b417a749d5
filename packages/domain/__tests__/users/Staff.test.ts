import { describe, expect, it } from 'vitest';
import { Staff } from '../../src/users/Staff';
import { StaffRegistered } from '../../src/users/events';
import { StaffInvitationId } from '../../src/invitations/StaffInvitationId';
import { ValidationError } from '../../src/shared/errors';
import { Timestamp } from '../../src/shared/vos/Timestamp';
import { singleEvent } from '../support/events';

const input = {
  barcode: 'EMP0042',
  username: 'grace.hopper',
  email: 'grace@example.com',
  firstName: 'Grace',
  lastName: 'Hopper',
  passwordHash: 'scrypt$15$c2FsdA==$aGFzaA==',
  invitationId: StaffInvitationId.create(),
  registeredAt: Timestamp.fromMillis(1_700_000_000_000),
};

describe('Staff', () => {
  it('registers and records StaffRegistered', () => {
    const staff = Staff.register(input);

    expect(staff.profile.role).toBe('staff');
    const event = singleEvent(staff.getUncommittedEvents(), StaffRegistered);
    expect(event.username).toBe('grace.hopper');
    expect(event.invitationId.equals(input.invitationId)).toBe(true);
    expect(event.streamName).toBe('events_staff');
  });

  it('rejects usernames with consecutive separators', () => {
    expect(() => Staff.register({ ...input, username: 'grace..hopper' })).toThrow(
      ValidationError
    );
  });

  it('clears its buffer only when told the events are committed', () => {
    const staff = Staff.register(input);
    expect(staff.getUncommittedEvents()).toHaveLength(1);

    staff.markEventsAsCommitted();

    expect(staff.getUncommittedEvents()).toEqual([]);
  });
});
