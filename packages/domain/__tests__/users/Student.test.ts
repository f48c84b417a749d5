import { describe, expect, it } from 'vitest';
import { Student } from '../../src/users/Student';
import { GroupId } from '../../src/users/GroupId';
import { StudentRegistered } from '../../src/users/events';
import { RegistrationId } from '../../src/registration/RegistrationId';
import { ValidationError } from '../../src/shared/errors';
import { Timestamp } from '../../src/shared/vos/Timestamp';
import { singleEvent } from '../support/events';

const registeredAt = Timestamp.fromMillis(1_700_000_000_000);
const groupId = GroupId.from('8d0f6a52-5c1e-4f4b-9a51-3f1d2b7c9e10');

const input = {
  barcode: '240101',
  email: 'Student@Example.com',
  firstName: 'Ada',
  lastName: 'Lovelace',
  passwordHash: 'scrypt$15$c2FsdA==$aGFzaA==',
  groupId,
  registrationId: RegistrationId.create(),
  registeredAt,
};

describe('Student', () => {
  it('registers with the barcode as username and records StudentRegistered', () => {
    const student = Student.register(input);

    expect(student.profile.username).toBe('240101');
    expect(student.profile.email).toBe('student@example.com');
    expect(student.profile.role).toBe('student');
    const event = singleEvent(student.getUncommittedEvents(), StudentRegistered);
    expect(event.userId.equals(student.id)).toBe(true);
    expect(event.groupId.equals(groupId)).toBe(true);
    expect(event.registrationId?.equals(input.registrationId)).toBe(true);
    expect(event.streamName).toBe('events_student');
  });

  it('requires a group', () => {
    expect(() =>
      Student.register({
        ...input,
        groupId: GroupId.from('00000000-0000-0000-0000-000000000000'),
      })
    ).toThrow(ValidationError);
  });

  it('validates the profile fields', () => {
    try {
      Student.register({ ...input, firstName: 'R2-D2', email: 'nope' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.fields.map((f) => f.field)).toEqual(['email', 'firstName']);
      }
    }
  });

  it('rehydrates without events', () => {
    const registered = Student.register(input);
    const student = Student.rehydrate(registered.toSnapshot());

    expect(student.id.equals(registered.id)).toBe(true);
    expect(student.getUncommittedEvents()).toEqual([]);
  });
});
