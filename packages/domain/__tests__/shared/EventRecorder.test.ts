import { describe, expect, it } from 'vitest';
import { EventRecorder } from '../../src/shared/EventRecorder';
import { RegistrationVerified } from '../../src/registration/events';
import { RegistrationId } from '../../src/registration/RegistrationId';
import { Timestamp } from '../../src/shared/vos/Timestamp';

const makeEvent = (email: string) =>
  new RegistrationVerified({
    registrationId: RegistrationId.create(),
    email,
    verifiedAt: Timestamp.fromMillis(1_700_000_000_000),
  });

describe('EventRecorder', () => {
  it('keeps events in recording order', () => {
    const recorder = new EventRecorder<RegistrationVerified>();
    recorder.record(makeEvent('first@example.com'));
    recorder.record(makeEvent('second@example.com'));

    expect(recorder.getUncommittedEvents().map((e) => e.email)).toEqual([
      'first@example.com',
      'second@example.com',
    ]);
  });

  it('returns a copy that later records do not change', () => {
    const recorder = new EventRecorder<RegistrationVerified>();
    recorder.record(makeEvent('first@example.com'));
    const view = recorder.getUncommittedEvents();
    recorder.record(makeEvent('second@example.com'));

    expect(view).toHaveLength(1);
    expect(recorder.getUncommittedEvents()).toHaveLength(2);
  });

  it('empties the buffer on clear', () => {
    const recorder = new EventRecorder<RegistrationVerified>();
    recorder.record(makeEvent('first@example.com'));
    recorder.clear();

    expect(recorder.getUncommittedEvents()).toEqual([]);
  });
});
