import { describe, expect, it } from 'vitest';
import {
  DuplicateEntryError,
  InvalidInvitationError,
  NotFoundOrDeletedError,
  StaffInvitationId,
  UserId,
  ValidationError,
} from '@campus-id/domain';
import type { AcceptInvitationInput } from '../../src/staff/application/staff-registration.service';
import { STRONG_PASSWORD, T0, createHarness, type Harness } from '../support/harness';
import { publishedTypes } from '../support/memory-platform';

const CREATOR = UserId.from('5b9d1f0e-2c4a-4e8b-9f3d-7a6c5e4b3a21');

async function invite(
  harness: Harness,
  recipientsEmail: string[],
  validFrom = T0
) {
  return harness.invitationService.create({
    creatorId: CREATOR,
    recipientsEmail,
    validFrom,
    validUntil: validFrom.plus(24 * 60 * 60 * 1000),
  });
}

const acceptance = (
  code: string,
  overrides: Partial<AcceptInvitationInput> = {}
): AcceptInvitationInput => ({
  code,
  email: 'staff@example.com',
  barcode: 'STF000001',
  username: 'jdoe',
  firstName: 'Jane',
  lastName: 'Doe',
  password: STRONG_PASSWORD,
  ...overrides,
});

describe('StaffRegistrationService.acceptInvitation', () => {
  it('creates a staff account for an invited email', async () => {
    const harness = createHarness();
    const invitation = await invite(harness, ['staff@example.com']);

    const { userId } = await harness.staffRegistrationService.acceptInvitation(
      acceptance(invitation.code, { email: 'Staff@Example.com' })
    );

    expect(harness.db.tables.users).toEqual([
      expect.objectContaining({
        id: userId,
        email: 'staff@example.com',
        username: 'jdoe',
        barcode: 'STF000001',
        role: 'staff',
        pass_hash: expect.stringMatching(/^scrypt\$10\$/),
      }),
    ]);
    expect(harness.db.tables.staff).toEqual([
      { user_id: userId, invitation_id: invitation.id },
    ]);
    expect(publishedTypes(harness, 'events_staff')).toEqual(['StaffRegistered']);
  });

  it('validates the password before looking the invitation up', async () => {
    const harness = createHarness();

    await expect(
      harness.staffRegistrationService.acceptInvitation(
        acceptance('NOSUCHCODE', { password: 'password' })
      )
    ).rejects.toBeInstanceOf(ValidationError);
    expect(harness.db.commits).toBe(0);
  });

  it('reports an unknown code as not found', async () => {
    const harness = createHarness();

    await expect(
      harness.staffRegistrationService.acceptInvitation(acceptance('NOSUCHCODE'))
    ).rejects.toBeInstanceOf(NotFoundOrDeletedError);
  });

  it('rejects an email that is not among the recipients', async () => {
    const harness = createHarness();
    const invitation = await invite(harness, ['someone@example.com']);

    await expect(
      harness.staffRegistrationService.acceptInvitation(
        acceptance(invitation.code)
      )
    ).rejects.toBeInstanceOf(InvalidInvitationError);
    expect(harness.db.tables.users).toHaveLength(0);
  });

  it('rejects acceptance before the window opens', async () => {
    const harness = createHarness();
    const invitation = await invite(
      harness,
      ['staff@example.com'],
      T0.plus(60 * 60 * 1000)
    );

    await expect(
      harness.staffRegistrationService.acceptInvitation(
        acceptance(invitation.code)
      )
    ).rejects.toBeInstanceOf(InvalidInvitationError);
  });

  it('reports a deleted invitation as not found', async () => {
    const harness = createHarness();
    const invitation = await invite(harness, ['staff@example.com']);
    await harness.invitationService.delete({
      callerId: CREATOR,
      invitationId: StaffInvitationId.from(invitation.id),
    });

    await expect(
      harness.staffRegistrationService.acceptInvitation(
        acceptance(invitation.code)
      )
    ).rejects.toBeInstanceOf(NotFoundOrDeletedError);
  });

  it('rejects a username another user holds', async () => {
    const harness = createHarness();
    const invitation = await invite(harness, [
      'staff@example.com',
      'second@example.com',
    ]);
    await harness.staffRegistrationService.acceptInvitation(
      acceptance(invitation.code)
    );

    const failure = harness.staffRegistrationService.acceptInvitation(
      acceptance(invitation.code, {
        email: 'second@example.com',
        barcode: 'STF000002',
      })
    );

    await expect(failure).rejects.toBeInstanceOf(DuplicateEntryError);
    await expect(failure).rejects.toMatchObject({ field: 'username' });
    expect(harness.db.tables.users).toHaveLength(1);
  });

  it('rejects a second acceptance by the same email', async () => {
    const harness = createHarness();
    const invitation = await invite(harness, ['staff@example.com']);
    await harness.staffRegistrationService.acceptInvitation(
      acceptance(invitation.code)
    );

    const failure = harness.staffRegistrationService.acceptInvitation(
      acceptance(invitation.code, { barcode: 'STF000002', username: 'jdoe2' })
    );

    await expect(failure).rejects.toMatchObject({ field: 'email' });
  });
});
