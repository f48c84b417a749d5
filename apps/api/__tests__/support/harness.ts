import { Timestamp } from '@campus-id/domain';
import {
  EventProcessor,
  type EventProcessorOptions,
} from '../../src/platform/application/events/event-processor';
import { ScryptPasswordHasher } from '../../src/platform/infrastructure/security/scrypt-password.hasher';
import { RegistrationService } from '../../src/registration/application/registration.service';
import { StaffInvitationService } from '../../src/staff/application/staff-invitation.service';
import { StaffRegistrationService } from '../../src/staff/application/staff-registration.service';
import { CredentialService } from '../../src/users/application/credential.service';
import { StudentQueryService } from '../../src/users/application/student-query.service';
import { StudentRegistrationHandler } from '../../src/users/application/student-registration.handler';
import { MemoryDatabase, type MemoryTx } from './memory-database';
import {
  FixedClock,
  MemoryOutboxPublisher,
  MemoryOutboxStore,
  MemoryTransactionRunner,
} from './memory-platform';
import {
  MemoryRegistrationRepository,
  MemoryStaffInvitationRepository,
  MemoryStaffRepository,
  MemoryStudentRepository,
  MemoryUserDirectory,
} from './memory-repositories';

export const T0 = Timestamp.fromMillis(Date.UTC(2026, 0, 15, 9, 0, 0));

export const processorOptions: EventProcessorOptions = {
  autoStart: false,
  pollIntervalMs: 10,
  retryIntervalMs: 10,
  batchSize: 50,
};

/**
 * Every service wired over one in-memory database.
 */
export function createHarness(now: Timestamp = T0) {
  const db = new MemoryDatabase();
  const clock = new FixedClock(now);
  const runner = new MemoryTransactionRunner(db);
  const outbox = new MemoryOutboxPublisher();
  const store = new MemoryOutboxStore(db);
  const registrations = new MemoryRegistrationRepository();
  const invitations = new MemoryStaffInvitationRepository();
  const users = new MemoryUserDirectory();
  const students = new MemoryStudentRepository();
  const staff = new MemoryStaffRepository();
  // lowest cost the config accepts, to keep tests fast
  const hasher = new ScryptPasswordHasher(10);

  return {
    db,
    clock,
    runner,
    outbox,
    store,
    hasher,
    registrationService: new RegistrationService<MemoryTx>(
      runner,
      outbox,
      registrations,
      users,
      hasher,
      clock
    ),
    invitationService: new StaffInvitationService<MemoryTx>(
      runner,
      outbox,
      invitations,
      clock
    ),
    staffRegistrationService: new StaffRegistrationService<MemoryTx>(
      runner,
      outbox,
      invitations,
      staff,
      users,
      hasher,
      clock
    ),
    credentialService: new CredentialService<MemoryTx>(runner, users, hasher),
    studentQueryService: new StudentQueryService<MemoryTx>(
      runner,
      students,
      users
    ),
    studentHandler: new StudentRegistrationHandler<MemoryTx>(
      runner,
      outbox,
      students,
      users,
      clock
    ),
    createProcessor: (options: Partial<EventProcessorOptions> = {}) =>
      new EventProcessor(store, { ...processorOptions, ...options }),
  };
}

export type Harness = ReturnType<typeof createHarness>;

/** The code of the stored registration for `email`. */
export function storedCode(harness: Harness, email: string): string {
  const row = harness.db.tables.registrations.find((r) => r.email === email);
  if (!row) {
    throw new Error(`No registration for ${email}`);
  }
  return row.verification_code;
}

export const STRONG_PASSWORD = 'Passw0rd!';
export const GROUP_ID = '3f5b8c2e-9a41-4d7e-b6a0-1c2d3e4f5a6b';
