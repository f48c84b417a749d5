import { describe, expect, it } from 'vitest';
import {
  AlreadyExistsError,
  DuplicateEntryError,
  GroupId,
  RegistrationId,
  Staff,
  StaffInvitationId,
  Student,
  UserId,
} from '@campus-id/domain';
import type { KyselyTx } from '../../src/platform/infrastructure/persistence/kysely-transaction.runner';
import { KyselyStaffRepository } from '../../src/users/infrastructure/kysely-staff.repository';
import { KyselyStudentRepository } from '../../src/users/infrastructure/kysely-student.repository';
import { KyselyUserDirectory } from '../../src/users/infrastructure/kysely-user-directory';
import { studentToRows } from '../../src/users/infrastructure/user.rows';
import { GROUP_ID, T0 } from '../support/harness';
import {
  RecordingDatabase,
  uniqueViolation,
} from '../support/recording-database';

const USERS_INSERT = /^insert into "users"/;
const PASS_HASH = 'scrypt$10$c2FsdA==$a2V5';

const registerStudent = () =>
  Student.register({
    barcode: 'STU202401',
    email: 'ada@example.com',
    firstName: 'Ada',
    lastName: 'Lovelace',
    passwordHash: PASS_HASH,
    groupId: GroupId.from(GROUP_ID),
    registrationId: RegistrationId.create(),
    registeredAt: T0,
  });

const registerStaff = () =>
  Staff.register({
    barcode: 'STF000001',
    username: 'jdoe',
    email: 'staff@example.com',
    firstName: 'Jane',
    lastName: 'Doe',
    passwordHash: PASS_HASH,
    invitationId: StaffInvitationId.create(),
    registeredAt: T0,
  });

const inTransaction = <T>(
  recording: RecordingDatabase,
  work: (tx: KyselyTx) => Promise<T>
): Promise<T> => recording.db.transaction().execute(work);

describe('KyselyStudentRepository', () => {
  const repository = new KyselyStudentRepository();

  it('maps a taken barcode to DuplicateEntryError', async () => {
    const recording = new RecordingDatabase().on(
      USERS_INSERT,
      uniqueViolation('users_barcode_key')
    );

    const inserting = inTransaction(recording, (tx) =>
      repository.insert(tx, registerStudent())
    );

    await expect(inserting).rejects.toBeInstanceOf(DuplicateEntryError);
    await expect(inserting).rejects.toMatchObject({ field: 'barcode' });
    expect(
      recording.statements.some((statement) =>
        statement.startsWith('insert into "students"')
      )
    ).toBe(false);
  });

  it('writes the user row before the student row', async () => {
    const recording = new RecordingDatabase();
    const student = registerStudent();

    await inTransaction(recording, (tx) => repository.insert(tx, student));

    expect(
      recording.statements.filter((statement) =>
        statement.startsWith('insert into')
      )
    ).toEqual([
      expect.stringMatching(/^insert into "users"/),
      expect.stringMatching(/^insert into "students"/),
    ]);
    expect(recording.find(/^insert into "students"/).parameters).toEqual([
      student.id.value,
      GROUP_ID,
      student.registrationId?.value,
    ]);
  });

  it('loads a student by user id through one join', async () => {
    const student = registerStudent();
    const rows = studentToRows(student);
    const recording = new RecordingDatabase().on(/from "students"/, {
      rows: [
        {
          ...rows.user,
          group_id: rows.student.group_id,
          registration_id: rows.student.registration_id,
        },
      ],
    });

    const found = await inTransaction(recording, (tx) =>
      repository.findById(tx, student.id)
    );

    const select = recording.find(/from "students"/);
    expect(select.sql).toBe(
      'select "users".*, "students"."group_id", "students"."registration_id" from "students" inner join "users" on "users"."id" = "students"."user_id" where "students"."user_id" = $1'
    );
    expect(select.parameters).toEqual([student.id.value]);
    expect(found?.id.value).toBe(student.id.value);
    expect(found?.groupId.value).toBe(GROUP_ID);
    expect(found?.registrationId?.value).toBe(student.registrationId?.value);
    expect(found?.profile.createdAt.value).toBe(T0.value);
  });

  it('returns null for an unknown student', async () => {
    const recording = new RecordingDatabase();

    const found = await inTransaction(recording, (tx) =>
      repository.findById(tx, UserId.create())
    );

    expect(found).toBeNull();
  });
});

describe('KyselyStaffRepository', () => {
  const repository = new KyselyStaffRepository();

  it('maps a taken username to DuplicateEntryError', async () => {
    const recording = new RecordingDatabase().on(
      USERS_INSERT,
      uniqueViolation('users_username_key')
    );

    await expect(
      inTransaction(recording, (tx) => repository.insert(tx, registerStaff()))
    ).rejects.toMatchObject({ code: 'DUPLICATE_ENTRY', field: 'username' });
  });

  it('maps any other users violation to AlreadyExistsError', async () => {
    const recording = new RecordingDatabase().on(
      USERS_INSERT,
      uniqueViolation('users_pkey')
    );

    await expect(
      inTransaction(recording, (tx) => repository.insert(tx, registerStaff()))
    ).rejects.toThrow(new AlreadyExistsError('User already exists'));
  });

  it('passes other errors through', async () => {
    const failure = new Error('connection reset');
    const recording = new RecordingDatabase().on(USERS_INSERT, failure);

    await expect(
      inTransaction(recording, (tx) => repository.insert(tx, registerStaff()))
    ).rejects.toBe(failure);
  });
});

describe('KyselyUserDirectory', () => {
  const directory = new KyselyUserDirectory();

  it('reports the barcode when only the barcode is taken', async () => {
    const recording = new RecordingDatabase().on(/from "users"/, {
      rows: [
        {
          email: 'other@example.com',
          barcode: 'STU202401',
          username: 'other',
        },
      ],
    });

    const conflict = await inTransaction(recording, (tx) =>
      directory.findConflict(tx, {
        email: 'ada@example.com',
        barcode: 'STU202401',
        username: 'ada',
      })
    );

    expect(conflict).toBe('barcode');
    expect(recording.find(/from "users"/).parameters).toEqual([
      'ada@example.com',
      'STU202401',
      'ada',
    ]);
  });

  it('reports the email first', async () => {
    const recording = new RecordingDatabase().on(/from "users"/, {
      rows: [
        { email: 'x@example.com', barcode: 'STU202401', username: 'x' },
        { email: 'ada@example.com', barcode: 'STU000000', username: 'y' },
      ],
    });

    const conflict = await inTransaction(recording, (tx) =>
      directory.findConflict(tx, {
        email: 'ada@example.com',
        barcode: 'STU202401',
      })
    );

    expect(conflict).toBe('email');
  });

  it('finds a profile by barcode', async () => {
    const student = registerStudent();
    const recording = new RecordingDatabase().on(/from "users"/, {
      rows: [studentToRows(student).user],
    });

    const profile = await inTransaction(recording, (tx) =>
      directory.findProfile(tx, { barcode: 'STU202401' })
    );

    const select = recording.find(/from "users"/);
    expect(select.sql).toBe('select * from "users" where "barcode" = $1');
    expect(select.parameters).toEqual(['STU202401']);
    expect(profile).toMatchObject({
      barcode: 'STU202401',
      email: 'ada@example.com',
      role: 'student',
      passwordHash: PASS_HASH,
    });
    expect(profile?.id.value).toBe(student.id.value);
  });

  it('finds a profile by id', async () => {
    const recording = new RecordingDatabase();
    const id = UserId.create();

    const profile = await inTransaction(recording, (tx) =>
      directory.findProfile(tx, { id })
    );

    expect(profile).toBeNull();
    expect(recording.find(/from "users"/)).toEqual({
      sql: 'select * from "users" where "id" = $1',
      parameters: [id.value],
    });
  });
});
