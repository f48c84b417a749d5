import {
  NoRowsAffectedError,
  type Registration,
  type RegistrationId,
  type Staff,
  type StaffInvitation,
  type StaffInvitationId,
  type Student,
  type UserId,
  type UserProfile,
} from '@campus-id/domain';
import {
  RegistrationRepository,
  type FindOptions,
} from '../../src/registration/application/ports/registration-repository';
import {
  registrationFromRow,
  registrationToRow,
} from '../../src/registration/infrastructure/registration.rows';
import { StaffInvitationRepository } from '../../src/staff/application/ports/staff-invitation-repository';
import {
  staffInvitationFromRow,
  staffInvitationToRow,
} from '../../src/staff/infrastructure/staff-invitation.rows';
import { StaffRepository } from '../../src/users/application/ports/staff-repository';
import { StudentRepository } from '../../src/users/application/ports/student-repository';
import {
  UserDirectory,
  type UserIdentityCandidate,
  type UserIdentityField,
  type UserLookup,
} from '../../src/users/application/ports/user-directory';
import { toUserConflict } from '../../src/users/infrastructure/user-conflicts';
import {
  profileFromRow,
  staffToRows,
  studentFromRows,
  studentToRows,
  userCriterion,
  type UserRow,
} from '../../src/users/infrastructure/user.rows';
import {
  UniqueViolationError,
  type MemoryTables,
  type MemoryTx,
} from './memory-database';

export class MemoryRegistrationRepository extends RegistrationRepository<MemoryTx> {
  async findByEmail(
    tx: MemoryTx,
    email: string,
    _options?: FindOptions
  ): Promise<Registration | null> {
    const row = tx.tables.registrations.find((r) => r.email === email);
    return row ? registrationFromRow(row) : null;
  }

  async insert(tx: MemoryTx, registration: Registration): Promise<void> {
    const row = registrationToRow(registration);
    if (tx.tables.registrations.some((r) => r.email === row.email)) {
      throw new UniqueViolationError('registrations_email_key');
    }
    tx.tables.registrations.push(row);
  }

  async update(tx: MemoryTx, registration: Registration): Promise<void> {
    const row = registrationToRow(registration);
    const index = tx.tables.registrations.findIndex((r) => r.id === row.id);
    if (index === -1) {
      throw new NoRowsAffectedError('registration');
    }
    tx.tables.registrations[index] = row;
  }
}

export class MemoryStaffInvitationRepository extends StaffInvitationRepository<MemoryTx> {
  async findById(
    tx: MemoryTx,
    id: StaffInvitationId
  ): Promise<StaffInvitation | null> {
    const row = tx.tables.staffInvitations.find((r) => r.id === id.value);
    return row ? staffInvitationFromRow(row) : null;
  }

  async findByCode(tx: MemoryTx, code: string): Promise<StaffInvitation | null> {
    const row = tx.tables.staffInvitations.find((r) => r.code === code);
    return row ? staffInvitationFromRow(row) : null;
  }

  async insert(tx: MemoryTx, invitation: StaffInvitation): Promise<void> {
    const row = staffInvitationToRow(invitation);
    if (tx.tables.staffInvitations.some((r) => r.code === row.code)) {
      throw new UniqueViolationError('staff_invitations_code_key');
    }
    tx.tables.staffInvitations.push(row);
  }

  async update(tx: MemoryTx, invitation: StaffInvitation): Promise<void> {
    const row = staffInvitationToRow(invitation);
    const index = tx.tables.staffInvitations.findIndex((r) => r.id === row.id);
    if (index === -1) {
      throw new NoRowsAffectedError('staff invitation');
    }
    tx.tables.staffInvitations[index] = row;
  }
}

const uniqueUserColumns = [
  ['email', 'users_email_key'],
  ['barcode', 'users_barcode_key'],
  ['username', 'users_username_key'],
] as const;

function insertUser(tables: MemoryTables, row: UserRow): void {
  for (const [column, constraint] of uniqueUserColumns) {
    if (tables.users.some((u) => u[column] === row[column])) {
      throw toUserConflict(new UniqueViolationError(constraint));
    }
  }
  tables.users.push(row);
}

export class MemoryUserDirectory extends UserDirectory<MemoryTx> {
  async findConflict(
    tx: MemoryTx,
    candidate: UserIdentityCandidate
  ): Promise<UserIdentityField | null> {
    const { users } = tx.tables;
    if (users.some((u) => u.email === candidate.email)) return 'email';
    if (candidate.barcode && users.some((u) => u.barcode === candidate.barcode)) {
      return 'barcode';
    }
    if (
      candidate.username &&
      users.some((u) => u.username === candidate.username)
    ) {
      return 'username';
    }
    return null;
  }

  async findProfile(
    tx: MemoryTx,
    lookup: UserLookup
  ): Promise<UserProfile | null> {
    const { column, value } = userCriterion(lookup);
    const row = tx.tables.users.find((u) => u[column] === value);
    return row ? profileFromRow(row) : null;
  }
}

export class MemoryStudentRepository extends StudentRepository<MemoryTx> {
  async findById(tx: MemoryTx, id: UserId): Promise<Student | null> {
    const student = tx.tables.students.find((s) => s.user_id === id.value);
    const user = tx.tables.users.find((u) => u.id === id.value);
    return student && user ? studentFromRows(user, student) : null;
  }

  async findByRegistration(
    tx: MemoryTx,
    registrationId: RegistrationId
  ): Promise<Student | null> {
    const student = tx.tables.students.find(
      (s) => s.registration_id === registrationId.value
    );
    const user = student
      ? tx.tables.users.find((u) => u.id === student.user_id)
      : undefined;
    return student && user ? studentFromRows(user, student) : null;
  }

  async insert(tx: MemoryTx, student: Student): Promise<void> {
    const rows = studentToRows(student);
    insertUser(tx.tables, rows.user);
    if (
      rows.student.registration_id !== null &&
      tx.tables.students.some(
        (s) => s.registration_id === rows.student.registration_id
      )
    ) {
      throw new UniqueViolationError('students_registration_id_key');
    }
    tx.tables.students.push(rows.student);
  }
}

export class MemoryStaffRepository extends StaffRepository<MemoryTx> {
  async insert(tx: MemoryTx, staff: Staff): Promise<void> {
    const rows = staffToRows(staff);
    insertUser(tx.tables, rows.user);
    tx.tables.staff.push(rows.staff);
  }
}
