import type { Selectable } from 'kysely';
import {
  GroupId,
  RegistrationId,
  Staff,
  Student,
  Timestamp,
  UserId,
  type UserProfile,
} from '@campus-id/domain';
import type {
  StaffTable,
  StudentsTable,
  UsersTable,
} from '@platform/infrastructure/database/database.types';
import type { UserLookup } from '../application/ports/user-directory';

export type UserRow = Selectable<UsersTable>;
export type StudentRow = Selectable<StudentsTable>;
export type StaffRow = Selectable<StaffTable>;

export type UserCriterion = Readonly<{
  column: 'id' | 'email' | 'barcode';
  value: string;
}>;

export const userCriterion = (lookup: UserLookup): UserCriterion => {
  if ('id' in lookup) return { column: 'id', value: lookup.id.value };
  if ('email' in lookup) return { column: 'email', value: lookup.email };
  return { column: 'barcode', value: lookup.barcode };
};

export const userToRow = (profile: UserProfile): UserRow => ({
  id: profile.id.value,
  barcode: profile.barcode,
  username: profile.username,
  email: profile.email,
  first_name: profile.firstName,
  last_name: profile.lastName,
  pass_hash: profile.passwordHash,
  role: profile.role,
  created_at: profile.createdAt.toDate(),
  updated_at: profile.updatedAt.toDate(),
});

export const profileFromRow = (row: UserRow): UserProfile => ({
  id: UserId.from(row.id),
  barcode: row.barcode,
  username: row.username,
  email: row.email,
  firstName: row.first_name,
  lastName: row.last_name,
  passwordHash: row.pass_hash,
  role: row.role,
  createdAt: Timestamp.fromDate(new Date(row.created_at)),
  updatedAt: Timestamp.fromDate(new Date(row.updated_at)),
});

export const studentToRows = (
  student: Student
): { user: UserRow; student: StudentRow } => ({
  user: userToRow(student.profile),
  student: {
    user_id: student.id.value,
    group_id: student.groupId.value,
    registration_id: student.registrationId
      ? student.registrationId.value
      : null,
  },
});

export const studentFromRows = (user: UserRow, student: StudentRow): Student =>
  Student.rehydrate({
    profile: profileFromRow(user),
    groupId: GroupId.from(student.group_id),
    registrationId: student.registration_id
      ? RegistrationId.from(student.registration_id)
      : null,
  });

export const staffToRows = (
  staff: Staff
): { user: UserRow; staff: StaffRow } => ({
  user: userToRow(staff.profile),
  staff: {
    user_id: staff.id.value,
    invitation_id: staff.invitationId ? staff.invitationId.value : null,
  },
});
