import { Injectable } from '@nestjs/common';
import type { RegistrationId, Student, UserId } from '@campus-id/domain';
import type { KyselyTx } from '@platform/infrastructure/persistence/kysely-transaction.runner';
import { StudentRepository } from '../application/ports/student-repository';
import { toUserConflict } from './user-conflicts';
import {
  studentFromRows,
  studentToRows,
  type StudentRow,
  type UserRow,
} from './user.rows';

const selectStudent = (tx: KyselyTx) =>
  tx
    .selectFrom('students')
    .innerJoin('users', 'users.id', 'students.user_id')
    .selectAll('users')
    .select(['students.group_id', 'students.registration_id']);

type JoinedStudentRow = UserRow &
  Pick<StudentRow, 'group_id' | 'registration_id'>;

const fromJoinedRow = (row: JoinedStudentRow): Student =>
  studentFromRows(row, {
    user_id: row.id,
    group_id: row.group_id,
    registration_id: row.registration_id,
  });

@Injectable()
export class KyselyStudentRepository extends StudentRepository<KyselyTx> {
  async findById(tx: KyselyTx, id: UserId): Promise<Student | null> {
    const row = await selectStudent(tx)
      .where('students.user_id', '=', id.value)
      .executeTakeFirst();
    return row ? fromJoinedRow(row) : null;
  }

  async findByRegistration(
    tx: KyselyTx,
    registrationId: RegistrationId
  ): Promise<Student | null> {
    const row = await selectStudent(tx)
      .where('students.registration_id', '=', registrationId.value)
      .executeTakeFirst();
    return row ? fromJoinedRow(row) : null;
  }

  async insert(tx: KyselyTx, student: Student): Promise<void> {
    const rows = studentToRows(student);
    try {
      await tx.insertInto('users').values(rows.user).execute();
    } catch (error) {
      throw toUserConflict(error);
    }
    await tx.insertInto('students').values(rows.student).execute();
  }
}
