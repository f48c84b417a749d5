import { Inject, Injectable } from '@nestjs/common';
import {
  ForbiddenError,
  NotFoundError,
  type Student,
  type UserId,
} from '@campus-id/domain';
import { TransactionRunner } from '@platform/application/ports/transaction-runner';
import { StudentRepository } from './ports/student-repository';
import { UserDirectory } from './ports/user-directory';

export type StudentView = Readonly<{
  id: string;
  barcode: string;
  email: string;
  firstName: string;
  lastName: string;
  groupId: string;
  role: 'student';
  registeredAt: string;
}>;

export const toStudentView = (student: Student): StudentView => ({
  id: student.id.value,
  barcode: student.profile.barcode,
  email: student.profile.email,
  firstName: student.profile.firstName,
  lastName: student.profile.lastName,
  groupId: student.groupId.value,
  role: 'student',
  registeredAt: student.profile.createdAt.toISOString(),
});

@Injectable()
export class StudentQueryService<Tx = unknown> {
  constructor(
    @Inject(TransactionRunner) private readonly runner: TransactionRunner<Tx>,
    @Inject(StudentRepository)
    private readonly students: StudentRepository<Tx>,
    @Inject(UserDirectory) private readonly users: UserDirectory<Tx>
  ) {}

  /**
   * A student may read their own record; staff may read any student's.
   */
  async get(
    target: Readonly<{ callerId: UserId; studentId: UserId }>,
    signal?: AbortSignal
  ): Promise<StudentView> {
    const isSelf = target.callerId.equals(target.studentId);
    const { student, caller } = await this.runner.run(
      async (tx) => ({
        student: await this.students.findById(tx, target.studentId),
        caller: isSelf
          ? null
          : await this.users.findProfile(tx, { id: target.callerId }),
      }),
      { signal }
    );
    if (!isSelf && caller?.role !== 'staff') {
      throw new ForbiddenError('Only the student or staff may view a student');
    }
    if (!student) {
      throw new NotFoundError('Student');
    }
    return toStudentView(student);
  }
}
