import type { RegistrationId, Student, UserId } from '@campus-id/domain';

export abstract class StudentRepository<Tx> {
  abstract findById(tx: Tx, id: UserId): Promise<Student | null>;

  abstract findByRegistration(
    tx: Tx,
    registrationId: RegistrationId
  ): Promise<Student | null>;

  /** Throws `DuplicateEntryError` when email, barcode or username is taken. */
  abstract insert(tx: Tx, student: Student): Promise<void>;
}
