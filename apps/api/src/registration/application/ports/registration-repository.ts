import type { Registration } from '@campus-id/domain';

export type FindOptions = Readonly<{
  /** Lock the row until the transaction ends. */
  forUpdate?: boolean;
}>;

export abstract class RegistrationRepository<Tx> {
  abstract findByEmail(
    tx: Tx,
    email: string,
    options?: FindOptions
  ): Promise<Registration | null>;

  abstract insert(tx: Tx, registration: Registration): Promise<void>;

  /** Throws `NoRowsAffectedError` when the row is gone. */
  abstract update(tx: Tx, registration: Registration): Promise<void>;
}
