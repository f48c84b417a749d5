import type { Staff } from '@campus-id/domain';

export abstract class StaffRepository<Tx> {
  /** Throws `DuplicateEntryError` when email, barcode or username is taken. */
  abstract insert(tx: Tx, staff: Staff): Promise<void>;
}
