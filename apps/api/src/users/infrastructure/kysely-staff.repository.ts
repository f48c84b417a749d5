import { Injectable } from '@nestjs/common';
import type { Staff } from '@campus-id/domain';
import type { KyselyTx } from '@platform/infrastructure/persistence/kysely-transaction.runner';
import { StaffRepository } from '../application/ports/staff-repository';
import { toUserConflict } from './user-conflicts';
import { staffToRows } from './user.rows';

@Injectable()
export class KyselyStaffRepository extends StaffRepository<KyselyTx> {
  async insert(tx: KyselyTx, staff: Staff): Promise<void> {
    const rows = staffToRows(staff);
    try {
      await tx.insertInto('users').values(rows.user).execute();
    } catch (error) {
      throw toUserConflict(error);
    }
    await tx.insertInto('staff').values(rows.staff).execute();
  }
}
