import { Injectable } from '@nestjs/common';
import type { UserProfile } from '@campus-id/domain';
import type { KyselyTx } from '@platform/infrastructure/persistence/kysely-transaction.runner';
import {
  UserDirectory,
  type UserIdentityCandidate,
  type UserIdentityField,
  type UserLookup,
} from '../application/ports/user-directory';
import { profileFromRow, userCriterion } from './user.rows';

@Injectable()
export class KyselyUserDirectory extends UserDirectory<KyselyTx> {
  async findConflict(
    tx: KyselyTx,
    candidate: UserIdentityCandidate
  ): Promise<UserIdentityField | null> {
    const rows = await tx
      .selectFrom('users')
      .select(['email', 'barcode', 'username'])
      .where((eb) => {
        const conditions = [eb('email', '=', candidate.email)];
        if (candidate.barcode !== undefined) {
          conditions.push(eb('barcode', '=', candidate.barcode));
        }
        if (candidate.username !== undefined) {
          conditions.push(eb('username', '=', candidate.username));
        }
        return eb.or(conditions);
      })
      .execute();

    if (rows.some((row) => row.email === candidate.email)) return 'email';
    if (rows.some((row) => row.barcode === candidate.barcode)) return 'barcode';
    if (rows.some((row) => row.username === candidate.username)) {
      return 'username';
    }
    return null;
  }

  async findProfile(
    tx: KyselyTx,
    lookup: UserLookup
  ): Promise<UserProfile | null> {
    const { column, value } = userCriterion(lookup);
    const row = await tx
      .selectFrom('users')
      .selectAll()
      .where(column, '=', value)
      .executeTakeFirst();
    return row ? profileFromRow(row) : null;
  }
}
