import { Injectable } from '@nestjs/common';
import {
  NoRowsAffectedError,
  type StaffInvitation,
  type StaffInvitationId,
} from '@campus-id/domain';
import type { KyselyTx } from '@platform/infrastructure/persistence/kysely-transaction.runner';
import {
  StaffInvitationRepository,
  type FindOptions,
} from '../application/ports/staff-invitation-repository';
import {
  staffInvitationFromRow,
  staffInvitationToRow,
} from './staff-invitation.rows';

@Injectable()
export class KyselyStaffInvitationRepository extends StaffInvitationRepository<KyselyTx> {
  findById(
    tx: KyselyTx,
    id: StaffInvitationId,
    options: FindOptions = {}
  ): Promise<StaffInvitation | null> {
    return this.findOne(tx, 'id', id.value, options);
  }

  findByCode(
    tx: KyselyTx,
    code: string,
    options: FindOptions = {}
  ): Promise<StaffInvitation | null> {
    return this.findOne(tx, 'code', code, options);
  }

  async insert(tx: KyselyTx, invitation: StaffInvitation): Promise<void> {
    await tx
      .insertInto('staff_invitations')
      .values(staffInvitationToRow(invitation))
      .execute();
  }

  async update(tx: KyselyTx, invitation: StaffInvitation): Promise<void> {
    const {
      id,
      code: _code,
      creator_id: _creatorId,
      created_at: _createdAt,
      ...changes
    } = staffInvitationToRow(invitation);
    const result = await tx
      .updateTable('staff_invitations')
      .set(changes)
      .where('id', '=', id)
      .executeTakeFirst();
    if (Number(result.numUpdatedRows) === 0) {
      throw new NoRowsAffectedError('staff invitation');
    }
  }

  private async findOne(
    tx: KyselyTx,
    column: 'id' | 'code',
    value: string,
    options: FindOptions
  ): Promise<StaffInvitation | null> {
    let query = tx
      .selectFrom('staff_invitations')
      .selectAll()
      .where(column, '=', value);
    if (options.forUpdate) {
      query = query.forUpdate();
    }
    const row = await query.executeTakeFirst();
    return row ? staffInvitationFromRow(row) : null;
  }
}
