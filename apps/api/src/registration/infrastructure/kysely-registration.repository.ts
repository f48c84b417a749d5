import { Injectable } from '@nestjs/common';
import { NoRowsAffectedError, type Registration } from '@campus-id/domain';
import type { KyselyTx } from '@platform/infrastructure/persistence/kysely-transaction.runner';
import {
  RegistrationRepository,
  type FindOptions,
} from '../application/ports/registration-repository';
import { registrationFromRow, registrationToRow } from './registration.rows';

@Injectable()
export class KyselyRegistrationRepository extends RegistrationRepository<KyselyTx> {
  async findByEmail(
    tx: KyselyTx,
    email: string,
    options: FindOptions = {}
  ): Promise<Registration | null> {
    let query = tx
      .selectFrom('registrations')
      .selectAll()
      .where('email', '=', email);
    if (options.forUpdate) {
      query = query.forUpdate();
    }
    const row = await query.executeTakeFirst();
    return row ? registrationFromRow(row) : null;
  }

  async insert(tx: KyselyTx, registration: Registration): Promise<void> {
    await tx
      .insertInto('registrations')
      .values(registrationToRow(registration))
      .execute();
  }

  async update(tx: KyselyTx, registration: Registration): Promise<void> {
    const { id, created_at: _createdAt, ...changes } =
      registrationToRow(registration);
    const result = await tx
      .updateTable('registrations')
      .set(changes)
      .where('id', '=', id)
      .executeTakeFirst();
    if (Number(result.numUpdatedRows) === 0) {
      throw new NoRowsAffectedError('registration');
    }
  }
}
