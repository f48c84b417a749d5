import { Inject, Injectable } from '@nestjs/common';
import type { Transaction } from 'kysely';
import {
  TransactionRunner,
  type TransactionOptions,
} from '../../application/ports/transaction-runner';
import { DatabaseService } from '../database/database.service';
import type { Database } from '../database/database.types';

export type KyselyTx = Transaction<Database>;

@Injectable()
export class KyselyTransactionRunner extends TransactionRunner<KyselyTx> {
  constructor(
    @Inject(DatabaseService) private readonly database: DatabaseService
  ) {
    super();
  }

  async run<T>(
    work: (tx: KyselyTx) => Promise<T>,
    options: TransactionOptions = {}
  ): Promise<T> {
    options.signal?.throwIfAborted();
    return this.database.getDb().transaction().execute(work);
  }
}
