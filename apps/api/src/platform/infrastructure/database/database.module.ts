import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../../config/app.config';
import { OutboxPublisher } from '../../application/ports/outbox-publisher';
import { OutboxStore } from '../../application/ports/outbox-store';
import { TransactionRunner } from '../../application/ports/transaction-runner';
import { KyselyOutboxPublisher } from '../outbox/kysely-outbox.publisher';
import { KyselyOutboxStore } from '../outbox/kysely-outbox.store';
import { KyselyTransactionRunner } from '../persistence/kysely-transaction.runner';
import { DatabaseService, createPostgresDatabase } from './database.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: DatabaseService,
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new DatabaseService(
          createPostgresDatabase(config.get('DATABASE_URL', { infer: true }))
        ),
    },
    { provide: TransactionRunner, useClass: KyselyTransactionRunner },
    { provide: OutboxPublisher, useClass: KyselyOutboxPublisher },
    { provide: OutboxStore, useClass: KyselyOutboxStore },
  ],
  exports: [DatabaseService, TransactionRunner, OutboxPublisher, OutboxStore],
})
export class DatabaseModule {}
