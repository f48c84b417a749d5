import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/app.config';
import {
  EVENT_PROCESSOR_OPTIONS,
  EventProcessor,
  type EventProcessorOptions,
} from './application/events/event-processor';
import { Clock, SystemClock } from './application/ports/clock';
import { PasswordHasher } from './application/ports/password-hasher';
import { DatabaseModule } from './infrastructure/database/database.module';
import { ScryptPasswordHasher } from './infrastructure/security/scrypt-password.hasher';
import { HealthController } from './presentation/health.controller';

/**
 * Cross-cutting services every bounded context depends on: persistence,
 * the event processor, the clock and password hashing.
 */
@Global()
@Module({
  imports: [ConfigModule, DatabaseModule],
  controllers: [HealthController],
  providers: [
    { provide: Clock, useClass: SystemClock },
    {
      provide: PasswordHasher,
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new ScryptPasswordHasher(
          config.get('PASSWORD_HASH_COST', { infer: true })
        ),
      inject: [ConfigService],
    },
    {
      provide: EVENT_PROCESSOR_OPTIONS,
      useFactory: (
        config: ConfigService<AppConfig, true>
      ): EventProcessorOptions => ({
        autoStart: config.get('EVENT_PROCESSOR_ENABLED', { infer: true }),
        pollIntervalMs: config.get('OUTBOX_POLL_INTERVAL_MS', { infer: true }),
        retryIntervalMs: config.get('OUTBOX_RETRY_INTERVAL_MS', {
          infer: true,
        }),
        batchSize: config.get('OUTBOX_BATCH_SIZE', { infer: true }),
      }),
      inject: [ConfigService],
    },
    EventProcessor,
  ],
  exports: [DatabaseModule, Clock, PasswordHasher, EventProcessor],
})
export class PlatformModule {}
