import { Controller, Get, Inject } from '@nestjs/common';
import { DatabaseService } from '@platform/infrastructure/database/database.service';
import { EventProcessor } from '@platform/application/events/event-processor';

@Controller('health')
export class HealthController {
  constructor(
    @Inject(DatabaseService) private readonly database: DatabaseService,
    @Inject(EventProcessor) private readonly processor: EventProcessor
  ) {}

  @Get()
  async check(): Promise<{ status: 'ok'; db: boolean; events: boolean }> {
    await this.database.ping();
    return { status: 'ok', db: true, events: this.processor.running };
  }
}
