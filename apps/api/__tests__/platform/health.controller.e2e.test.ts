import 'reflect-metadata';
import type { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { EventProcessor } from '../../src/platform/application/events/event-processor';
import { DatabaseService } from '../../src/platform/infrastructure/database/database.service';
import { configureApp } from '../../src/platform/presentation/configure-app';
import { HealthController } from '../../src/platform/presentation/health.controller';
import { processorOptions } from '../support/harness';
import { MemoryDatabase } from '../support/memory-database';
import { MemoryOutboxStore } from '../support/memory-platform';

describe('HealthController', () => {
  let app: INestApplication;
  const ping = vi.fn<() => Promise<void>>();

  beforeEach(async () => {
    ping.mockReset();
    const moduleRef = await Test.createTestingModule({
      controllers: [HealthController],
      providers: [
        { provide: DatabaseService, useValue: { ping } },
        {
          provide: EventProcessor,
          useValue: new EventProcessor(
            new MemoryOutboxStore(new MemoryDatabase()),
            processorOptions
          ),
        },
      ],
    }).compile();
    app = moduleRef.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports the database and the processor state', async () => {
    ping.mockResolvedValue(undefined);

    const response = await request(app.getHttpServer()).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', db: true, events: false });
  });

  it('fails with 500 when the database is unreachable', async () => {
    ping.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const response = await request(app.getHttpServer()).get('/health');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    });
  });
});
