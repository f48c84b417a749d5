import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import type { AppConfig } from './config/app.config';
import { setupTracing } from '@platform/infrastructure/tracing/tracing.setup';
import { configureApp } from '@platform/presentation/configure-app';

async function bootstrap(): Promise<void> {
  setupTracing();
  const app = await NestFactory.create(AppModule);
  configureApp(app);
  app.enableShutdownHooks();

  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const port = config.get('PORT', { infer: true });
  await app.listen(port);
  new Logger('Bootstrap').log(`Listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Startup failed',
    error instanceof Error ? error.stack : String(error)
  );
  process.exit(1);
});
