import type { INestApplication } from '@nestjs/common';
import { DomainErrorFilter } from './filters/domain-error.filter';

/**
 * HTTP-wide settings, shared by the server entry point and the end-to-end
 * tests.
 */
export function configureApp(app: INestApplication): void {
  app.useGlobalFilters(new DomainErrorFilter());
}
