import { Injectable, type NestMiddleware } from '@nestjs/common';
import { ROOT_CONTEXT, context, propagation } from '@opentelemetry/api';
import type { NextFunction, Request, Response } from 'express';

/**
 * Continues the caller's trace: incoming `traceparent` and `baggage`
 * headers become the active context for the rest of the request.
 */
@Injectable()
export class TraceContextMiddleware implements NestMiddleware {
  use(req: Request, _res: Response, next: NextFunction): void {
    const incoming = propagation.extract(ROOT_CONTEXT, req.headers);
    context.with(incoming, next);
  }
}
