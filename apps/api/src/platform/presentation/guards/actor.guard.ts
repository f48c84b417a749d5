import {
  Injectable,
  UnauthorizedException,
  createParamDecorator,
  type CanActivate,
  type ExecutionContext,
} from '@nestjs/common';
import type { Request } from 'express';
import { UserId, isUuid } from '@campus-id/domain';

export const ACTOR_HEADER = 'x-user-id';

/**
 * Trusts the caller id set by the upstream gateway. Session handling lives
 * in front of this service.
 */
@Injectable()
export class ActorGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers[ACTOR_HEADER];
    const value = Array.isArray(header) ? header[0] : header;
    if (!value || !isUuid(value)) {
      throw new UnauthorizedException(
        `A valid ${ACTOR_HEADER} header is required`
      );
    }
    request.actorId = UserId.from(value);
    return true;
  }
}

export const Actor = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): UserId => {
    const request = ctx.switchToHttp().getRequest<Request>();
    if (!request.actorId) {
      throw new UnauthorizedException('Caller identity missing');
    }
    return request.actorId;
  }
);
