import type { UserId } from '@campus-id/domain';

declare module 'express-serve-static-core' {
  interface Request {
    actorId?: UserId;
  }
}
