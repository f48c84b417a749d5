import { Timestamp } from '@campus-id/domain';

export abstract class Clock {
  abstract now(): Timestamp;
}

export class SystemClock extends Clock {
  now(): Timestamp {
    return Timestamp.now();
  }
}
