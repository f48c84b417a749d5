export type OutboxRecord = Readonly<{
  streamName: string;
  offset: number;
  eventId: string;
  eventType: string;
  payload: unknown;
  createdAt: Date;
}>;

/**
 * Read side of the outbox, with one stored position per
 * (stream, consumer group).
 */
export abstract class OutboxStore {
  /** Creates the group's position at 0 unless it exists; returns it. */
  abstract subscribe(streamName: string, consumerGroup: string): Promise<number>;

  abstract currentOffset(
    streamName: string,
    consumerGroup: string
  ): Promise<number>;

  abstract fetchAfter(
    streamName: string,
    offset: number,
    limit: number
  ): Promise<OutboxRecord[]>;

  /**
   * Moves the position from `expected` to `next`. Returns false when the
   * stored position is no longer `expected`.
   */
  abstract advance(
    streamName: string,
    consumerGroup: string,
    expected: number,
    next: number
  ): Promise<boolean>;
}
