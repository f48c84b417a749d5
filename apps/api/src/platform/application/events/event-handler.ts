import {
  eventStreams,
  isEventOfType,
  type AnyDomainEvent,
  type DomainEventType,
  type EventOfType,
  type StreamName,
} from '@campus-id/domain';

/**
 * A consumer of one event type. Registered alone, its `handlerName` is
 * also its consumer group; inside a handlers group it shares the group's
 * position on the stream.
 */
export type EventHandler = Readonly<{
  handlerName: string;
  eventType: DomainEventType;
  streamName: StreamName;
  handle: (event: AnyDomainEvent, signal: AbortSignal) => Promise<void>;
}>;

export function defineEventHandler<T extends DomainEventType>(
  handlerName: string,
  eventType: T,
  handle: (event: EventOfType<T>, signal: AbortSignal) => Promise<void>
): EventHandler {
  return {
    handlerName,
    eventType,
    streamName: eventStreams[eventType],
    handle: async (event, signal) => {
      if (!isEventOfType(event, eventType)) {
        throw new Error(
          `${handlerName} expects ${eventType}, got ${event.eventType}`
        );
      }
      await handle(event, signal);
    },
  };
}
