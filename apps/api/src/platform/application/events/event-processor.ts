import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
  type OnApplicationShutdown,
} from '@nestjs/common';
import { SpanKind, SpanStatusCode, trace } from '@opentelemetry/api';
import type {
  AnyDomainEvent,
  DomainEventType,
  StreamName,
} from '@campus-id/domain';
import { OutboxStore, type OutboxRecord } from '../ports/outbox-store';
import { EventCodec } from './event-codec';
import type { EventHandler } from './event-handler';

export const EVENT_PROCESSOR_OPTIONS = Symbol('EVENT_PROCESSOR_OPTIONS');

export type EventProcessorOptions = Readonly<{
  /** Start polling once every module registered its handlers. */
  autoStart: boolean;
  pollIntervalMs: number;
  retryIntervalMs: number;
  batchSize: number;
}>;

type Subscription = {
  readonly consumerGroup: string;
  readonly streamName: StreamName;
  readonly handlers: Map<DomainEventType, EventHandler>;
};

type Delivery = 'handled' | 'skipped' | 'failed';

type BatchResult = Readonly<{ acknowledged: number; failed: boolean }>;

const delay = (ms: number, signal: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

const describeError = (error: unknown): string =>
  error instanceof Error ? (error.stack ?? error.message) : String(error);

/**
 * Delivers outbox events to registered handlers, at least once.
 *
 * Each (stream, consumer group) pair keeps its own offset and is polled by
 * its own loop. An event is acknowledged only after every matching handler
 * in the group succeeded; on failure the offset stays put and the same
 * event is retried after `retryIntervalMs`. Events whose type is unknown,
 * or that no handler in the group subscribes to, are acknowledged
 * without delivery.
 */
@Injectable()
export class EventProcessor
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(EventProcessor.name);
  private readonly tracer = trace.getTracer('campus-id.event-processor');
  private readonly subscriptions = new Map<string, Subscription>();
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(
    @Inject(OutboxStore) private readonly store: OutboxStore,
    @Inject(EVENT_PROCESSOR_OPTIONS)
    private readonly options: EventProcessorOptions
  ) {}

  addHandler(handler: EventHandler): void {
    this.register(handler.handlerName, [handler]);
  }

  addHandlersGroup(
    consumerGroup: string,
    handlers: ReadonlyArray<EventHandler>
  ): void {
    const [first] = handlers;
    if (!first) {
      throw new Error(`Handlers group ${consumerGroup} is empty`);
    }
    const stray = handlers.find((h) => h.streamName !== first.streamName);
    if (stray) {
      throw new Error(
        `Handlers group ${consumerGroup} mixes streams ${first.streamName} and ${stray.streamName}`
      );
    }
    this.register(consumerGroup, handlers);
  }

  get running(): boolean {
    return this.controller !== null;
  }

  async start(): Promise<void> {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;

    const subscriptions = [...this.subscriptions.values()];
    for (const subscription of subscriptions) {
      await this.store.subscribe(
        subscription.streamName,
        subscription.consumerGroup
      );
    }
    this.loops = subscriptions.map((subscription) =>
      this.poll(subscription, controller.signal)
    );
    this.logger.log(
      `Event processor started with ${subscriptions.length} subscription(s)`
    );
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = null;
    this.logger.log('Event processor stopped');
  }

  async onApplicationBootstrap(): Promise<void> {
    if (this.options.autoStart) {
      await this.start();
    }
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  /**
   * Delivers everything pending on every subscription, including events
   * produced by the handlers themselves, then returns. Stops early on the
   * first handler failure.
   */
  async drain(): Promise<void> {
    const signal = new AbortController().signal;
    for (const subscription of this.subscriptions.values()) {
      await this.store.subscribe(
        subscription.streamName,
        subscription.consumerGroup
      );
    }
    let progressed = true;
    while (progressed) {
      progressed = false;
      for (const subscription of this.subscriptions.values()) {
        const result = await this.deliverBatch(subscription, signal);
        if (result.failed) return;
        if (result.acknowledged > 0) progressed = true;
      }
    }
  }

  private register(
    consumerGroup: string,
    handlers: ReadonlyArray<EventHandler>
  ): void {
    if (this.controller) {
      throw new Error('Handlers cannot be added while the processor runs');
    }
    for (const handler of handlers) {
      const key = `${handler.streamName}/${consumerGroup}`;
      let subscription = this.subscriptions.get(key);
      if (!subscription) {
        subscription = {
          consumerGroup,
          streamName: handler.streamName,
          handlers: new Map(),
        };
        this.subscriptions.set(key, subscription);
      }
      if (subscription.handlers.has(handler.eventType)) {
        throw new Error(
          `Group ${consumerGroup} already handles ${handler.eventType}`
        );
      }
      subscription.handlers.set(handler.eventType, handler);
    }
  }

  private async poll(
    subscription: Subscription,
    signal: AbortSignal
  ): Promise<void> {
    while (!signal.aborted) {
      let wait = this.options.pollIntervalMs;
      try {
        const result = await this.deliverBatch(subscription, signal);
        if (result.failed) {
          wait = this.options.retryIntervalMs;
        } else if (result.acknowledged > 0) {
          continue;
        }
      } catch (error) {
        this.logger.error(
          `Polling ${subscription.streamName} for ${subscription.consumerGroup} failed`,
          describeError(error)
        );
        wait = this.options.retryIntervalMs;
      }
      await delay(wait, signal);
    }
  }

  private async deliverBatch(
    subscription: Subscription,
    signal: AbortSignal
  ): Promise<BatchResult> {
    const { streamName, consumerGroup } = subscription;
    let position = await this.store.currentOffset(streamName, consumerGroup);
    const records = await this.store.fetchAfter(
      streamName,
      position,
      this.options.batchSize
    );

    let acknowledged = 0;
    for (const record of records) {
      if (signal.aborted) break;
      const delivery = await this.deliver(subscription, record, signal);
      if (delivery === 'failed') {
        return { acknowledged, failed: true };
      }
      const advanced = await this.store.advance(
        streamName,
        consumerGroup,
        position,
        record.offset
      );
      if (!advanced) {
        this.logger.warn(
          `Offset of ${consumerGroup} on ${streamName} moved concurrently; re-reading`
        );
        break;
      }
      position = record.offset;
      acknowledged += 1;
    }
    return { acknowledged, failed: false };
  }

  private async deliver(
    subscription: Subscription,
    record: OutboxRecord,
    signal: AbortSignal
  ): Promise<Delivery> {
    let event: AnyDomainEvent;
    try {
      const decoded = EventCodec.decode(record.eventType, record.payload);
      if (decoded.kind === 'unknown') {
        this.logger.warn(
          `Skipping unknown event type ${decoded.eventType} at ${record.streamName}#${record.offset}`
        );
        return 'skipped';
      }
      event = decoded.event;
    } catch (error) {
      this.logger.error(
        `Cannot decode ${record.eventType} at ${record.streamName}#${record.offset}`,
        describeError(error)
      );
      return 'failed';
    }

    const handler = subscription.handlers.get(event.eventType);
    if (!handler) return 'skipped';

    try {
      await this.runHandler(subscription, handler, event, signal);
      return 'handled';
    } catch (error) {
      this.logger.error(
        `Handler ${handler.handlerName} failed on ${event.eventType} ${event.eventId.value} (group ${subscription.consumerGroup}, offset ${record.offset})`,
        describeError(error)
      );
      return 'failed';
    }
  }

  private runHandler(
    subscription: Subscription,
    handler: EventHandler,
    event: AnyDomainEvent,
    signal: AbortSignal
  ): Promise<void> {
    const producerContext = event.tracing.extract();
    return this.tracer.startActiveSpan(
      `${handler.handlerName} ${event.eventType}`,
      {
        kind: SpanKind.CONSUMER,
        attributes: {
          'messaging.destination.name': subscription.streamName,
          'messaging.consumer.group.name': subscription.consumerGroup,
          'messaging.message.id': event.eventId.value,
        },
      },
      producerContext,
      async (span) => {
        try {
          await handler.handle(event, signal);
          span.setStatus({ code: SpanStatusCode.OK });
        } catch (error) {
          span.recordException(
            error instanceof Error ? error : String(error)
          );
          span.setStatus({ code: SpanStatusCode.ERROR });
          throw error;
        } finally {
          span.end();
        }
      }
    );
  }
}
