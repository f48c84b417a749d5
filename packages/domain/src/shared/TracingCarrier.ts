import {
  ROOT_CONTEXT,
  context,
  defaultTextMapGetter,
  defaultTextMapSetter,
  type Context,
} from '@opentelemetry/api';
import {
  CompositePropagator,
  W3CBaggagePropagator,
  W3CTraceContextPropagator,
} from '@opentelemetry/core';

const propagator = new CompositePropagator({
  propagators: [new W3CTraceContextPropagator(), new W3CBaggagePropagator()],
});

/**
 * Serialized trace and baggage context travelling inside an event.
 *
 * Captured when the event is constructed, so it reflects the producer's
 * active span even though the event is delivered later, possibly by
 * another process.
 */
export class TracingCarrier {
  private constructor(readonly carrier: Readonly<Record<string, string>>) {
    Object.freeze(this);
  }

  static propagate(ctx: Context = context.active()): TracingCarrier {
    const carrier: Record<string, string> = {};
    propagator.inject(ctx, carrier, defaultTextMapSetter);
    return new TracingCarrier(Object.freeze(carrier));
  }

  static from(carrier: Readonly<Record<string, string>>): TracingCarrier {
    return new TracingCarrier(Object.freeze({ ...carrier }));
  }

  /**
   * Rebuilds the producer's context on top of an empty root, so nothing
   * from the consumer's ambient context leaks into the result.
   */
  extract(): Context {
    return propagator.extract(ROOT_CONTEXT, this.carrier, defaultTextMapGetter);
  }
}
