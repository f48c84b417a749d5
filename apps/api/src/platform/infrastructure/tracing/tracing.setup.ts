import { context, propagation } from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';
import {
  CompositePropagator,
  W3CBaggagePropagator,
  W3CTraceContextPropagator,
} from '@opentelemetry/core';

let installed = false;

/**
 * Installs the async-local context manager and W3C propagators. Without a
 * context manager, the active context does not follow awaits, and events
 * would capture an empty tracing carrier.
 *
 * Exporting spans is left to whatever SDK the deployment registers.
 */
export function setupTracing(): void {
  if (installed) return;
  context.setGlobalContextManager(
    new AsyncLocalStorageContextManager().enable()
  );
  propagation.setGlobalPropagator(
    new CompositePropagator({
      propagators: [
        new W3CTraceContextPropagator(),
        new W3CBaggagePropagator(),
      ],
    })
  );
  installed = true;
}
