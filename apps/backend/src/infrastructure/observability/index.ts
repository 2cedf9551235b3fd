// =============================================================================
// Observability Module - Public Exports
// =============================================================================

import { metrics, trace } from '@opentelemetry/api';
import type { Meter, Tracer } from '@opentelemetry/api';

export { initTelemetry, shutdownTelemetry } from './tracing.js';

export {
  trace,
  context,
  metrics,
  SpanKind,
  SpanStatusCode,
  type Span,
  type Tracer,
  type Meter,
} from '@opentelemetry/api';

/**
 * Create a tracer for a specific component
 *
 * @example
 * ```typescript
 * const tracer = createTracer('embedding-service');
 *
 * await tracer.startActiveSpan('embedding.flush', async (span) => {
 *   // ... do work
 *   span.end();
 * });
 * ```
 */
export function createTracer(name: string, version: string = '0.1.0'): Tracer {
  return trace.getTracer(name, version);
}

/**
 * Create a meter for a specific component. Instruments are no-ops until an
 * SDK with a metric reader is registered.
 */
export function createMeter(name: string, version: string = '0.1.0'): Meter {
  return metrics.getMeter(name, version);
}
