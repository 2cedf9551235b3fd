// =============================================================================
// Embedding Metrics Adapters
// =============================================================================

import type { EmbeddingBatchMetrics } from '@facevault/shared-types';
import type { Counter, Histogram } from '@opentelemetry/api';
import type { EmbeddingMetricsPort } from '../../ports/EmbeddingMetricsPort.js';
import { createMeter, type Meter } from '../../infrastructure/observability/index.js';

export const EMBEDDING_LATENCY_METRIC = 'facevault_embedding_latency_ms';
export const EMBEDDING_BATCH_METRIC = 'facevault_embedding_batch_total';

/**
 * Records batch metrics through the OpenTelemetry metrics API.
 *
 * Latency goes to a histogram and the number of embedded images to a counter,
 * both tagged with whether the degraded path ran.
 */
export class OtelEmbeddingMetrics implements EmbeddingMetricsPort {
  private readonly latency: Histogram;
  private readonly images: Counter;

  constructor(meter: Meter = createMeter('facevault.embedding')) {
    this.latency = meter.createHistogram(EMBEDDING_LATENCY_METRIC, {
      description: 'Wall-clock inference time per batch',
      unit: 'ms',
    });
    this.images = meter.createCounter(EMBEDDING_BATCH_METRIC, {
      description: 'Images embedded, counted per batch flush',
    });
  }

  recordBatch(metrics: EmbeddingBatchMetrics): void {
    const attributes = {
      degraded: metrics.degraded,
      active_compute_units: metrics.activeComputeUnits,
    };
    this.latency.record(metrics.latencyMs, attributes);
    this.images.add(metrics.batchSize, attributes);
  }
}

/**
 * Discards everything. Used when no metrics sink is configured.
 */
export class NoopEmbeddingMetrics implements EmbeddingMetricsPort {
  recordBatch(_metrics: EmbeddingBatchMetrics): void {}
}
