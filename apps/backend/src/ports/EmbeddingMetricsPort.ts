import type { EmbeddingBatchMetrics } from '@facevault/shared-types';

// =============================================================================
// Embedding Metrics Port
// =============================================================================

/**
 * Observability sink for per-batch inference metrics
 *
 * Injected into the embedding service so the core holds no global
 * telemetry state.
 */
export interface EmbeddingMetricsPort {
  recordBatch(metrics: EmbeddingBatchMetrics): void;
}
