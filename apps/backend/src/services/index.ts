// =============================================================================
// Services - Composition Root
// =============================================================================
// Builds the pipeline from validated configuration. Adapters can be swapped
// through overrides, which is how tests run without a model or a database.

import { ModelUnavailableError } from '@facevault/shared-types';
import type { FaceVaultConfig } from '../infrastructure/config/index.js';
import type { InferenceRunnerPort } from '../ports/InferenceRunnerPort.js';
import type { VectorStoreClientPort } from '../ports/VectorStoreClientPort.js';
import type { EmbeddingMetricsPort } from '../ports/EmbeddingMetricsPort.js';
import { OnnxInferenceRunner } from '../adapters/inference/OnnxInferenceRunner.js';
import { DeterministicInferenceRunner } from '../adapters/inference/DeterministicInferenceRunner.js';
import { QdrantVectorStoreClient } from '../adapters/vector-store/QdrantVectorStoreClient.js';
import { OtelEmbeddingMetrics } from '../adapters/telemetry/OtelEmbeddingMetrics.js';
import { TARGET_SIZE } from '../application/services/ImagePreprocessor.js';
import { EmbeddingService } from '../application/services/EmbeddingService.js';
import { CollectionLifecycle } from '../application/services/CollectionLifecycle.js';
import { VectorStoreService } from '../application/services/VectorStoreService.js';
import { EnrollmentService } from '../application/services/EnrollmentService.js';
import { DiagnosticsService } from '../application/services/DiagnosticsService.js';
import { logger, type Logger } from '../infrastructure/logging/logger.js';

export interface FaceVaultOverrides {
  runner?: InferenceRunnerPort;
  storeClient?: VectorStoreClientPort;
  metrics?: EmbeddingMetricsPort;
  logger?: Logger;
  now?: () => Date;
}

export interface FaceVault {
  embedding: EmbeddingService;
  lifecycle: CollectionLifecycle;
  vectorStore: VectorStoreService;
  enrollment: EnrollmentService;
  diagnostics: DiagnosticsService;
  /** True when the model could not load and the deterministic runner stands in */
  degraded: boolean;
  close(): Promise<void>;
}

// =============================================================================
// Inference Runner
// =============================================================================

/**
 * Load the ONNX model. With degraded fallback enabled a missing or broken
 * model is logged and replaced by the deterministic runner; otherwise the
 * ModelUnavailableError propagates.
 */
async function createRunner(
  config: FaceVaultConfig,
  log: Logger
): Promise<{ runner: InferenceRunnerPort; degraded: boolean }> {
  const { embedding } = config;

  try {
    const runner = await OnnxInferenceRunner.create({
      modelPath: embedding.modelPath,
      expectedContentHash: embedding.expectedContentHash,
      vectorSize: embedding.vectorSize,
      inputSize: TARGET_SIZE,
    });
    return { runner, degraded: false };
  } catch (error) {
    if (error instanceof ModelUnavailableError && embedding.degradedFallback) {
      log.warn('Embedding model unavailable; starting in degraded mode', { reason: error.message });
      return {
        runner: new DeterministicInferenceRunner(embedding.vectorSize, TARGET_SIZE),
        degraded: true,
      };
    }
    throw error;
  }
}

// =============================================================================
// Factory
// =============================================================================

export async function createFaceVault(config: FaceVaultConfig, overrides: FaceVaultOverrides = {}): Promise<FaceVault> {
  const log = (overrides.logger ?? logger).child({ component: 'facevault' });

  const { runner, degraded } = overrides.runner
    ? { runner: overrides.runner, degraded: false }
    : await createRunner(config, log);

  const storeClient =
    overrides.storeClient ??
    new QdrantVectorStoreClient({
      url: config.vectorStore.storeEndpoint,
      apiKey: config.vectorStore.storeApiKey,
    });

  const embedding = new EmbeddingService(config.embedding, {
    runner,
    degraded,
    metrics: overrides.metrics ?? new OtelEmbeddingMetrics(),
    logger: overrides.logger,
  });

  const lifecycle = new CollectionLifecycle(storeClient, config.vectorStore, overrides.logger);

  const vectorStore = new VectorStoreService(
    storeClient,
    lifecycle,
    {
      collectionName: config.vectorStore.collectionName,
      vectorSize: config.vectorStore.vectorSize,
      now: overrides.now,
    },
    overrides.logger
  );

  const enrollment = new EnrollmentService(embedding, vectorStore, overrides.logger);
  const diagnostics = new DiagnosticsService(embedding, vectorStore, config, overrides.logger);

  log.info('FaceVault pipeline ready', {
    collection: config.vectorStore.collectionName,
    effectiveBatchSize: embedding.getEffectiveBatchSize(),
    maxConcurrentBatches: config.embedding.maxConcurrentBatches,
    degraded,
  });

  return {
    embedding,
    lifecycle,
    vectorStore,
    enrollment,
    diagnostics,
    degraded,
    close: () => runner.dispose(),
  };
}
