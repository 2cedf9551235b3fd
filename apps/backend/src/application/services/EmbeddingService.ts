// =============================================================================
// Embedding Service
// =============================================================================
// Accumulates preprocessed images into batches, runs each batch through the
// inference runner under a concurrency gate, and yields L2-normalized vectors
// in input order.

import {
  ConfigurationError,
  EmptyResultError,
  InferenceFailureError,
  ModelUnavailableError,
  type ModelInfo,
} from '@facevault/shared-types';
import type { EmbeddingPort, ImageInput } from '../../ports/EmbeddingPort.js';
import type { InferenceRunnerPort } from '../../ports/InferenceRunnerPort.js';
import type { EmbeddingMetricsPort } from '../../ports/EmbeddingMetricsPort.js';
import type { OperationOptions } from '../../ports/OperationOptions.js';
import { concatenate, type Tensor } from '../../domain/embedding/tensor.js';
import { sliceEmbeddings } from '../../domain/embedding/vectors.js';
import { AsyncSemaphore } from '../../infrastructure/concurrency/AsyncSemaphore.js';
import { NoopEmbeddingMetrics } from '../../adapters/telemetry/OtelEmbeddingMetrics.js';
import { DeterministicInferenceRunner } from '../../adapters/inference/DeterministicInferenceRunner.js';
import { createTracer, SpanStatusCode } from '../../infrastructure/observability/index.js';
import { logger, type Logger } from '../../infrastructure/logging/logger.js';
import { toTensor } from './ImagePreprocessor.js';

// =============================================================================
// Types
// =============================================================================

/** Name of the model's input node. */
export const MODEL_INPUT_NAME = 'data';

export interface EmbeddingServiceOptions {
  maxBatchSize: number;
  /** Fraction of maxBatchSize held back, in [0, 1) */
  headroomFraction: number;
  vectorSize: number;
  maxConcurrentBatches: number;
  /** Switch to the deterministic runner when the model backend is unavailable */
  degradedFallback: boolean;
  verboseLogging: boolean;
  inputName?: string;
}

export interface EmbeddingServiceDependencies {
  runner: InferenceRunnerPort;
  metrics?: EmbeddingMetricsPort;
  /** Runner used for the degraded path; built on demand when omitted */
  fallbackRunner?: InferenceRunnerPort;
  /** `runner` itself is the degraded runner, chosen at startup */
  degraded?: boolean;
  preprocess?: (image: ImageInput, targetSize: number) => Promise<Tensor>;
  logger?: Logger;
}

interface InferenceOutcome {
  output: Float32Array;
  activeComputeUnits: number;
  degraded: boolean;
}

// =============================================================================
// Batch Sizing
// =============================================================================

/**
 * Batch size actually used: `maxBatchSize` less the headroom, never below one.
 */
export function computeEffectiveBatchSize(maxBatchSize: number, headroomFraction: number): number {
  return Math.max(1, Math.floor(maxBatchSize * (1 - headroomFraction)));
}

// =============================================================================
// Service
// =============================================================================

export class EmbeddingService implements EmbeddingPort {
  private readonly effectiveBatchSize: number;
  private readonly gate: AsyncSemaphore;
  private readonly metrics: EmbeddingMetricsPort;
  private readonly fallbackRunner: InferenceRunnerPort | null;
  private readonly preprocess: (image: ImageInput, targetSize: number) => Promise<Tensor>;
  private readonly inputName: string;
  private readonly log: Logger;
  private readonly tracer = createTracer('embedding-service');

  constructor(
    private readonly options: EmbeddingServiceOptions,
    private readonly deps: EmbeddingServiceDependencies
  ) {
    const issues: string[] = [];
    if (!Number.isInteger(options.maxBatchSize) || options.maxBatchSize < 1) {
      issues.push('maxBatchSize: must be a positive integer');
    }
    if (!(options.headroomFraction >= 0 && options.headroomFraction < 1)) {
      issues.push('headroomFraction: must be in [0, 1)');
    }
    if (!Number.isInteger(options.maxConcurrentBatches) || options.maxConcurrentBatches < 1) {
      issues.push('maxConcurrentBatches: must be a positive integer');
    }
    const modelVectorSize = deps.runner.modelInfo().vectorSize;
    if (modelVectorSize !== options.vectorSize) {
      issues.push(`vectorSize: model produces ${modelVectorSize}, configured ${options.vectorSize}`);
    }
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }

    this.effectiveBatchSize = computeEffectiveBatchSize(options.maxBatchSize, options.headroomFraction);
    this.gate = new AsyncSemaphore(options.maxConcurrentBatches);
    this.metrics = deps.metrics ?? new NoopEmbeddingMetrics();
    this.fallbackRunner = options.degradedFallback
      ? deps.fallbackRunner ?? new DeterministicInferenceRunner(options.vectorSize, deps.runner.modelInfo().inputSize)
      : null;
    this.preprocess = deps.preprocess ?? toTensor;
    this.inputName = options.inputName ?? MODEL_INPUT_NAME;
    this.log = (deps.logger ?? logger).child({ component: 'embedding-service' });
  }

  getModelInfo(): ModelInfo {
    return this.deps.runner.modelInfo();
  }

  getDimension(): number {
    return this.options.vectorSize;
  }

  getEffectiveBatchSize(): number {
    return this.effectiveBatchSize;
  }

  async generate(image: ImageInput, options: OperationOptions = {}): Promise<number[]> {
    for await (const vector of this.generateBatch([image], options)) {
      return vector;
    }
    throw new EmptyResultError();
  }

  async *generateBatch(
    images: Iterable<ImageInput> | AsyncIterable<ImageInput>,
    options: OperationOptions = {}
  ): AsyncGenerator<number[], void, undefined> {
    const { signal } = options;
    const inputSize = this.getModelInfo().inputSize;
    let pending: Tensor[] = [];

    for await (const image of images) {
      signal?.throwIfAborted();
      pending.push(await this.preprocess(image, inputSize));

      if (pending.length >= this.effectiveBatchSize) {
        const batch = pending;
        pending = [];
        yield* await this.flush(batch, signal);
      }
    }

    if (pending.length > 0) {
      yield* await this.flush(pending, signal);
    }
  }

  // ===========================================================================
  // Batch Execution
  // ===========================================================================

  private async flush(tensors: Tensor[], signal?: AbortSignal): Promise<number[][]> {
    signal?.throwIfAborted();
    return this.gate.runExclusive(() => this.runBatch(tensors, signal), signal);
  }

  private runBatch(tensors: Tensor[], signal?: AbortSignal): Promise<number[][]> {
    return this.tracer.startActiveSpan('embedding.batch', async (span) => {
      span.setAttribute('embedding.batch_size', tensors.length);
      try {
        signal?.throwIfAborted();
        const batch = concatenate(tensors);

        const started = performance.now();
        const outcome = await this.infer(batch, tensors.length);
        const latencyMs = performance.now() - started;

        this.metrics.recordBatch({
          batchSize: tensors.length,
          latencyMs,
          activeComputeUnits: outcome.activeComputeUnits,
          degraded: outcome.degraded,
        });
        span.setAttribute('embedding.degraded', outcome.degraded);

        if (this.options.verboseLogging) {
          this.log.debug('Embedding batch complete', {
            batchSize: tensors.length,
            latencyMs,
            degraded: outcome.degraded,
            freeSlots: this.gate.available,
          });
        }

        let vectors: number[][];
        try {
          vectors = sliceEmbeddings(outcome.output, tensors.length, this.options.vectorSize);
        } catch (error) {
          throw new InferenceFailureError(tensors.length, error);
        }

        span.setStatus({ code: SpanStatusCode.OK });
        return vectors;
      } catch (error) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
        throw error;
      } finally {
        span.end();
      }
    });
  }

  private async infer(batch: Tensor, count: number): Promise<InferenceOutcome> {
    const { runner } = this.deps;

    try {
      const output = await runner.run(this.inputName, batch);
      return { output, activeComputeUnits: runner.activeComputeUnits(), degraded: this.deps.degraded ?? false };
    } catch (error) {
      if (error instanceof ModelUnavailableError && this.fallbackRunner) {
        this.log.warn('Inference backend unavailable; using degraded fallback', {
          batchSize: count,
          reason: error.message,
        });
        return this.inferDegraded(this.fallbackRunner, batch, count);
      }
      throw new InferenceFailureError(count, error);
    }
  }

  private async inferDegraded(runner: InferenceRunnerPort, batch: Tensor, count: number): Promise<InferenceOutcome> {
    try {
      const output = await runner.run(this.inputName, batch);
      return { output, activeComputeUnits: 0, degraded: true };
    } catch (error) {
      throw new InferenceFailureError(count, error);
    }
  }
}
