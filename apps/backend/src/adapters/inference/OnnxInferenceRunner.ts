// =============================================================================
// ONNX Inference Runner
// =============================================================================
// Runs the face embedding model through onnxruntime-web's WebAssembly backend.
// The model file is read once, optionally checked against a SHA-256 digest,
// and kept in a single session for the life of the process.

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import * as ort from 'onnxruntime-web';
import { ModelUnavailableError, type ModelInfo } from '@facevault/shared-types';
import type { InferenceRunnerPort } from '../../ports/InferenceRunnerPort.js';
import type { Tensor } from '../../domain/embedding/tensor.js';
import { logger } from '../../infrastructure/logging/logger.js';

// =============================================================================
// Types
// =============================================================================

export interface OnnxInferenceRunnerOptions {
  modelPath: string;
  /** Hex SHA-256 the model file must match; skipped when absent */
  expectedContentHash?: string;
  vectorSize: number;
  inputSize: number;
  /** WASM worker threads; defaults to the runtime's own choice */
  numThreads?: number;
}

// =============================================================================
// Helpers
// =============================================================================

export function sha256Hex(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

// =============================================================================
// Runner
// =============================================================================

export class OnnxInferenceRunner implements InferenceRunnerPort {
  private released = false;

  private constructor(
    private readonly session: ort.InferenceSession,
    private readonly info: ModelInfo,
    private readonly threads: number
  ) {}

  /**
   * Load the model and open an inference session.
   *
   * @throws ModelUnavailableError if the file is missing, fails the digest
   * check, or the runtime rejects it
   */
  static async create(options: OnnxInferenceRunnerOptions): Promise<OnnxInferenceRunner> {
    const log = logger.child({ component: 'onnx-runner', modelPath: options.modelPath });

    let modelBytes: Buffer;
    try {
      modelBytes = await readFile(options.modelPath);
    } catch (error) {
      throw new ModelUnavailableError(`Model file not found at ${options.modelPath}`, error);
    }

    const expected = options.expectedContentHash?.toLowerCase();
    if (expected) {
      const actual = sha256Hex(modelBytes);
      if (actual !== expected) {
        throw new ModelUnavailableError(
          `Model file hash mismatch for ${options.modelPath}: expected ${expected}, got ${actual}`
        );
      }
    }

    if (options.numThreads !== undefined) {
      ort.env.wasm.numThreads = options.numThreads;
    }

    let session: ort.InferenceSession;
    try {
      session = await ort.InferenceSession.create(modelBytes, {
        executionProviders: ['wasm'],
        graphOptimizationLevel: 'all',
      });
    } catch (error) {
      throw new ModelUnavailableError('Failed to initialize the ONNX runtime session', error);
    }

    const info: ModelInfo = Object.freeze({
      modelName: basename(options.modelPath, extname(options.modelPath)),
      modelVersion: ort.env.versions.common,
      executionBackend: 'wasm',
      contentHash: expected ?? 'n/a',
      loadedAt: new Date(),
      vectorSize: options.vectorSize,
      inputSize: options.inputSize,
    });

    const threads = options.numThreads ?? 1;
    log.info('Embedding model loaded', {
      modelName: info.modelName,
      inputs: session.inputNames,
      outputs: session.outputNames,
      threads,
    });

    return new OnnxInferenceRunner(session, info, threads);
  }

  modelInfo(): ModelInfo {
    return this.info;
  }

  async run(inputName: string, batch: Tensor): Promise<Float32Array> {
    if (this.released) {
      throw new ModelUnavailableError('Inference session has been released');
    }

    const input = new ort.Tensor('float32', batch.data, [...batch.dims]);
    const results = await this.session.run({ [inputName]: input });

    const outputName = this.session.outputNames[0];
    const output = outputName === undefined ? undefined : results[outputName];
    if (!output) {
      throw new Error('Model produced no output tensor');
    }
    if (!(output.data instanceof Float32Array)) {
      throw new Error(`Model output has type ${output.type}, expected float32`);
    }

    return output.data;
  }

  activeComputeUnits(): number {
    return this.released ? 0 : this.threads;
  }

  async dispose(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await this.session.release();
  }
}
