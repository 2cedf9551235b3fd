// =============================================================================
// Deterministic Inference Runner
// =============================================================================
// Degraded stand-in for the neural model. Folds each item's input tensor into
// a fixed-size vector with a position-weighted sum, so the same image always
// yields the same vector. The vectors carry no identity signal; the service
// only runs this when degraded fallback has been enabled explicitly.

import type { ModelInfo } from '@facevault/shared-types';
import type { InferenceRunnerPort } from '../../ports/InferenceRunnerPort.js';
import { itemLength, type Tensor } from '../../domain/embedding/tensor.js';

const WEIGHT_CYCLE = 7;

export class DeterministicInferenceRunner implements InferenceRunnerPort {
  private readonly info: ModelInfo;

  constructor(vectorSize: number, inputSize: number) {
    this.info = Object.freeze({
      modelName: 'deterministic-fallback',
      modelVersion: '1',
      executionBackend: 'cpu-degraded',
      contentHash: 'n/a',
      loadedAt: new Date(),
      vectorSize,
      inputSize,
    });
  }

  modelInfo(): ModelInfo {
    return this.info;
  }

  async run(_inputName: string, batch: Tensor): Promise<Float32Array> {
    const [count] = batch.dims;
    const stride = itemLength(batch);
    const { vectorSize } = this.info;
    const output = new Float32Array(count * vectorSize);

    for (let item = 0; item < count; item++) {
      const inputOffset = item * stride;
      const outputOffset = item * vectorSize;
      for (let k = 0; k < stride; k++) {
        const weight = (k % WEIGHT_CYCLE) + 1;
        output[outputOffset + (k % vectorSize)] += batch.data[inputOffset + k] * weight;
      }
    }

    return output;
  }

  activeComputeUnits(): number {
    return 0;
  }

  async dispose(): Promise<void> {}
}
