import type { ModelInfo } from '@facevault/shared-types';
import type { Tensor } from '../domain/embedding/tensor.js';

// =============================================================================
// Inference Runner Port
// =============================================================================

/**
 * Port interface for the neural inference backend
 *
 * Executes the embedding model on a batch tensor. Implementations must fail
 * loudly with ModelUnavailableError when their compute backend cannot be
 * reached instead of silently switching to another one.
 */
export interface InferenceRunnerPort {
  /**
   * Metadata captured when the model was loaded
   */
  modelInfo(): ModelInfo;

  /**
   * Run the model on `[n, 3, S, S]` input
   *
   * @param inputName - Name of the model's input node
   * @param batch - Batch tensor
   * @returns Flat output of length `n * vectorSize`
   */
  run(inputName: string, batch: Tensor): Promise<Float32Array>;

  /**
   * Number of compute units the backend is using; 0 for the degraded path
   */
  activeComputeUnits(): number;

  /**
   * Release the underlying session
   */
  dispose(): Promise<void>;
}
