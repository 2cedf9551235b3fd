import type { ModelInfo } from '@facevault/shared-types';
import type { OperationOptions } from './OperationOptions.js';

// =============================================================================
// Embedding Port
// =============================================================================

/**
 * Raw encoded image bytes (PNG, JPEG, WebP, ...). Node Buffers qualify.
 */
export type ImageInput = Uint8Array;

/**
 * Port interface for image embedding generation
 *
 * Turns aligned face crops into L2-normalized vectors. Implementations batch
 * inputs and bound how many batches run inference at once.
 */
export interface EmbeddingPort {
  /**
   * Generate the embedding for a single image
   *
   * @throws EmptyResultError if the model produced no vector
   */
  generate(image: ImageInput, options?: OperationOptions): Promise<number[]>;

  /**
   * Lazily generate embeddings for a stream of images
   *
   * The source is consumed once, forward-only. Vectors are yielded in input
   * order; vectors already yielded stay valid if a later batch fails.
   */
  generateBatch(
    images: Iterable<ImageInput> | AsyncIterable<ImageInput>,
    options?: OperationOptions
  ): AsyncGenerator<number[], void, undefined>;

  /**
   * Metadata describing the loaded model
   */
  getModelInfo(): ModelInfo;

  /**
   * Length of every vector this provider produces
   */
  getDimension(): number;
}
