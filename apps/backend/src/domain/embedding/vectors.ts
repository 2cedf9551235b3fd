// =============================================================================
// Embedding Vector Math
// =============================================================================

/**
 * Magnitudes below this are treated as the zero vector and left unscaled.
 */
export const ZERO_MAGNITUDE_EPSILON = 1e-9;

export function magnitude(vector: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < vector.length; i++) {
    sum += vector[i] * vector[i];
  }
  return Math.sqrt(sum);
}

/**
 * L2-normalize into a new array. Near-zero vectors are copied unchanged.
 */
export function l2Normalize(vector: ArrayLike<number>): number[] {
  const result = Array.from(vector);
  const norm = magnitude(vector);
  if (norm < ZERO_MAGNITUDE_EPSILON) {
    return result;
  }

  const scale = 1 / norm;
  for (let i = 0; i < result.length; i++) {
    result[i] *= scale;
  }
  return result;
}

/**
 * Split a flat runner output into `count` normalized vectors of `vectorSize`.
 *
 * @throws RangeError when the buffer length is not `count * vectorSize`
 */
export function sliceEmbeddings(
  output: Float32Array | readonly number[],
  count: number,
  vectorSize: number
): number[][] {
  const expected = count * vectorSize;
  if (output.length !== expected) {
    throw new RangeError(`Unexpected output size from model. Expected ${expected}, got ${output.length}.`);
  }

  const vectors: number[][] = [];
  for (let i = 0; i < count; i++) {
    const start = i * vectorSize;
    vectors.push(l2Normalize(output.slice(start, start + vectorSize)));
  }
  return vectors;
}

/**
 * Cosine similarity; 0 when either vector has no magnitude.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) {
    throw new RangeError('Vectors must have the same length');
  }

  let dotProduct = 0;
  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
  }

  const denominator = magnitude(a) * magnitude(b);
  if (denominator === 0) return 0;

  return dotProduct / denominator;
}
