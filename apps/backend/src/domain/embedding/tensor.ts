// =============================================================================
// Image Tensors
// =============================================================================
// Dense float32 tensors in NCHW layout: [batch, channels, height, width].

export const CHANNELS = 3;

export type TensorShape = readonly [batch: number, channels: number, height: number, width: number];

export interface Tensor {
  readonly dims: TensorShape;
  readonly data: Float32Array;
}

export function createTensor(batch: number, size: number): Tensor {
  return {
    dims: [batch, CHANNELS, size, size],
    data: new Float32Array(batch * CHANNELS * size * size),
  };
}

/**
 * Number of floats one batch item occupies.
 */
export function itemLength(tensor: Tensor): number {
  const [, channels, height, width] = tensor.dims;
  return channels * height * width;
}

/**
 * Stack single-item tensors into one batch tensor, preserving order.
 * A single input is returned as-is.
 */
export function concatenate(tensors: readonly Tensor[]): Tensor {
  if (tensors.length === 0) {
    throw new RangeError('Cannot concatenate an empty tensor list');
  }

  if (tensors.length === 1) {
    return tensors[0];
  }

  const [, channels, height, width] = tensors[0].dims;
  const stride = channels * height * width;
  const data = new Float32Array(tensors.length * stride);

  tensors.forEach((tensor, index) => {
    const [batch, c, h, w] = tensor.dims;
    if (batch !== 1 || c !== channels || h !== height || w !== width) {
      throw new RangeError(
        `Tensor ${index} has shape [${tensor.dims.join(',')}], expected [1,${channels},${height},${width}]`
      );
    }
    data.set(tensor.data, index * stride);
  });

  return { dims: [tensors.length, channels, height, width], data };
}
