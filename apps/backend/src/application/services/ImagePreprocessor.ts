// =============================================================================
// Image Preprocessor
// =============================================================================
// Decodes an aligned face crop and converts it into the [1, 3, S, S] float
// tensor the embedding model expects. Stateless; safe to call concurrently.

import sharp from 'sharp';
import { DecodeError } from '@facevault/shared-types';
import { CHANNELS, createTensor, type Tensor } from '../../domain/embedding/tensor.js';
import type { ImageInput } from '../../ports/EmbeddingPort.js';

// =============================================================================
// Constants
// =============================================================================

/** Edge length of the square model input. */
export const TARGET_SIZE = 112;

const PIXEL_MEAN = 127.5;
const PIXEL_STD = 128;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

// =============================================================================
// Tensor Conversion
// =============================================================================

export function normalizePixel(value: number): number {
  return (value - PIXEL_MEAN) / PIXEL_STD;
}

/**
 * Decode `image` and build its input tensor.
 *
 * The image is resized (stretched, not cropped) to `targetSize` when its
 * dimensions differ. Channels are written B, G, R to match the model.
 *
 * @throws DecodeError if the bytes are not a readable image
 */
export async function toTensor(image: ImageInput, targetSize: number = TARGET_SIZE): Promise<Tensor> {
  if (image.byteLength === 0) {
    throw new DecodeError('Image payload is empty.');
  }

  let pixels: Buffer;
  let width: number;
  let height: number;
  let channels: number;

  try {
    const metadata = await sharp(image).metadata();
    let pipeline = sharp(image).removeAlpha().toColourspace('srgb');
    if (metadata.width !== targetSize || metadata.height !== targetSize) {
      pipeline = pipeline.resize(targetSize, targetSize, { fit: 'fill' });
    }

    const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
    pixels = data;
    ({ width, height, channels } = info);
  } catch (error) {
    throw new DecodeError('Image could not be decoded.', error);
  }

  if (width !== targetSize || height !== targetSize || channels !== CHANNELS) {
    throw new DecodeError(
      `Decoded image is ${width}x${height}x${channels}, expected ${targetSize}x${targetSize}x${CHANNELS}.`
    );
  }

  const tensor = createTensor(1, targetSize);
  const plane = targetSize * targetSize;

  for (let y = 0; y < targetSize; y++) {
    for (let x = 0; x < targetSize; x++) {
      const source = (y * targetSize + x) * CHANNELS;
      const target = y * targetSize + x;
      tensor.data[target] = normalizePixel(pixels[source + 2]); // B
      tensor.data[plane + target] = normalizePixel(pixels[source + 1]); // G
      tensor.data[2 * plane + target] = normalizePixel(pixels[source]); // R
    }
  }

  return tensor;
}

// =============================================================================
// Payload Decoding
// =============================================================================

/**
 * Decode a base64 image payload, with or without a `data:<mime>;base64,` prefix.
 *
 * @throws DecodeError if the payload is not valid base64
 */
export function decodeImagePayload(payload: string): Buffer {
  let body = payload.trim();
  const commaIndex = body.indexOf(',');
  if (body.toLowerCase().startsWith('data:') && commaIndex >= 0) {
    body = body.slice(commaIndex + 1);
  }

  body = body.replace(/\s+/g, '');
  if (body.length === 0 || body.length % 4 !== 0 || !BASE64_PATTERN.test(body)) {
    throw new DecodeError('Image payload must be base64 encoded.');
  }

  return Buffer.from(body, 'base64');
}
