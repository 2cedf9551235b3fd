import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InvalidArgumentError, type ModelInfo } from '@facevault/shared-types';
import type { EmbeddingPort, ImageInput } from '../../ports/EmbeddingPort.js';
import { InMemoryVectorStoreClient } from '../../adapters/vector-store/InMemoryVectorStoreClient.js';
import { Logger } from '../../infrastructure/logging/logger.js';
import { CollectionLifecycle } from './CollectionLifecycle.js';
import { VectorStoreService } from './VectorStoreService.js';
import { EnrollmentService } from './EnrollmentService.js';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function embedding(seed: number): number[] {
  return Array.from({ length: 512 }, (_, index) => Math.sin(seed * (index + 1)));
}

/**
 * Embeds an image as a fixed vector chosen by its first byte.
 */
class FakeEmbedding implements EmbeddingPort {
  readonly generate = vi.fn(async (image: ImageInput) => embedding(image[0]));

  async *generateBatch(
    images: Iterable<ImageInput> | AsyncIterable<ImageInput>
  ): AsyncGenerator<number[], void, undefined> {
    for await (const image of images) {
      yield embedding(image[0]);
    }
  }

  getModelInfo(): ModelInfo {
    return {
      modelName: 'fake',
      modelVersion: '1',
      executionBackend: 'test',
      contentHash: 'n/a',
      loadedAt: new Date(0),
      vectorSize: 512,
      inputSize: 112,
    };
  }

  getDimension(): number {
    return 512;
  }
}

describe('EnrollmentService', () => {
  const quietLogger = new Logger({ level: 'error' });
  let fake: FakeEmbedding;
  let store: VectorStoreService;
  let enrollment: EnrollmentService;

  beforeEach(() => {
    const client = new InMemoryVectorStoreClient();
    const lifecycle = new CollectionLifecycle(
      client,
      { collectionName: 'faces', vectorSize: 512, autoCreateCollection: true },
      quietLogger
    );
    fake = new FakeEmbedding();
    store = new VectorStoreService(client, lifecycle, { collectionName: 'faces', vectorSize: 512 }, quietLogger);
    enrollment = new EnrollmentService(fake, store, quietLogger);
  });

  it('enrolls a face under a generated id', async () => {
    const document = await enrollment.enroll({ displayName: '  Alice  ', image: Uint8Array.of(1) });

    expect(document.id).toMatch(UUID_V4);
    expect(document.content).toBe('Alice');
    expect(document.embedding).toEqual(embedding(1));
    expect(await store.get(document.id)).not.toBeNull();
  });

  it('accepts base64 image payloads', async () => {
    await enrollment.enroll({ displayName: 'Bob', image: 'data:image/png;base64,Bw==' });

    const [image] = fake.generate.mock.calls[0];
    expect(Array.from(image)).toEqual([7]);
  });

  it('rejects a blank display name before embedding', async () => {
    await expect(enrollment.enroll({ displayName: '   ', image: Uint8Array.of(1) })).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    expect(fake.generate).not.toHaveBeenCalled();
  });

  it('re-enrolls an existing id and keeps its metadata', async () => {
    const first = await enrollment.enroll({
      displayName: 'Alice',
      image: Uint8Array.of(1),
      metadata: { badge: '7' },
    });

    const second = await enrollment.enroll({
      id: first.id,
      displayName: 'Alice B.',
      image: Uint8Array.of(2),
      metadata: { badge: '8' },
    });

    expect(second.id).toBe(first.id);
    expect(second.createdAt).toEqual(first.createdAt);
    expect((await store.get(first.id))?.metadata).toEqual({ badge: '8' });
  });

  it('identifies the closest enrolled face with its score', async () => {
    const alice = await enrollment.enroll({ displayName: 'Alice', image: Uint8Array.of(1) });
    await enrollment.enroll({ displayName: 'Bob', image: Uint8Array.of(2) });

    const matches = await enrollment.identify(Uint8Array.of(1), { topK: 1 });

    expect(matches).toHaveLength(1);
    expect(matches[0].document.id).toBe(alice.id);
    expect(matches[0].score).toBeCloseTo(1, 6);
  });

  it('drops matches below minScore', async () => {
    await enrollment.enroll({ displayName: 'Alice', image: Uint8Array.of(1) });
    await enrollment.enroll({ displayName: 'Bob', image: Uint8Array.of(2) });

    const matches = await enrollment.identify(Uint8Array.of(1), { topK: 2, minScore: 0.99 });

    expect(matches.map((match) => match.document.content)).toEqual(['Alice']);
  });

  it('stops identifying deactivated people', async () => {
    const alice = await enrollment.enroll({ displayName: 'Alice', image: Uint8Array.of(1) });

    expect(await enrollment.deactivate(alice.id)).toBe(true);
    expect(await enrollment.identify(Uint8Array.of(1))).toEqual([]);
    expect(await enrollment.deactivate('33333333-3333-3333-3333-333333333333')).toBe(false);
  });
});
