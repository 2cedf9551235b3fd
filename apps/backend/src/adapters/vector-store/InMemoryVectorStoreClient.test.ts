import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryVectorStoreClient } from './InMemoryVectorStoreClient.js';

const A = 'aaaaaaaa-0000-0000-0000-000000000001';
const B = 'bbbbbbbb-0000-0000-0000-000000000002';

describe('InMemoryVectorStoreClient', () => {
  let client: InMemoryVectorStoreClient;

  beforeEach(async () => {
    client = new InMemoryVectorStoreClient();
    await client.createCollection('faces', 2, 'Cosine');
  });

  it('lists created collections and rejects duplicates', async () => {
    expect(await client.listCollections()).toEqual(new Set(['faces']));
    await expect(client.createCollection('faces', 2, 'Cosine')).rejects.toThrow('Collection faces already exists');
  });

  it('rejects operations on unknown collections', async () => {
    await expect(client.upsertPoints('missing', [])).rejects.toThrow("Collection `missing` doesn't exist");
  });

  it('rejects vectors of the wrong size without storing any of the batch', async () => {
    await expect(
      client.upsertPoints('faces', [
        { id: A, vector: [1, 0], payload: {} },
        { id: B, vector: [1, 0, 0], payload: {} },
      ])
    ).rejects.toThrow('expected dim: 2, got 3');
    expect(client.count('faces')).toBe(0);
  });

  it('ranks by cosine similarity and applies the limit', async () => {
    await client.upsertPoints('faces', [
      { id: A, vector: [1, 0], payload: { content: 'a' } },
      { id: B, vector: [0.6, 0.8], payload: { content: 'b' } },
    ]);

    const results = await client.searchPoints('faces', {
      vector: [0, 1],
      limit: 1,
      withPayload: true,
      withVectors: false,
    });

    expect(results).toEqual([{ id: B, score: expect.closeTo(0.8, 6), vector: null, payload: { content: 'b' } }]);
  });

  it('applies must-match payload filters', async () => {
    await client.upsertPoints('faces', [
      { id: A, vector: [1, 0], payload: { is_deleted: false } },
      { id: B, vector: [1, 0], payload: { is_deleted: true } },
    ]);

    const results = await client.searchPoints('faces', {
      vector: [1, 0],
      filter: { must: [{ key: 'is_deleted', match: { value: false } }] },
      limit: 10,
      withPayload: false,
      withVectors: true,
    });

    expect(results.map((point) => point.id)).toEqual([A]);
    expect(results[0].vector).toEqual([1, 0]);
    expect(results[0].payload).toBeNull();
  });

  it('retrieves by id case-insensitively and skips unknown ids', async () => {
    await client.upsertPoints('faces', [{ id: A, vector: [1, 0], payload: { content: 'a' } }]);

    const points = await client.retrievePoints('faces', {
      ids: [A.toUpperCase(), B],
      withPayload: true,
      withVectors: true,
    });

    expect(points).toEqual([{ id: A, vector: [1, 0], payload: { content: 'a' } }]);
  });

  it('stores copies so callers cannot mutate stored points', async () => {
    const vector = [1, 0];
    await client.upsertPoints('faces', [{ id: A, vector, payload: {} }]);
    vector[0] = 99;

    const [point] = await client.retrievePoints('faces', { ids: [A], withPayload: false, withVectors: true });
    expect(point.vector).toEqual([1, 0]);
  });

  it('clears every collection', async () => {
    client.clear();
    expect(await client.listCollections()).toEqual(new Set());
  });
});
