import { describe, it, expect, vi } from 'vitest';
import { CollectionUnavailableError } from '@facevault/shared-types';
import { InMemoryVectorStoreClient } from '../../adapters/vector-store/InMemoryVectorStoreClient.js';
import { Logger } from '../../infrastructure/logging/logger.js';
import { CollectionLifecycle } from './CollectionLifecycle.js';

const quietLogger = new Logger({ level: 'error' });

function setup(autoCreateCollection = true) {
  const client = new InMemoryVectorStoreClient();
  const lifecycle = new CollectionLifecycle(
    client,
    { collectionName: 'faces', vectorSize: 512, autoCreateCollection },
    quietLogger
  );
  return { client, lifecycle };
}

describe('CollectionLifecycle', () => {
  it('creates a missing collection once and becomes ready', async () => {
    const { client, lifecycle } = setup();
    const createSpy = vi.spyOn(client, 'createCollection');

    expect(lifecycle.isReady()).toBe(false);
    await lifecycle.ensureReady();

    expect(lifecycle.isReady()).toBe(true);
    expect(createSpy).toHaveBeenCalledWith('faces', 512, 'Cosine');
    expect(await client.listCollections()).toEqual(new Set(['faces']));
  });

  it('calls createCollection at most once under concurrent first use', async () => {
    const { client, lifecycle } = setup();
    const listSpy = vi.spyOn(client, 'listCollections');
    const createSpy = vi.spyOn(client, 'createCollection');

    await Promise.all(Array.from({ length: 20 }, () => lifecycle.ensureReady()));

    expect(createSpy).toHaveBeenCalledTimes(1);
    expect(listSpy).toHaveBeenCalledTimes(1);
  });

  it('does not touch the store again once ready', async () => {
    const { client, lifecycle } = setup();
    await lifecycle.ensureReady();
    const listSpy = vi.spyOn(client, 'listCollections');

    await lifecycle.ensureReady();
    await lifecycle.ensureReady();

    expect(listSpy).not.toHaveBeenCalled();
  });

  it('skips creation when the collection already exists', async () => {
    const { client, lifecycle } = setup();
    await client.createCollection('faces', 512, 'Cosine');
    const createSpy = vi.spyOn(client, 'createCollection');

    await lifecycle.ensureReady();

    expect(createSpy).not.toHaveBeenCalled();
    expect(lifecycle.isReady()).toBe(true);
  });

  it('marks ready without creating when auto-create is disabled', async () => {
    const { client, lifecycle } = setup(false);
    const createSpy = vi.spyOn(client, 'createCollection');

    await lifecycle.ensureReady();

    expect(createSpy).not.toHaveBeenCalled();
    expect(lifecycle.isReady()).toBe(true);
  });

  it('stays unverified after a storage error and retries on the next call', async () => {
    const { client, lifecycle } = setup();
    const outage = new Error('connection refused');
    vi.spyOn(client, 'listCollections').mockRejectedValueOnce(outage);

    const failure = await lifecycle.ensureReady().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CollectionUnavailableError);
    expect(failure).toHaveProperty('cause', outage);
    expect(lifecycle.isReady()).toBe(false);

    await lifecycle.ensureReady();
    expect(lifecycle.isReady()).toBe(true);
  });

  it('reports a failed create as CollectionUnavailableError', async () => {
    const { client, lifecycle } = setup();
    vi.spyOn(client, 'createCollection').mockRejectedValueOnce(new Error('forbidden'));

    await expect(lifecycle.ensureReady()).rejects.toThrow('Collection faces is unavailable: forbidden');
    expect(lifecycle.isReady()).toBe(false);
  });

  it('verifies again after reset', async () => {
    const { client, lifecycle } = setup();
    await lifecycle.ensureReady();
    const listSpy = vi.spyOn(client, 'listCollections');

    lifecycle.reset();
    await lifecycle.ensureReady();

    expect(listSpy).toHaveBeenCalledTimes(1);
  });
});
