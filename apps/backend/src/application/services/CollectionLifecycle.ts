// =============================================================================
// Collection Lifecycle
// =============================================================================
// Makes sure the backing collection exists before the first read or write.
// Once verified the check is never repeated; concurrent first callers share a
// single verification.

import { CollectionUnavailableError } from '@facevault/shared-types';
import type { DistanceMetric, VectorStoreClientPort } from '../../ports/VectorStoreClientPort.js';
import { AsyncMutex } from '../../infrastructure/concurrency/AsyncSemaphore.js';
import { logger, type Logger } from '../../infrastructure/logging/logger.js';

export interface CollectionLifecycleOptions {
  collectionName: string;
  vectorSize: number;
  autoCreateCollection: boolean;
  distance?: DistanceMetric;
}

export class CollectionLifecycle {
  private ready = false;
  private readonly mutex = new AsyncMutex();
  private readonly log: Logger;

  constructor(
    private readonly client: VectorStoreClientPort,
    private readonly options: CollectionLifecycleOptions,
    parentLogger: Logger = logger
  ) {
    this.log = parentLogger.child({ component: 'collection-lifecycle', collection: options.collectionName });
  }

  isReady(): boolean {
    return this.ready;
  }

  /**
   * Verify (and if allowed, create) the collection.
   *
   * Returns immediately once verified. A failure leaves the state unverified
   * so the next call tries again.
   *
   * @throws CollectionUnavailableError if the store cannot be reached or the create fails
   */
  async ensureReady(signal?: AbortSignal): Promise<void> {
    if (this.ready) return;

    await this.mutex.runExclusive(async () => {
      // Another caller may have finished while we waited
      if (this.ready) return;
      signal?.throwIfAborted();

      const { collectionName, vectorSize, autoCreateCollection } = this.options;

      let existing: Set<string>;
      try {
        existing = await this.client.listCollections();
      } catch (error) {
        this.log.error('Failed to list collections', error);
        throw new CollectionUnavailableError(collectionName, error);
      }

      if (!existing.has(collectionName)) {
        if (autoCreateCollection) {
          signal?.throwIfAborted();
          try {
            await this.client.createCollection(collectionName, vectorSize, this.options.distance ?? 'Cosine');
          } catch (error) {
            this.log.error('Failed to create collection', error);
            throw new CollectionUnavailableError(collectionName, error);
          }
          this.log.info('Created collection', { vectorSize });
        } else {
          this.log.warn('Collection does not exist and auto-create is disabled');
        }
      }

      this.ready = true;
    }, signal);
  }

  /**
   * Forget the verification, e.g. after the collection was dropped externally
   */
  reset(): void {
    this.ready = false;
  }
}
