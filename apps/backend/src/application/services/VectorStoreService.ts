// =============================================================================
// Vector Store Service
// =============================================================================
// Document-level store over a VectorStoreClientPort. Validates vector length
// and identifiers before any network call, maps documents to point payloads,
// and implements soft deletion.

import {
  createVectorDocument,
  DocumentIdSchema,
  InvalidArgumentError,
  InvalidDimensionError,
  InvalidIdentifierError,
  StoreOperationFailureError,
  withDocumentChanges,
  type VectorDocument,
  type VectorDocumentInput,
  type VectorMetadata,
  type VectorSearchMatch,
} from '@facevault/shared-types';
import type { VectorStorePort } from '../../ports/VectorStorePort.js';
import type { OperationOptions } from '../../ports/OperationOptions.js';
import type {
  PayloadFilter,
  PointPayload,
  RetrievedPoint,
  ScoredPoint,
  VectorPoint,
  VectorStoreClientPort,
} from '../../ports/VectorStoreClientPort.js';
import { logger, type Logger } from '../../infrastructure/logging/logger.js';
import type { CollectionLifecycle } from './CollectionLifecycle.js';

// =============================================================================
// Payload Layout
// =============================================================================

export const PAYLOAD_KEYS = {
  content: 'content',
  isDeleted: 'is_deleted',
  createdAt: 'created_at',
  updatedAt: 'updated_at',
  deletedAt: 'deleted_at',
} as const;

/** Prefix that keeps caller metadata clear of the reserved keys above. */
export const METADATA_PREFIX = 'meta_';

export const DEFAULT_TOP_K = 10;
export const MAX_TOP_K = 10_000;

const ACTIVE_ONLY_FILTER: PayloadFilter = {
  must: [{ key: PAYLOAD_KEYS.isDeleted, match: { value: false } }],
};

interface PayloadFields {
  content: string;
  metadata?: VectorMetadata;
  isDeleted: boolean;
  createdAt: Date;
  updatedAt: Date;
  deletedAt: Date | null;
}

export function toPayload(fields: PayloadFields): PointPayload {
  const payload: PointPayload = {
    [PAYLOAD_KEYS.content]: fields.content,
    [PAYLOAD_KEYS.isDeleted]: fields.isDeleted,
    [PAYLOAD_KEYS.createdAt]: fields.createdAt.toISOString(),
    [PAYLOAD_KEYS.updatedAt]: fields.updatedAt.toISOString(),
  };

  if (fields.deletedAt) {
    payload[PAYLOAD_KEYS.deletedAt] = fields.deletedAt.toISOString();
  }

  for (const [key, value] of Object.entries(fields.metadata ?? {})) {
    payload[`${METADATA_PREFIX}${key}`] = value;
  }

  return payload;
}

function readDate(payload: PointPayload, key: string): Date | null {
  const value = payload[key];
  if (typeof value !== 'string') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Rebuild a document from a stored point. Missing timestamps fall back to
 * `now`; metadata keys lose their prefix.
 */
export function fromPoint(point: RetrievedPoint, now: Date = new Date()): VectorDocument {
  const payload = point.payload ?? {};
  const content = payload[PAYLOAD_KEYS.content];

  const metadata: VectorMetadata = {};
  let hasMetadata = false;
  for (const [key, value] of Object.entries(payload)) {
    if (key.startsWith(METADATA_PREFIX) && typeof value === 'string') {
      metadata[key.slice(METADATA_PREFIX.length)] = value;
      hasMetadata = true;
    }
  }

  const createdAt = readDate(payload, PAYLOAD_KEYS.createdAt) ?? now;

  return createVectorDocument({
    id: point.id,
    content: typeof content === 'string' ? content : '',
    embedding: point.vector ?? [],
    metadata: hasMetadata ? metadata : undefined,
    isDeleted: payload[PAYLOAD_KEYS.isDeleted] === true,
    createdAt,
    updatedAt: readDate(payload, PAYLOAD_KEYS.updatedAt) ?? createdAt,
    deletedAt: readDate(payload, PAYLOAD_KEYS.deletedAt),
  });
}

// =============================================================================
// Service
// =============================================================================

export interface VectorStoreServiceOptions {
  collectionName: string;
  vectorSize: number;
  /** Clock for lifecycle timestamps */
  now?: () => Date;
}

export class VectorStoreService implements VectorStorePort {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly client: VectorStoreClientPort,
    private readonly lifecycle: CollectionLifecycle,
    private readonly options: VectorStoreServiceOptions,
    parentLogger: Logger = logger
  ) {
    this.now = options.now ?? (() => new Date());
    this.log = parentLogger.child({ component: 'vector-store', collection: options.collectionName });
  }

  async upsert(document: VectorDocumentInput, options: OperationOptions = {}): Promise<VectorDocument> {
    this.assertVectorSize(document.embedding);
    const id = this.parseId(document.id);
    const { signal } = options;

    await this.lifecycle.ensureReady(signal);
    const existing = await this.get(id, options);

    const now = this.now();
    const changes = {
      content: document.content,
      embedding: [...document.embedding],
      metadata: document.metadata,
      isDeleted: false,
      updatedAt: now,
      deletedAt: null,
    };
    // createdAt always comes from the stored document when there is one
    const saved = existing
      ? withDocumentChanges(existing, changes)
      : createVectorDocument({ id, ...changes, createdAt: now });

    signal?.throwIfAborted();
    await this.write('upsert', { id, vector: [...saved.embedding], payload: toPayload(saved) });

    this.log.info('Upserted document', { documentId: id, reactivated: existing?.isDeleted === true });
    return saved;
  }

  async downsert(id: string, options: OperationOptions = {}): Promise<boolean> {
    const documentId = this.parseId(id);
    const { signal } = options;

    await this.lifecycle.ensureReady(signal);
    const existing = await this.get(documentId, options);
    if (!existing) {
      this.log.debug('Soft delete skipped; document not found', { documentId });
      return false;
    }

    const now = this.now();
    const deleted = withDocumentChanges(existing, { isDeleted: true, updatedAt: now, deletedAt: now });

    signal?.throwIfAborted();
    await this.write('downsert', { id: documentId, vector: [...deleted.embedding], payload: toPayload(deleted) });

    this.log.info('Soft-deleted document', { documentId });
    return true;
  }

  async search(
    embedding: number[],
    topK: number = DEFAULT_TOP_K,
    includeDeleted: boolean = false,
    options: OperationOptions = {}
  ): Promise<VectorDocument[]> {
    const matches = await this.searchMatches(embedding, topK, includeDeleted, options);
    return matches.map((match) => match.document);
  }

  async searchMatches(
    embedding: number[],
    topK: number = DEFAULT_TOP_K,
    includeDeleted: boolean = false,
    options: OperationOptions = {}
  ): Promise<VectorSearchMatch[]> {
    this.assertVectorSize(embedding);
    if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
      throw new InvalidArgumentError('topK', `must be an integer between 1 and ${MAX_TOP_K}, got ${topK}`);
    }
    const { signal } = options;

    await this.lifecycle.ensureReady(signal);
    signal?.throwIfAborted();

    let points: ScoredPoint[];
    try {
      points = await this.client.searchPoints(this.options.collectionName, {
        vector: embedding,
        filter: includeDeleted ? undefined : ACTIVE_ONLY_FILTER,
        limit: topK,
        withPayload: true,
        withVectors: true,
      });
    } catch (error) {
      throw new StoreOperationFailureError('search', error);
    }

    const now = this.now();
    return points.map((point) => ({ document: fromPoint(point, now), score: point.score }));
  }

  async get(id: string, options: OperationOptions = {}): Promise<VectorDocument | null> {
    const documentId = this.parseId(id);
    const { signal } = options;

    await this.lifecycle.ensureReady(signal);
    signal?.throwIfAborted();

    let points: RetrievedPoint[];
    try {
      points = await this.client.retrievePoints(this.options.collectionName, {
        ids: [documentId],
        withPayload: true,
        withVectors: true,
      });
    } catch (error) {
      throw new StoreOperationFailureError('retrieve', error);
    }

    const point = points[0];
    return point ? fromPoint(point, this.now()) : null;
  }

  async ensureCollectionReady(options: OperationOptions = {}): Promise<void> {
    await this.lifecycle.ensureReady(options.signal);
  }

  // ===========================================================================
  // Validation & Writes
  // ===========================================================================

  private assertVectorSize(embedding: readonly number[]): void {
    if (embedding.length !== this.options.vectorSize) {
      throw new InvalidDimensionError(this.options.vectorSize, embedding.length);
    }
  }

  private parseId(id: string): string {
    const parsed = DocumentIdSchema.safeParse(id);
    if (!parsed.success) {
      throw new InvalidIdentifierError(id);
    }
    return parsed.data.toLowerCase();
  }

  private async write(operation: string, point: VectorPoint): Promise<void> {
    try {
      await this.client.upsertPoints(this.options.collectionName, [point]);
    } catch (error) {
      this.log.error(`Vector store ${operation} failed`, error, { documentId: point.id });
      throw new StoreOperationFailureError(operation, error);
    }
  }
}
