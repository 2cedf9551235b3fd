// =============================================================================
// Qdrant Vector Store Client
// =============================================================================
// Implements VectorStoreClientPort over Qdrant's REST API. Writes wait for the
// server to apply them so a read straight after an upsert sees the new point.

import { QdrantClient } from '@qdrant/js-client-rest';
import type {
  DistanceMetric,
  PayloadValue,
  PointPayload,
  RetrievedPoint,
  RetrievePointsRequest,
  ScoredPoint,
  SearchPointsRequest,
  VectorPoint,
  VectorStoreClientPort,
} from '../../ports/VectorStoreClientPort.js';

/**
 * The subset of the Qdrant client this adapter calls
 */
export type QdrantRestApi = Pick<QdrantClient, 'getCollections' | 'createCollection' | 'upsert' | 'search' | 'retrieve'>;

export interface QdrantConnectionOptions {
  url: string;
  apiKey?: string;
}

// =============================================================================
// Response Narrowing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPayloadValue(value: unknown): value is PayloadValue {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isDenseVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'number');
}

/**
 * Keep the unnamed dense vector; named or sparse vectors are not used here.
 */
export function toDenseVector(value: unknown): number[] | null {
  return isDenseVector(value) ? value : null;
}

/**
 * Keep scalar payload fields; nested objects and arrays are dropped.
 */
export function toPointPayload(value: unknown): PointPayload | null {
  if (!isRecord(value)) return null;

  const payload: PointPayload = {};
  for (const [key, entry] of Object.entries(value)) {
    if (isPayloadValue(entry)) {
      payload[key] = entry;
    }
  }
  return payload;
}

// =============================================================================
// Client
// =============================================================================

export class QdrantVectorStoreClient implements VectorStoreClientPort {
  private readonly client: QdrantRestApi;

  constructor(connection: QdrantConnectionOptions, client?: QdrantRestApi) {
    this.client = client ?? new QdrantClient({ url: connection.url, apiKey: connection.apiKey });
  }

  async listCollections(): Promise<Set<string>> {
    const { collections } = await this.client.getCollections();
    return new Set(collections.map((collection) => collection.name));
  }

  async createCollection(name: string, vectorSize: number, distance: DistanceMetric): Promise<void> {
    await this.client.createCollection(name, {
      vectors: { size: vectorSize, distance },
    });
  }

  async upsertPoints(collection: string, points: VectorPoint[]): Promise<void> {
    await this.client.upsert(collection, {
      wait: true,
      points: points.map((point) => ({
        id: point.id,
        vector: point.vector,
        payload: point.payload,
      })),
    });
  }

  async searchPoints(collection: string, request: SearchPointsRequest): Promise<ScoredPoint[]> {
    const results = await this.client.search(collection, {
      vector: request.vector,
      filter: request.filter,
      limit: request.limit,
      with_payload: request.withPayload,
      with_vector: request.withVectors,
    });

    return results.map((point) => ({
      id: String(point.id),
      score: point.score,
      vector: toDenseVector(point.vector),
      payload: toPointPayload(point.payload),
    }));
  }

  async retrievePoints(collection: string, request: RetrievePointsRequest): Promise<RetrievedPoint[]> {
    const records = await this.client.retrieve(collection, {
      ids: request.ids,
      with_payload: request.withPayload,
      with_vector: request.withVectors,
    });

    return records.map((record) => ({
      id: String(record.id),
      vector: toDenseVector(record.vector),
      payload: toPointPayload(record.payload),
    }));
  }
}
