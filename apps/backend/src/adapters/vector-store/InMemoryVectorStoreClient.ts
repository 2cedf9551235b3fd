// =============================================================================
// In-Memory Vector Store Client
// =============================================================================
// Implements VectorStoreClientPort with process-local maps. Ranks by cosine
// similarity and honours payload filters, which is enough for development and
// for tests that must not reach a real database.

import type {
  DistanceMetric,
  PayloadFilter,
  PointPayload,
  RetrievedPoint,
  RetrievePointsRequest,
  ScoredPoint,
  SearchPointsRequest,
  VectorPoint,
  VectorStoreClientPort,
} from '../../ports/VectorStoreClientPort.js';
import { cosineSimilarity } from '../../domain/embedding/vectors.js';

interface StoredPoint {
  vector: number[];
  payload: PointPayload;
}

interface Collection {
  vectorSize: number;
  distance: DistanceMetric;
  points: Map<string, StoredPoint>;
}

function matchesFilter(payload: PointPayload, filter: PayloadFilter | undefined): boolean {
  if (!filter) return true;
  return filter.must.every((condition) => payload[condition.key] === condition.match.value);
}

/**
 * In-memory implementation of VectorStoreClientPort
 *
 * Errors mirror a real server: unknown collections, duplicate creates and
 * wrong-sized vectors are rejected.
 */
export class InMemoryVectorStoreClient implements VectorStoreClientPort {
  // Map<collectionName, Collection>
  private collections: Map<string, Collection> = new Map();

  async listCollections(): Promise<Set<string>> {
    return new Set(this.collections.keys());
  }

  async createCollection(name: string, vectorSize: number, distance: DistanceMetric): Promise<void> {
    if (this.collections.has(name)) {
      throw new Error(`Collection ${name} already exists`);
    }
    this.collections.set(name, { vectorSize, distance, points: new Map() });
  }

  async upsertPoints(collection: string, points: VectorPoint[]): Promise<void> {
    const target = this.require(collection);

    for (const point of points) {
      if (point.vector.length !== target.vectorSize) {
        throw new Error(
          `Wrong input: Vector dimension error: expected dim: ${target.vectorSize}, got ${point.vector.length}`
        );
      }
    }

    for (const point of points) {
      target.points.set(point.id.toLowerCase(), {
        vector: [...point.vector],
        payload: { ...point.payload },
      });
    }
  }

  async searchPoints(collection: string, request: SearchPointsRequest): Promise<ScoredPoint[]> {
    const target = this.require(collection);
    const scored: ScoredPoint[] = [];

    for (const [id, point] of target.points) {
      if (!matchesFilter(point.payload, request.filter)) continue;
      scored.push({
        id,
        score: cosineSimilarity(request.vector, point.vector),
        vector: request.withVectors ? [...point.vector] : null,
        payload: request.withPayload ? { ...point.payload } : null,
      });
    }

    return scored.sort((a, b) => b.score - a.score).slice(0, request.limit);
  }

  async retrievePoints(collection: string, request: RetrievePointsRequest): Promise<RetrievedPoint[]> {
    const target = this.require(collection);
    const found: RetrievedPoint[] = [];

    for (const rawId of request.ids) {
      const id = rawId.toLowerCase();
      const point = target.points.get(id);
      if (!point) continue;
      found.push({
        id,
        vector: request.withVectors ? [...point.vector] : null,
        payload: request.withPayload ? { ...point.payload } : null,
      });
    }

    return found;
  }

  // ===========================================================================
  // Helper methods for testing
  // ===========================================================================

  /**
   * Number of points stored in a collection; 0 if it does not exist
   */
  count(collection: string): number {
    return this.collections.get(collection)?.points.size ?? 0;
  }

  /**
   * Drop every collection
   */
  clear(): void {
    this.collections.clear();
  }

  private require(collection: string): Collection {
    const target = this.collections.get(collection);
    if (!target) {
      throw new Error(`Not found: Collection \`${collection}\` doesn't exist!`);
    }
    return target;
  }
}
