// =============================================================================
// Vector Store Client Port
// =============================================================================

export type DistanceMetric = 'Cosine' | 'Euclid' | 'Dot';

export type PayloadValue = string | number | boolean | null;

export type PointPayload = Record<string, PayloadValue>;

/**
 * A point as written to the store
 */
export interface VectorPoint {
  id: string;
  vector: number[];
  payload: PointPayload;
}

/**
 * A point as read back; vector and payload are null when not requested
 */
export interface RetrievedPoint {
  id: string;
  vector: number[] | null;
  payload: PointPayload | null;
}

export interface ScoredPoint extends RetrievedPoint {
  score: number;
}

export interface FieldMatchCondition {
  key: string;
  match: { value: string | number | boolean };
}

/**
 * Payload filter; every `must` condition has to hold
 */
export interface PayloadFilter {
  must: FieldMatchCondition[];
}

export interface SearchPointsRequest {
  vector: number[];
  filter?: PayloadFilter;
  limit: number;
  withPayload: boolean;
  withVectors: boolean;
}

export interface RetrievePointsRequest {
  ids: string[];
  withPayload: boolean;
  withVectors: boolean;
}

/**
 * Port interface for the remote vector database
 *
 * Thin wrapper over the database's collection and point APIs. Retry and
 * backoff, if any, belong to the implementation.
 */
export interface VectorStoreClientPort {
  /**
   * Names of every collection in the database
   */
  listCollections(): Promise<Set<string>>;

  /**
   * Create a collection of fixed-size vectors
   */
  createCollection(name: string, vectorSize: number, distance: DistanceMetric): Promise<void>;

  /**
   * Insert or replace points by id
   */
  upsertPoints(collection: string, points: VectorPoint[]): Promise<void>;

  /**
   * Nearest-neighbour search, most similar first
   */
  searchPoints(collection: string, request: SearchPointsRequest): Promise<ScoredPoint[]>;

  /**
   * Fetch points by id; unknown ids are omitted from the result
   */
  retrievePoints(collection: string, request: RetrievePointsRequest): Promise<RetrievedPoint[]>;
}
