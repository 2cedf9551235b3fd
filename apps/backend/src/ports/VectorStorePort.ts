import type { VectorDocument, VectorDocumentInput, VectorSearchMatch } from '@facevault/shared-types';
import type { OperationOptions } from './OperationOptions.js';

// =============================================================================
// Vector Store Port
// =============================================================================

/**
 * Port interface for the document-level vector store
 *
 * Enforces vector-length and identifier invariants on top of a
 * VectorStoreClientPort. Deletion is always soft.
 */
export interface VectorStorePort {
  /**
   * Insert or replace a document
   *
   * Preserves `createdAt` of an existing document with the same id and
   * reactivates it if it was soft-deleted.
   *
   * @throws InvalidDimensionError if the embedding length is wrong
   * @throws InvalidIdentifierError if the id is not a UUID
   */
  upsert(document: VectorDocumentInput, options?: OperationOptions): Promise<VectorDocument>;

  /**
   * Soft-delete a document
   *
   * @returns false if no document has this id
   */
  downsert(id: string, options?: OperationOptions): Promise<boolean>;

  /**
   * Similarity search, most similar first
   *
   * @param topK - Maximum results, 1 to 10,000
   * @param includeDeleted - Also return soft-deleted documents
   */
  search(
    embedding: number[],
    topK?: number,
    includeDeleted?: boolean,
    options?: OperationOptions
  ): Promise<VectorDocument[]>;

  /**
   * Same as search(), keeping the similarity score the store reported
   */
  searchMatches(
    embedding: number[],
    topK?: number,
    includeDeleted?: boolean,
    options?: OperationOptions
  ): Promise<VectorSearchMatch[]>;

  /**
   * Fetch a document by id, deleted or not
   */
  get(id: string, options?: OperationOptions): Promise<VectorDocument | null>;

  /**
   * Make sure the backing collection exists
   */
  ensureCollectionReady(options?: OperationOptions): Promise<void>;
}
