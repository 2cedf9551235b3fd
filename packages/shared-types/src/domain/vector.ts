import { z } from 'zod';

// =============================================================================
// Vector Document
// =============================================================================

/**
 * Hyphenated 8-4-4-4-12 hex identifier. Version and variant bits are not
 * checked, so any GUID-shaped id is accepted.
 */
export const DOCUMENT_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const DocumentIdSchema = z.string().regex(DOCUMENT_ID_PATTERN);

export const VectorMetadataSchema = z.record(z.string(), z.string());

export type VectorMetadata = z.infer<typeof VectorMetadataSchema>;

export const VectorDocumentSchema = z.object({
  id: DocumentIdSchema,
  content: z.string(),
  embedding: z.array(z.number()), // 512 floats for ArcFace-style face embeddings
  metadata: VectorMetadataSchema.optional(),
  isDeleted: z.boolean(),
  createdAt: z.date(),
  updatedAt: z.date(),
  deletedAt: z.date().nullable(),
});

export type VectorDocument = Readonly<z.infer<typeof VectorDocumentSchema>>;

/**
 * Fields a caller supplies when building a document. Lifecycle fields are
 * optional and filled in by the vector store on write.
 */
export interface VectorDocumentInput {
  id: string;
  content: string;
  embedding: number[];
  metadata?: VectorMetadata;
  isDeleted?: boolean;
  createdAt?: Date;
  updatedAt?: Date;
  deletedAt?: Date | null;
}

/**
 * Build a frozen document, defaulting timestamps to `now`.
 */
export function createVectorDocument(input: VectorDocumentInput, now: Date = new Date()): VectorDocument {
  return Object.freeze({
    id: input.id,
    content: input.content,
    embedding: input.embedding,
    metadata: input.metadata,
    isDeleted: input.isDeleted ?? false,
    createdAt: input.createdAt ?? now,
    updatedAt: input.updatedAt ?? input.createdAt ?? now,
    deletedAt: input.deletedAt ?? null,
  });
}

/**
 * Copy-on-write update: returns a new frozen document with `changes` applied.
 * The source document is never touched.
 */
export function withDocumentChanges(
  document: VectorDocument,
  changes: Partial<Omit<VectorDocument, 'id'>>
): VectorDocument {
  return Object.freeze({ ...document, ...changes });
}

// =============================================================================
// Vector Search
// =============================================================================

export const VectorSearchMatchSchema = z.object({
  document: VectorDocumentSchema,
  score: z.number(), // Cosine similarity reported by the store
});

export type VectorSearchMatch = z.infer<typeof VectorSearchMatchSchema>;

// =============================================================================
// Model Info
// =============================================================================

export const ModelInfoSchema = z.object({
  modelName: z.string(),
  modelVersion: z.string(),
  executionBackend: z.string(), // e.g. "wasm", "cpu-degraded"
  contentHash: z.string(), // Expected SHA-256 of the model file, or "n/a"
  loadedAt: z.date(),
  vectorSize: z.number().int().positive(),
  inputSize: z.number().int().positive(), // Square edge of the input tensor
});

export type ModelInfo = Readonly<z.infer<typeof ModelInfoSchema>>;

// =============================================================================
// Embedding Batch Metrics
// =============================================================================

export const EmbeddingBatchMetricsSchema = z.object({
  batchSize: z.number().int().positive(),
  latencyMs: z.number().nonnegative(),
  activeComputeUnits: z.number().int().nonnegative(), // 0 when the degraded path ran
  degraded: z.boolean(),
});

export type EmbeddingBatchMetrics = z.infer<typeof EmbeddingBatchMetricsSchema>;
