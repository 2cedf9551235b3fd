// =============================================================================
// Port Interfaces - Barrel Export
// =============================================================================
// Ports define the contracts between the application core and external adapters.

// Cancellation options shared by every operation
export * from './OperationOptions.js';

// Neural inference backend (ONNX, degraded fallback)
export * from './InferenceRunnerPort.js';

// Image embedding generation
export * from './EmbeddingPort.js';

// Per-batch metrics sink
export * from './EmbeddingMetricsPort.js';

// Remote vector database (Qdrant, in-memory)
export * from './VectorStoreClientPort.js';

// Document-level vector store
export * from './VectorStorePort.js';
