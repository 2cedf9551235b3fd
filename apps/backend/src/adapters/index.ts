// =============================================================================
// Adapters - Barrel Export
// =============================================================================

// Inference
export * from './inference/OnnxInferenceRunner.js';
export * from './inference/DeterministicInferenceRunner.js';

// Vector store clients
export * from './vector-store/QdrantVectorStoreClient.js';
export * from './vector-store/InMemoryVectorStoreClient.js';

// Telemetry
export * from './telemetry/OtelEmbeddingMetrics.js';
