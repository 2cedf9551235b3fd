// =============================================================================
// Application Services - Barrel Export
// =============================================================================

// Embedding pipeline
export * from './ImagePreprocessor.js';
export * from './EmbeddingService.js';

// Vector storage
export * from './CollectionLifecycle.js';
export * from './VectorStoreService.js';

// Face enrollment
export * from './EnrollmentService.js';

// Health reporting
export * from './DiagnosticsService.js';
