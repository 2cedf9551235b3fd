// =============================================================================
// Shared Types - Barrel Export
// =============================================================================

export * from './domain/vector.js';
export * from './errors/index.js';
