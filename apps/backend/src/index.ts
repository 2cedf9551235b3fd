// =============================================================================
// FaceVault Backend - Public API
// =============================================================================

export * from './ports/index.js';
export * from './adapters/index.js';
export * from './application/services/index.js';
export * from './domain/errors/index.js';
export * from './domain/embedding/tensor.js';
export * from './domain/embedding/vectors.js';
export { createFaceVault, type FaceVault, type FaceVaultOverrides } from './services/index.js';
export {
  loadConfig,
  loadConfigFromEnvironment,
  REQUIRED_VECTOR_SIZE,
  type FaceVaultConfig,
  type EmbeddingConfig,
  type VectorStoreConfig,
  type TelemetryConfig,
} from './infrastructure/config/index.js';
export { initTelemetry, shutdownTelemetry } from './infrastructure/observability/index.js';
export { logger, Logger, type LogLevel } from './infrastructure/logging/logger.js';
