// =============================================================================
// FaceVault Backend - Entry Point
// =============================================================================
// Loads configuration, starts telemetry, builds the pipeline and prints a
// diagnostics snapshot. Exits non-zero if configuration or the model fails.

import { loadConfigFromEnvironment } from './infrastructure/config/index.js';
import { initTelemetry, shutdownTelemetry } from './infrastructure/observability/index.js';
import { logger } from './infrastructure/logging/logger.js';
import { createFaceVault } from './services/index.js';

async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  logger.setLevel(config.logLevel);

  // Start tracing before the pipeline so its first spans are captured
  initTelemetry(config.telemetry, config.nodeEnv);

  try {
    const faceVault = await createFaceVault(config);
    try {
      const snapshot = await faceVault.diagnostics.snapshot();
      console.log(JSON.stringify(snapshot, null, 2));
    } finally {
      await faceVault.close();
    }
  } finally {
    await shutdownTelemetry();
  }
}

main().catch((error: unknown) => {
  logger.error('FaceVault failed to start', error);
  process.exitCode = 1;
});
