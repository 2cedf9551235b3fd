// =============================================================================
// Diagnostics Service
// =============================================================================

import { access } from 'node:fs/promises';
import type { ModelInfo } from '@facevault/shared-types';
import type { EmbeddingPort } from '../../ports/EmbeddingPort.js';
import type { VectorStorePort } from '../../ports/VectorStorePort.js';
import type { EmbeddingConfig, VectorStoreConfig } from '../../infrastructure/config/index.js';
import { logger, type Logger } from '../../infrastructure/logging/logger.js';

export type DiagnosticIssueCode = 'collection_init_failed' | 'model_file_missing';

export interface DiagnosticIssue {
  code: DiagnosticIssueCode;
  message: string;
}

export interface DiagnosticsSnapshot {
  model: ModelInfo;
  modelPath: string;
  modelFileExists: boolean;
  storeEndpoint: string;
  collectionName: string;
  vectorSize: number;
  autoCreateCollection: boolean;
  storeReachable: boolean;
  issues: DiagnosticIssue[];
}

/**
 * Point-in-time health report. Failures are reported as issues, never thrown.
 */
export class DiagnosticsService {
  private readonly log: Logger;

  constructor(
    private readonly embedding: EmbeddingPort,
    private readonly store: VectorStorePort,
    private readonly config: { embedding: EmbeddingConfig; vectorStore: VectorStoreConfig },
    parentLogger: Logger = logger
  ) {
    this.log = parentLogger.child({ component: 'diagnostics' });
  }

  async snapshot(): Promise<DiagnosticsSnapshot> {
    const { embedding, vectorStore } = this.config;
    const issues: DiagnosticIssue[] = [];

    const modelFileExists = await fileExists(embedding.modelPath);
    if (!modelFileExists) {
      issues.push({ code: 'model_file_missing', message: `No model file at ${embedding.modelPath}` });
    }

    let storeReachable = true;
    try {
      await this.store.ensureCollectionReady();
    } catch (error) {
      storeReachable = false;
      const message = error instanceof Error ? error.message : String(error);
      issues.push({ code: 'collection_init_failed', message });
      this.log.warn('Collection check failed during diagnostics', { reason: message });
    }

    return {
      model: this.embedding.getModelInfo(),
      modelPath: embedding.modelPath,
      modelFileExists,
      storeEndpoint: vectorStore.storeEndpoint,
      collectionName: vectorStore.collectionName,
      vectorSize: this.embedding.getDimension(),
      autoCreateCollection: vectorStore.autoCreateCollection,
      storeReachable,
      issues,
    };
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
