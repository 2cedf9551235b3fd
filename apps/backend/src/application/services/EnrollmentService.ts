// =============================================================================
// Enrollment Service
// =============================================================================
// Face enrollment on top of the embedding pipeline: register a person from an
// image, deactivate them, and identify an unknown face against everyone still
// enrolled.

import { v4 as uuidv4 } from 'uuid';
import {
  InvalidArgumentError,
  type VectorDocument,
  type VectorMetadata,
  type VectorSearchMatch,
} from '@facevault/shared-types';
import type { EmbeddingPort, ImageInput } from '../../ports/EmbeddingPort.js';
import type { VectorStorePort } from '../../ports/VectorStorePort.js';
import type { OperationOptions } from '../../ports/OperationOptions.js';
import { logger, type Logger } from '../../infrastructure/logging/logger.js';
import { decodeImagePayload } from './ImagePreprocessor.js';
import { DEFAULT_TOP_K } from './VectorStoreService.js';

// =============================================================================
// Types
// =============================================================================

/** Raw bytes, or a base64 string with an optional data-URL prefix. */
export type ImagePayload = ImageInput | string;

export interface EnrollRequest {
  /** Existing id to re-enroll; a new one is generated when absent */
  id?: string;
  displayName: string;
  image: ImagePayload;
  metadata?: VectorMetadata;
}

export interface IdentifyOptions extends OperationOptions {
  topK?: number;
  /** Drop matches scoring below this similarity */
  minScore?: number;
}

// =============================================================================
// Service
// =============================================================================

export class EnrollmentService {
  private readonly log: Logger;

  constructor(
    private readonly embedding: EmbeddingPort,
    private readonly store: VectorStorePort,
    parentLogger: Logger = logger
  ) {
    this.log = parentLogger.child({ component: 'enrollment' });
  }

  /**
   * Embed the image and store it under the display name.
   *
   * @throws InvalidArgumentError if the display name is blank
   * @throws DecodeError if the image cannot be read
   */
  async enroll(request: EnrollRequest, options: OperationOptions = {}): Promise<VectorDocument> {
    const displayName = request.displayName.trim();
    if (displayName.length === 0) {
      throw new InvalidArgumentError('displayName', 'must not be empty');
    }

    const image = toImageBytes(request.image);
    const vector = await this.embedding.generate(image, options);

    const document = await this.store.upsert(
      {
        id: request.id ?? uuidv4(),
        content: displayName,
        embedding: vector,
        metadata: request.metadata,
      },
      options
    );

    this.log.info('Enrolled face', { documentId: document.id });
    return document;
  }

  /**
   * Soft-delete an enrollment. Returns false if the id is unknown.
   */
  async deactivate(id: string, options: OperationOptions = {}): Promise<boolean> {
    return this.store.downsert(id, options);
  }

  /**
   * Find the enrolled people most similar to the face in `image`.
   */
  async identify(image: ImagePayload, options: IdentifyOptions = {}): Promise<VectorSearchMatch[]> {
    const { topK = DEFAULT_TOP_K, minScore, signal } = options;

    const vector = await this.embedding.generate(toImageBytes(image), { signal });
    const matches = await this.store.searchMatches(vector, topK, false, { signal });

    if (minScore === undefined) {
      return matches;
    }
    return matches.filter((match) => match.score >= minScore);
  }
}

function toImageBytes(image: ImagePayload): ImageInput {
  return typeof image === 'string' ? decodeImagePayload(image) : image;
}
