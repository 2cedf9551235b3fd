// =============================================================================
// Base Application Error
// =============================================================================

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    // V8 specific - available in Node.js
    if ('captureStackTrace' in Error && typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

// =============================================================================
// Validation Error (400)
// =============================================================================

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, code = 'VALIDATION_ERROR', cause?: unknown) {
    super(code, message, 400, details, cause);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends ValidationError {
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, { issues });
    this.name = 'ConfigurationError';
  }
}

export class InvalidDimensionError extends ValidationError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Vector length mismatch. Expected ${expected}, got ${actual}.`, { expected, actual }, 'INVALID_DIMENSION');
    this.name = 'InvalidDimensionError';
  }
}

export class InvalidIdentifierError extends ValidationError {
  constructor(value: string) {
    super(`'${value}' is not a valid UUID.`, { value }, 'INVALID_IDENTIFIER');
    this.name = 'InvalidIdentifierError';
  }
}

export class InvalidArgumentError extends ValidationError {
  constructor(argument: string, message: string) {
    super(`${argument}: ${message}`, { argument }, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

export class DecodeError extends ValidationError {
  constructor(message: string, cause?: unknown) {
    super(message, undefined, 'IMAGE_DECODE_ERROR', cause);
    this.name = 'DecodeError';
  }
}

// =============================================================================
// Inference Errors
// =============================================================================

export class ModelUnavailableError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('MODEL_UNAVAILABLE', message, 503, undefined, cause);
    this.name = 'ModelUnavailableError';
  }
}

export class InferenceFailureError extends AppError {
  constructor(batchSize: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('INFERENCE_FAILURE', `Inference failed for batch of ${batchSize}: ${reason}`, 502, { batchSize }, cause);
    this.name = 'InferenceFailureError';
  }
}

export class EmptyResultError extends AppError {
  constructor(message = 'Embedding generation produced no output.') {
    super('EMPTY_RESULT', message, 500);
    this.name = 'EmptyResultError';
  }
}

// =============================================================================
// Vector Store Errors
// =============================================================================

export class CollectionUnavailableError extends AppError {
  constructor(collection: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('COLLECTION_UNAVAILABLE', `Collection ${collection} is unavailable: ${reason}`, 503, { collection }, cause);
    this.name = 'CollectionUnavailableError';
  }
}

export class StoreOperationFailureError extends AppError {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('STORE_OPERATION_FAILURE', `Vector store ${operation} failed: ${reason}`, 502, { operation }, cause);
    this.name = 'StoreOperationFailureError';
  }
}
