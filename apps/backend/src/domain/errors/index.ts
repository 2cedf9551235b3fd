// =============================================================================
// Domain Errors - Re-export from shared-types
// =============================================================================

export {
  AppError,
  ValidationError,
  ConfigurationError,
  InvalidDimensionError,
  InvalidIdentifierError,
  InvalidArgumentError,
  DecodeError,
  ModelUnavailableError,
  InferenceFailureError,
  EmptyResultError,
  CollectionUnavailableError,
  StoreOperationFailureError,
} from '@facevault/shared-types';
