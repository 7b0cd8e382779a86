// =============================================================================
// Domain Errors - Re-export from shared-types
// =============================================================================

export {
  AppError,
  InvalidArgumentError,
  NotFoundError,
  SchemaMismatchError,
  EmbeddingFailureError,
  ProviderFailureError,
  StoreUnavailableError,
  TimeoutError,
} from '@chat-recall/shared-types';
