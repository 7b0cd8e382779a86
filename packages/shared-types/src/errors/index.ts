// =============================================================================
// Base Application Error
// =============================================================================

export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
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
// Invalid Argument Error (400)
// =============================================================================

export class InvalidArgumentError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, 400, details);
    this.name = 'InvalidArgumentError';
  }
}

// =============================================================================
// Not Found Error (404)
// =============================================================================

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      `${resource.toUpperCase()}_NOT_FOUND`,
      id ? `${resource} with id ${id} not found` : `${resource} not found`,
      404
    );
    this.name = 'NotFoundError';
  }
}

// =============================================================================
// Schema Mismatch Error (500)
// =============================================================================

/**
 * Embedding dimensionality or field shape disagrees with the store's schema
 */
export class SchemaMismatchError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SCHEMA_MISMATCH', message, 500, details);
    this.name = 'SchemaMismatchError';
  }
}

// =============================================================================
// Embedding Failure Error (502)
// =============================================================================

export class EmbeddingFailureError extends AppError {
  constructor(model: string, message: string) {
    super('EMBEDDING_FAILURE', `${model}: ${message}`, 502, { model });
    this.name = 'EmbeddingFailureError';
  }
}

// =============================================================================
// Provider Failure Error (502)
// =============================================================================

export class ProviderFailureError extends AppError {
  constructor(provider: string, message: string, details?: Record<string, unknown>) {
    super('PROVIDER_FAILURE', `${provider}: ${message}`, 502, { provider, ...details });
    this.name = 'ProviderFailureError';
  }
}

// =============================================================================
// Store Unavailable Error (503)
// =============================================================================

export class StoreUnavailableError extends AppError {
  constructor(operation: string, message: string) {
    super('STORE_UNAVAILABLE', `${operation}: ${message}`, 503, { operation });
    this.name = 'StoreUnavailableError';
  }
}

// =============================================================================
// Timeout Error (504)
// =============================================================================

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, 504, {
      operation,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}
