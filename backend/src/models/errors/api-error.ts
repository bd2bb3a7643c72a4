/**
 * Error Hierarchy
 *
 * Typed error classes for the HTTP surface and for the trip execution
 * pipeline. All errors extend ApiError with a statusCode and code so that
 * any of them can be rendered by the global error handler.
 */

export class ApiError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, statusCode: number, code?: string, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code ?? this.name;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad local input. Raised before any remote call is made.
 */
export class ValidationError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 409, 'CONFLICT', details);
  }
}

export class DatabaseError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'DATABASE_ERROR', details);
  }
}

// ============================================================================
// Remote inventory API errors
// ============================================================================

/**
 * Credentials or session rejected by the inventory API. Aborts a whole trip.
 */
export class AuthError extends ApiError {
  constructor(message = 'Authentication with inventory API failed', details?: unknown) {
    super(message, 502, 'REMOTE_AUTH_ERROR', details);
  }
}

/**
 * Network failure, timeout or upstream 5xx. Eligible for retry.
 */
export class TransientRemoteError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 503, 'REMOTE_TRANSIENT_ERROR', details);
  }
}

/**
 * The inventory API explicitly rejected the request (success=0).
 * The remote error text is the message; the remote code is kept as-is.
 */
export class SemanticRemoteError extends ApiError {
  public readonly remoteCode: string;

  constructor(message: string, remoteCode: string, details?: unknown) {
    super(message, 502, 'REMOTE_REJECTED', details);
    this.remoteCode = remoteCode;
  }
}

/**
 * The inventory API answered with a body we do not understand.
 */
export class ProtocolError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 502, 'REMOTE_PROTOCOL_ERROR', details);
  }
}
