/**
 * Application error hierarchy.
 * Each error carries a stable code and the HTTP status a serving layer should map it to.
 */

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 404, details);
  }
}

/** A dependency the operation needs (glossary index, feature provider) is not ready. */
export class ServiceUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SERVICE_UNAVAILABLE', 503, details);
  }
}

/** An external service answered with an error or an unusable payload. */
export class UpstreamError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'UPSTREAM_ERROR', 502, details);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
  }
}

/** Internal data structures disagree with each other. Never caught and ignored. */
export class InvariantError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATION', 500, details);
  }
}
