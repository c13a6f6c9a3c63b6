import { ErrorCode, type ApiError, type ResolutionCandidate } from '@pathimpact/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toApiError(requestId: string): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        requestId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

// A query matched several canonical parents; the caller must pick one
export class AmbiguousCompoundError extends AppError {
  constructor(
    query: string,
    public readonly candidates: ResolutionCandidate[]
  ) {
    super(
      ErrorCode.AMBIGUOUS_COMPOUND,
      `Compound query is ambiguous: ${query}. Select one of ${candidates.length} candidates.`,
      409,
      { query, candidates }
    );
    this.name = 'AmbiguousCompoundError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${resource} not found: ${id}`, 404);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(ErrorCode.CONFLICT, message, 409);
    this.name = 'ConflictError';
  }
}

export class UpstreamUnavailableError extends AppError {
  constructor(
    public readonly source: string,
    message: string,
    public readonly retryable: boolean = true
  ) {
    super(ErrorCode.UPSTREAM_UNAVAILABLE, `${source} unavailable: ${message}`, 503, { source });
    this.name = 'UpstreamUnavailableError';
  }
}

// A single bad entity (zero-sized pathway, cyclic relation); skipped, never fatal
export class DataIntegrityError extends AppError {
  constructor(
    public readonly entity: string,
    public readonly entityId: string,
    reason: string
  ) {
    super(ErrorCode.DATA_INTEGRITY, `${entity} ${entityId}: ${reason}`, 422, {
      entity,
      entityId,
    });
    this.name = 'DataIntegrityError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIGURATION_ERROR, message, 400, details);
    this.name = 'ConfigurationError';
  }
}

export class InvalidStateTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(
      ErrorCode.INVALID_STATE_TRANSITION,
      `Invalid state transition from ${from} to ${to}`,
      400
    );
    this.name = 'InvalidStateTransitionError';
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof UpstreamUnavailableError && error.retryable;
}
