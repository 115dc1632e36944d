export type ErrorDetails = Record<string, unknown>;

const STATUS_KINDS: Record<number, string> = {
  400: 'BadRequestError',
  401: 'UnauthorizedError',
  403: 'ForbiddenError',
  404: 'NotFoundError',
  405: 'MethodNotAllowedError',
  409: 'ConflictError',
  413: 'PayloadTooLargeError',
  415: 'UnsupportedMediaTypeError',
  429: 'TooManyRequestsError',
};

export function kindForStatus(statusCode: number): string {
  return STATUS_KINDS[statusCode] ?? 'HttpError';
}

/**
 * REST API Error Class
 * Raised by application code that knows which status the caller should see
 */
export class ApiError extends Error {
  public readonly kind: string;
  public readonly details?: ErrorDetails;

  constructor(
    public readonly statusCode: number,
    message: string,
    options: { kind?: string; details?: ErrorDetails } = {}
  ) {
    super(message);
    this.name = 'ApiError';
    this.kind = options.kind ?? kindForStatus(statusCode);
    this.details = options.details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid input. Surfaces as 422 with the offending field.
 */
export class ValidationError extends Error {
  public readonly details: ErrorDetails;

  constructor(
    public readonly field: string,
    public readonly issue: string,
    message = 'Request validation failed'
  ) {
    super(message);
    this.name = 'ValidationError';
    this.details = { field, issue };
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Domain rule violation. 400 unless the raiser declares another code.
 */
export class BusinessError extends Error {
  constructor(
    message: string,
    public readonly details?: ErrorDetails,
    public readonly statusCode = 400
  ) {
    super(message);
    this.name = 'BusinessError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Persistence or connectivity fault. Never exposes its message or cause.
 */
export class DatabaseError extends Error {
  constructor(message = 'Database operation failed', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatabaseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Response body JSON cannot represent (BigInt, cycles, a throwing toJSON)
 */
export class SerializationError extends Error {
  constructor(message = 'Response body could not be serialized', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SerializationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export const Errors = {
  // 400 Bad Request
  badRequest: (message: string, details?: ErrorDetails) => new ApiError(400, message, { details }),

  // 401 Unauthorized
  unauthorized: (message = 'Authentication required') => new ApiError(401, message),

  // 403 Forbidden
  forbidden: (message: string) => new ApiError(403, message),

  // 404 Not Found
  notFound: (resource: string) => new ApiError(404, `${resource} not found`),

  // 409 Conflict
  conflict: (message: string) => new ApiError(409, message),

  // 422 Unprocessable Entity
  validation: (field: string, issue: string) => new ValidationError(field, issue),

  // Domain rule
  business: (message: string, details?: ErrorDetails, statusCode?: number) =>
    new BusinessError(message, details, statusCode),
};
