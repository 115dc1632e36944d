import { z, ZodError } from 'zod';
import {
  ApiError,
  BusinessError,
  DatabaseError,
  ValidationError,
  kindForStatus,
  type ErrorDetails,
} from '../utils/errors.js';

export type ErrorKind = 'ValidationError' | 'BusinessError' | 'DatabaseError' | 'InternalError' | (string & {});

export interface ClassifiedError {
  kind: ErrorKind;
  statusCode: number;
  message: string;
  details: ErrorDetails | null;
}

export interface ErrorRecord {
  kind: ErrorKind;
  message: string;
  details: ErrorDetails | null;
  timestamp: Date;
  correlationId: string;
}

export const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred';
export const DATABASE_ERROR_MESSAGE = 'A database error occurred';

const CONNECTIVITY_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENOTFOUND',
  'EPIPE',
]);

const INTERNAL: ClassifiedError = {
  kind: 'InternalError',
  statusCode: 500,
  message: INTERNAL_ERROR_MESSAGE,
  details: null,
};

/**
 * Errors raised through the http-errors package (body-parser, express)
 */
interface HttpErrorLike extends Error {
  expose: boolean;
}

function ownFields(error: Error): Record<string, unknown> {
  return { ...error };
}

function httpStatusOf(error: Error): number | null {
  const fields = ownFields(error);
  const status = fields.status ?? fields.statusCode;
  return typeof status === 'number' && status >= 400 && status <= 599 ? status : null;
}

function isHttpErrorLike(error: unknown): error is HttpErrorLike {
  return (
    error instanceof Error &&
    httpStatusOf(error) !== null &&
    typeof ownFields(error).expose === 'boolean'
  );
}

// body-parser failure types caused by the request body itself
const BODY_INPUT_FAILURES: Record<string, string> = {
  'entity.parse.failed': 'Body is not valid JSON',
  'entity.verify.failed': 'Body failed verification',
};

function bodyInputIssue(error: unknown): string | null {
  if (!(error instanceof Error)) return null;
  const type = ownFields(error).type;
  return typeof type === 'string' ? (BODY_INPUT_FAILURES[type] ?? null) : null;
}

function isConnectivityError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code = ownFields(error).code;
  return typeof code === 'string' && CONNECTIVITY_CODES.has(code);
}

function zodDetails(error: ZodError): ErrorDetails {
  const violations = error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'body',
    issue: issue.message,
  }));
  const [first] = violations;
  const details: ErrorDetails = { field: first?.field ?? 'body', issue: first?.issue ?? 'Invalid input' };
  if (violations.length > 1) {
    details.violations = violations;
  }
  return details;
}

function classifyUnsafe(error: unknown): ClassifiedError {
  // 1. Validation
  if (error instanceof ValidationError) {
    return { kind: 'ValidationError', statusCode: 422, message: error.message, details: error.details };
  }
  if (error instanceof ZodError) {
    return {
      kind: 'ValidationError',
      statusCode: 422,
      message: 'Request validation failed',
      details: zodDetails(error),
    };
  }
  const bodyIssue = bodyInputIssue(error);
  if (bodyIssue !== null) {
    return {
      kind: 'ValidationError',
      statusCode: 422,
      message: 'Request validation failed',
      details: { field: 'body', issue: bodyIssue },
    };
  }

  // 2. Explicit status carried by the failure
  if (error instanceof ApiError) {
    return {
      kind: error.kind,
      statusCode: error.statusCode,
      message: error.message,
      details: error.details ?? null,
    };
  }
  if (isHttpErrorLike(error)) {
    const statusCode = httpStatusOf(error) ?? 500;
    return {
      kind: kindForStatus(statusCode),
      statusCode,
      message: error.expose ? error.message : INTERNAL_ERROR_MESSAGE,
      details: null,
    };
  }

  // 3. Business rules
  if (error instanceof BusinessError) {
    return {
      kind: 'BusinessError',
      statusCode: error.statusCode,
      message: error.message,
      details: error.details ?? null,
    };
  }

  // 4. Persistence and connectivity
  if (error instanceof DatabaseError || isConnectivityError(error)) {
    return { kind: 'DatabaseError', statusCode: 500, message: DATABASE_ERROR_MESSAGE, details: null };
  }

  // 5. Everything else
  return INTERNAL;
}

/**
 * Map any thrown value to a kind, status and caller-safe message.
 * Never throws.
 */
export function classifyError(error: unknown): ClassifiedError {
  try {
    return classifyUnsafe(error);
  } catch {
    return INTERNAL;
  }
}

export function createErrorRecord(
  classified: ClassifiedError,
  correlationId: string,
  timestamp = new Date()
): ErrorRecord {
  return {
    kind: classified.kind,
    message: classified.message,
    details: classified.details,
    timestamp,
    correlationId,
  };
}

const errorBodySchema = z.object({
  error: z.string().min(1),
  message: z.string(),
  details: z.record(z.unknown()).nullable(),
  timestamp: z.string().datetime(),
  request_id: z.string().min(1),
});

export type ErrorBody = z.infer<typeof errorBodySchema>;

export function toErrorBody(record: ErrorRecord): ErrorBody {
  return {
    error: record.kind,
    message: record.message,
    details: record.details,
    timestamp: record.timestamp.toISOString(),
    request_id: record.correlationId,
  };
}

export function encodeErrorRecord(record: ErrorRecord): string {
  return JSON.stringify(toErrorBody(record));
}

/**
 * Parse a wire error body. Throws ZodError when the shape does not match.
 */
export function decodeErrorRecord(input: unknown): ErrorRecord {
  const raw: unknown = typeof input === 'string' ? JSON.parse(input) : input;
  const body = errorBodySchema.parse(raw);
  return {
    kind: body.error,
    message: body.message,
    details: body.details,
    timestamp: new Date(body.timestamp),
    correlationId: body.request_id,
  };
}
