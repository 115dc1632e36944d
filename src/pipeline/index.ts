export { Pipeline, createPipeline, type PipelineOptions, type PipelineHandler } from './pipeline.js';
export {
  addLogContext,
  createRequestContext,
  LifecycleError,
  type RequestContext,
  type RequestState,
} from './context.js';
export {
  emptyIdentity,
  hasAllRoles,
  hasAnyRole,
  hasPermission,
  hasRole,
  isAuthenticated,
  requireAuthentication,
  requirePermission,
  requireRole,
  type CallerIdentity,
} from './identity.js';
export { decodeBearer, type DecodeFailureReason, type DecodeResult } from './credentials.js';
export {
  classifyError,
  createErrorRecord,
  decodeErrorRecord,
  encodeErrorRecord,
  toErrorBody,
  type ClassifiedError,
  type ErrorBody,
  type ErrorKind,
  type ErrorRecord,
} from './errorRecord.js';
export type { LogEvent } from './logEvent.js';
export { CORRELATION_RESPONSE_HEADER } from './stages/errorTranslator.stage.js';
export { json, type Handler, type PipelineRequest, type PipelineResponse, type Stage } from './types.js';
export { deliver, pipelineRoute, resolveClientIp, sendResponse, toPipelineRequest } from '../api/middleware/pipeline.middleware.js';
export { errorMiddleware } from '../api/middleware/error.middleware.js';
export { ApiError, BusinessError, DatabaseError, Errors, SerializationError, ValidationError } from '../utils/errors.js';
export { createLogger, withContext, type Logger } from '../utils/logger.js';
