import { SerializationError } from '../utils/errors.js';
import { fallbackLogger as defaultFallbackLogger, withContext, type Logger } from '../utils/logger.js';
import { advance, createRequestContext, type RequestContext } from './context.js';
import { RequestEventLog } from './logEvent.js';
import { CredentialParserStage } from './stages/credentialParser.stage.js';
import { ErrorTranslatorStage } from './stages/errorTranslator.stage.js';
import { RequestLoggerStage } from './stages/requestLogger.stage.js';
import {
  headerValue,
  type Handler,
  type Next,
  type PipelineRequest,
  type PipelineResponse,
  type Stage,
} from './types.js';

export interface PipelineOptions {
  logger: Logger;
  /** Receives sink faults; stderr by default */
  fallbackLogger?: Logger;
  credentialHeaderName?: string;
  credentialPrefix?: string;
  credentialSkipPaths?: readonly string[];
  correlationHeaderName?: string;
  /** Clock for the token expiry check, epoch milliseconds */
  now?: () => number;
}

export type PipelineHandler = (request: PipelineRequest) => Promise<PipelineResponse>;

/**
 * Serialize the body here, so a body the host could not send fails the
 * handler instead of the host.
 */
function serialize(response: PipelineResponse): PipelineResponse {
  if (response.body === undefined) {
    return response;
  }
  try {
    return { ...response, payload: JSON.stringify(response.body) };
  } catch (error) {
    throw new SerializationError(undefined, { cause: error });
  }
}

/**
 * Runs the downstream handler at the centre and records the handler part of
 * the lifecycle.
 */
function centre(handler: Handler): Next {
  return async (request: PipelineRequest, context: RequestContext) => {
    advance(context, 'HANDLER_RUNNING');
    try {
      const response = serialize(await handler(request, context));
      advance(context, 'COMPLETED');
      return response;
    } catch (error) {
      advance(context, 'FAILED');
      throw error;
    }
  };
}

/**
 * Composes error translation, request logging and credential parsing around
 * a handler, in that order from the outside in.
 */
export class Pipeline {
  readonly stages: readonly Stage[];
  /** Receives faults the pipeline cannot report through its own events */
  readonly fallbackLogger: Logger;
  private readonly correlationHeaderName: string;

  constructor(options: PipelineOptions) {
    this.fallbackLogger = options.fallbackLogger ?? defaultFallbackLogger;
    const events = new RequestEventLog(options.logger, this.fallbackLogger);
    this.correlationHeaderName = options.correlationHeaderName ?? 'x-request-id';

    this.stages = [
      new ErrorTranslatorStage(events),
      new RequestLoggerStage(events),
      new CredentialParserStage({
        events,
        headerName: options.credentialHeaderName ?? 'authorization',
        prefix: options.credentialPrefix ?? 'Bearer ',
        skipPaths: options.credentialSkipPaths ?? [],
        now: options.now,
      }),
    ];
  }

  /**
   * Compose the stages around handler. Done once per route, at startup.
   * The returned function never rejects.
   */
  wrap(handler: Handler): PipelineHandler {
    const chain = this.stages.reduceRight<Next>(
      (next, stage) => (request, context) => stage.handle(request, context, next),
      centre(handler)
    );

    return (request: PipelineRequest) => {
      const context = createRequestContext(headerValue(request, this.correlationHeaderName));
      return withContext({ request_id: context.correlationId }, () => chain(request, context));
    };
  }

  run(request: PipelineRequest, handler: Handler): Promise<PipelineResponse> {
    return this.wrap(handler)(request);
  }
}

export function createPipeline(options: PipelineOptions): Pipeline {
  return new Pipeline(options);
}
