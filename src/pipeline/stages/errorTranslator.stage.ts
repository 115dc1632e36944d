import { advance, canAdvance, markResponded, type RequestContext } from '../context.js';
import {
  INTERNAL_ERROR_MESSAGE,
  classifyError,
  createErrorRecord,
  toErrorBody,
} from '../errorRecord.js';
import type { RequestEventLog } from '../logEvent.js';
import type { Next, PipelineRequest, PipelineResponse, Stage } from '../types.js';

export const CORRELATION_RESPONSE_HEADER = 'X-Request-ID';

function withCorrelationHeader(response: PipelineResponse, context: RequestContext): PipelineResponse {
  return {
    ...response,
    headers: { ...response.headers, [CORRELATION_RESPONSE_HEADER]: context.correlationId },
  };
}

/**
 * Outermost stage. Whatever the inner stages return or throw, the host gets
 * a response; failures become a structured error body.
 */
export class ErrorTranslatorStage implements Stage {
  readonly name = 'error-translator';

  constructor(private readonly events: RequestEventLog) {}

  async handle(request: PipelineRequest, context: RequestContext, next: Next): Promise<PipelineResponse> {
    try {
      const response = await next(request, context);
      markResponded(context);
      return withCorrelationHeader(response, context);
    } catch (error) {
      return this.translate(request, context, error);
    }
  }

  private translate(request: PipelineRequest, context: RequestContext, error: unknown): PipelineResponse {
    try {
      const classified = classifyError(error);

      // Failures raised outside the logger stage still need their terminal event
      if (!context.terminalLogged) {
        if (canAdvance(context, 'FAILED')) {
          advance(context, 'FAILED');
        }
        this.events.terminal(request, context, { type: 'failed', error: classified, cause: error });
        if (canAdvance(context, 'LOGGED_END')) {
          advance(context, 'LOGGED_END');
        }
      }

      const record = createErrorRecord(classified, context.correlationId);
      markResponded(context);
      return withCorrelationHeader(
        { statusCode: classified.statusCode, body: toErrorBody(record) },
        context
      );
    } catch {
      markResponded(context);
      return withCorrelationHeader(
        {
          statusCode: 500,
          body: {
            error: 'InternalError',
            message: INTERNAL_ERROR_MESSAGE,
            details: null,
            timestamp: new Date().toISOString(),
            request_id: context.correlationId,
          },
        },
        context
      );
    }
  }
}
