import { performance } from 'perf_hooks';
import { advance, canAdvance, onState, type RequestContext } from '../context.js';
import { classifyError } from '../errorRecord.js';
import type { RequestEventLog } from '../logEvent.js';
import type { Next, PipelineRequest, PipelineResponse, Stage } from '../types.js';

/**
 * Middle stage. Times the request end to end and writes its terminal event.
 * Failures are logged with their classified kind and re-thrown unchanged.
 */
export class RequestLoggerStage implements Stage {
  readonly name = 'request-logger';

  constructor(private readonly events: RequestEventLog) {}

  async handle(request: PipelineRequest, context: RequestContext, next: Next): Promise<PipelineResponse> {
    context.startedAt = performance.now();

    // The start event waits for the identity so it can name the caller
    onState(context, 'IDENTITY_RESOLVED', () => {
      this.events.event('DEBUG', context, `Request started: ${request.method} ${request.path}`, {
        method: request.method,
        path: request.path,
        query: request.query && Object.keys(request.query).length > 0 ? request.query : null,
        client_ip: request.clientIp ?? null,
        user_id: context.identity.subject,
      });
      advance(context, 'LOGGED_START');
    });

    const onAbort = () => {
      context.aborted = true;
      this.events.terminal(request, context, { type: 'aborted' });
    };
    const { signal } = request;
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await next(request, context);
      this.events.terminal(request, context, { type: 'completed', statusCode: response.statusCode });
      advance(context, 'LOGGED_END');
      return response;
    } catch (error) {
      if (canAdvance(context, 'FAILED')) {
        advance(context, 'FAILED');
      }
      this.events.terminal(request, context, {
        type: 'failed',
        error: classifyError(error),
        cause: error,
      });
      if (canAdvance(context, 'LOGGED_END')) {
        advance(context, 'LOGGED_END');
      }
      throw error;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
