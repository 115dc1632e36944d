import type { RequestContext } from './context.js';

export type HeaderValue = string | string[] | undefined;

/**
 * Framework-neutral view of an inbound request
 */
export interface PipelineRequest {
  method: string;
  path: string;
  /** Header names in lower case */
  headers: Record<string, HeaderValue>;
  clientIp?: string;
  query?: Record<string, unknown>;
  body?: unknown;
  params?: Record<string, string>;
  /** Fires when the host gives up on the request (client disconnect) */
  signal?: AbortSignal;
}

export interface PipelineResponse {
  statusCode: number;
  headers?: Record<string, string>;
  body?: unknown;
  /** JSON text of body, filled in by the pipeline for handler responses */
  payload?: string;
}

/**
 * Downstream handler at the centre of the pipeline
 */
export type Handler = (
  request: PipelineRequest,
  context: RequestContext
) => PipelineResponse | Promise<PipelineResponse>;

export type Next = (request: PipelineRequest, context: RequestContext) => Promise<PipelineResponse>;

/**
 * One layer of the pipeline. Stages are composed outermost first.
 */
export interface Stage {
  readonly name: string;
  handle(request: PipelineRequest, context: RequestContext, next: Next): Promise<PipelineResponse>;
}

export function headerValue(request: PipelineRequest, name: string): string | undefined {
  const value = request.headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

export function json(body: unknown, statusCode = 200): PipelineResponse {
  return { statusCode, body };
}
