import type { Request, RequestHandler, Response } from 'express';
import type { Pipeline } from '../../pipeline/pipeline.js';
import { CORRELATION_RESPONSE_HEADER } from '../../pipeline/stages/errorTranslator.stage.js';
import type { Handler, HeaderValue, PipelineRequest, PipelineResponse } from '../../pipeline/types.js';
import type { Logger } from '../../utils/logger.js';

/**
 * Aborts when the client goes away before the response is finished
 */
function abortSignalFor(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

function firstHeader(value: HeaderValue): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Client address as seen by the first proxy: the first X-Forwarded-For hop,
 * then X-Real-IP, then the socket peer.
 */
export function resolveClientIp(req: Request): string | undefined {
  const forwarded = firstHeader(req.headers['x-forwarded-for']);
  if (forwarded) {
    const [firstHop] = forwarded.split(',');
    const address = firstHop.trim();
    if (address) {
      return address;
    }
  }
  return firstHeader(req.headers['x-real-ip']) ?? req.socket.remoteAddress;
}

export function toPipelineRequest(req: Request, signal?: AbortSignal): PipelineRequest {
  return {
    method: req.method,
    // req.path is relative to the router mount point
    path: req.originalUrl.split('?')[0],
    headers: req.headers,
    clientIp: resolveClientIp(req),
    query: req.query,
    body: req.body,
    params: req.params,
    signal,
  };
}

export function sendResponse(res: Response, response: PipelineResponse): void {
  if (res.headersSent) {
    return;
  }
  res.status(response.statusCode);
  if (response.headers) {
    res.set(response.headers);
  }
  if (response.payload !== undefined) {
    res.type('application/json').send(response.payload);
  } else if (response.body === undefined) {
    res.end();
  } else {
    res.json(response.body);
  }
}

/**
 * Send a pipeline response. The request already has its terminal event, so a
 * failure here is reported to the fallback logger and never replayed.
 */
export function deliver(res: Response, response: PipelineResponse, fallback: Logger): void {
  try {
    sendResponse(res, response);
  } catch (error) {
    fallback.error(
      { err: error, request_id: response.headers?.[CORRELATION_RESPONSE_HEADER] ?? null },
      'Failed to send response'
    );
    if (!res.headersSent) {
      res.removeHeader('Content-Type');
      res.status(500).end();
    }
  }
}

/**
 * Mount a pipeline handler as an Express route
 */
export function pipelineRoute(pipeline: Pipeline, handler: Handler): RequestHandler {
  const run = pipeline.wrap(handler);

  return (req, res) => {
    void run(toPipelineRequest(req, abortSignalFor(res))).then((response) =>
      deliver(res, response, pipeline.fallbackLogger)
    );
  };
}
