import type { ErrorRequestHandler } from 'express';
import type { Pipeline } from '../../pipeline/pipeline.js';
import { deliver, toPipelineRequest } from './pipeline.middleware.js';

/**
 * Generic Error Handling Middleware
 *
 * Errors raised before a pipeline route runs (body parsing, other Express
 * middleware) are replayed through the pipeline, so they get a correlation
 * id, a terminal log event and the standard error body like any other.
 */
export function errorMiddleware(pipeline: Pipeline): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    // Express closes the connection itself once streaming has begun
    if (res.headersSent) {
      next(error);
      return;
    }

    void pipeline
      .run(toPipelineRequest(req), () => {
        throw error;
      })
      .then((response) => deliver(res, response, pipeline.fallbackLogger));
  };
}
