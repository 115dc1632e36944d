import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { config } from '../config/index.js';
import type { UsersHandler } from '../handlers/users.handler.js';
import type { Pipeline } from '../pipeline/pipeline.js';
import { CORRELATION_RESPONSE_HEADER } from '../pipeline/stages/errorTranslator.stage.js';
import { json } from '../pipeline/types.js';
import { Errors } from '../utils/errors.js';
import { createUsersRoutes } from './routes/users.routes.js';
import { errorMiddleware } from './middleware/error.middleware.js';
import { pipelineRoute } from './middleware/pipeline.middleware.js';

export interface ServerDependencies {
  pipeline: Pipeline;
  usersHandler: UsersHandler;
}

export function createServer(dependencies: ServerDependencies): Express {
  const { pipeline, usersHandler } = dependencies;
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS configuration
  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', CORRELATION_RESPONSE_HEADER],
      exposedHeaders: [CORRELATION_RESPONSE_HEADER],
    })
  );

  // Compression middleware
  app.use(compression());

  // Body parsing middleware; parse failures reach errorMiddleware
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get(
    '/health',
    pipelineRoute(pipeline, () =>
      json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        environment: config.nodeEnv,
      })
    )
  );

  // Identity resolved from the bearer credential, if any
  app.get('/api/me', pipelineRoute(pipeline, usersHandler.getMe.bind(usersHandler)));

  app.use('/api/users', createUsersRoutes(pipeline, usersHandler));

  // 404 handler
  app.use(
    pipelineRoute(pipeline, (request) => {
      throw Errors.notFound(`Route ${request.method} ${request.path}`);
    })
  );

  // Error handling middleware (must be last)
  app.use(errorMiddleware(pipeline));

  return app;
}
