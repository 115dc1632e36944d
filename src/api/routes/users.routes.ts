import { Router } from 'express';
import { UsersHandler } from '../../handlers/users.handler.js';
import type { Pipeline } from '../../pipeline/pipeline.js';
import { pipelineRoute } from '../middleware/pipeline.middleware.js';

export function createUsersRoutes(pipeline: Pipeline, handler: UsersHandler): Router {
  const router = Router();

  router.get('/:id', pipelineRoute(pipeline, handler.getUser.bind(handler)));
  router.post('/', pipelineRoute(pipeline, handler.createUser.bind(handler)));

  // Requires the admin role in the bearer claims
  router.delete('/:id', pipelineRoute(pipeline, handler.deleteUser.bind(handler)));

  return router;
}
