import { config } from './config/index.js';
import { createServer } from './api/server.js';
import { InMemoryUsersRepository } from './db/repositories/users.repository.js';
import { UsersHandler } from './handlers/users.handler.js';
import { createPipeline } from './pipeline/pipeline.js';
import { logger } from './utils/logger.js';

async function main() {
  logger.info(
    { service: config.serviceName, environment: config.nodeEnv, log_level: config.logLevel },
    'Starting request pipeline demo server...'
  );

  const pipeline = createPipeline({
    logger,
    credentialHeaderName: config.credentialHeaderName,
    credentialPrefix: config.credentialPrefix,
    credentialSkipPaths: config.credentialSkipPaths,
    correlationHeaderName: config.correlationHeaderName,
  });

  const usersHandler = new UsersHandler(new InMemoryUsersRepository());
  const app = createServer({ pipeline, usersHandler });

  const port = config.port;

  const server = app.listen(port, () => {
    logger.info(`Server running on port ${port}`);
    logger.info(`Health check: http://localhost:${port}/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);

    // Stop accepting new connections
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught Exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled Rejection');
  process.exit(1);
});

// Start the application
main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start application');
  process.exit(1);
});
