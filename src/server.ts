import { Server } from 'http';
import app from './app';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { testConnection, closePool } from '@/config/database';

/**
 * Server Entry Point
 * Starts the Express server and handles graceful shutdown
 */

let server: Server | undefined;

async function startServer(): Promise<void> {
  if (env.STORAGE_DRIVER === 'postgres') {
    logger.info('Testing database connection...');
    const dbConnected = await testConnection();

    if (!dbConnected) {
      logger.error('Failed to connect to database. Exiting...');
      process.exit(1);
    }
  } else {
    logger.info('Using in-memory storage; portfolios are lost on restart');
  }

  server = app.listen(env.PORT, () => {
    logger.info(
      { port: env.PORT, env: env.NODE_ENV, storage: env.STORAGE_DRIVER },
      `Server running on http://localhost:${env.PORT}`
    );
    logger.info(`API docs: http://localhost:${env.PORT}/api-docs`);
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.error(`Port ${env.PORT} is already in use`);
    } else {
      logger.error({ error }, 'Server error');
    }
    process.exit(1);
  });
}

async function releaseResources(): Promise<void> {
  await metrics.flush();
  await closePool();
}

function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  if (!server) {
    process.exit(0);
  }

  server.close(() => {
    logger.info('HTTP server closed');

    releaseResources()
      .then(() => {
        logger.info('Graceful shutdown complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ error }, 'Error releasing resources during shutdown');
        process.exit(1);
      });
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught Exception');
  process.exit(1);
});

startServer().catch((error: unknown) => {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
});
