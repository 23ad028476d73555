import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { loadConfig } from './config/app.config.js';
import { logger } from './config/logger.config.js';
import { formatTarget } from './ledger/target.js';

// Setup graceful shutdown
function setupGracefulShutdown(fastify: FastifyInstance) {
  const gracefulShutdown = async (signal: string) => {
    fastify.log.info(`Received ${signal}, starting graceful shutdown...`);

    try {
      // Abort mining and stop accepting new requests
      await fastify.close();
      fastify.log.info('Fastify server closed');

      // Clear any pending operations
      fastify.services.concurrencyManager.clearQueue();
      fastify.log.info('Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      fastify.log.error({ err: error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  // Register signal handlers
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  // Handle uncaught exceptions and unhandled rejections
  process.on('uncaughtException', (error) => {
    fastify.log.fatal({ err: error }, 'Uncaught Exception');
    void gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    fastify.log.fatal({ reason }, 'Unhandled Rejection');
    void gracefulShutdown('unhandledRejection');
  });
}

// Setup health monitoring
function setupHealthMonitoring(fastify: FastifyInstance, environment: string) {
  const { errorHandler, concurrencyManager } = fastify.services;

  // Periodic error log cleanup
  const cleanup = setInterval(() => {
    errorHandler.clearOldErrors();
  }, 60 * 60 * 1000); // Clean up every hour
  cleanup.unref();

  // Log system status periodically in development
  if (environment === 'development') {
    const status = setInterval(() => {
      const errorStats = errorHandler.getErrorStatistics();

      fastify.log.info({
        chain: fastify.blockchain.status(),
        concurrency: concurrencyManager.getStatus(),
        pendingTransactions: fastify.transactionPool.size,
        errors: {
          total: errorStats.totalErrors,
          recent: errorStats.recentErrors,
          lastError: errorStats.lastError?.message
        }
      }, 'System status');
    }, 5 * 60 * 1000); // Log every 5 minutes
    status.unref();
  }
}

async function bootstrap(): Promise<void> {
  const config = loadConfig();

  const fastify = await buildApp(config, { docs: true });
  fastify.log.info({
    environment: config.environment,
    initialTarget: formatTarget(config.chain.initialTarget),
    maxTarget: formatTarget(config.chain.maxTarget),
    expectedTimespan: config.chain.expectedTimespan
  }, 'Ledger configured');

  setupGracefulShutdown(fastify);
  setupHealthMonitoring(fastify, config.environment);

  await fastify.listen({
    port: config.port,
    host: config.host
  });

  fastify.log.info(`API documentation available at: http://${config.host}:${config.port}/docs`);
}

// Start the application
bootstrap().catch((error) => {
  logger.fatal({ err: error }, 'Fatal error during bootstrap');
  process.exit(1);
});
