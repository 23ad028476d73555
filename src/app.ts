import Fastify, { type FastifyInstance } from 'fastify';
import type { AppConfig } from './config/app.config.js';
import { createLoggerOptions } from './config/logger.config.js';
import { Blockchain } from './ledger/blockchain.js';
import { swaggerOptions, swaggerUiOptions } from './config/swagger.config.js';
import { registerRoutes } from './routes/index.js';
import { BlockProcessor } from './services/block-processor.js';
import { ConcurrencyManager, concurrencyManager as sharedConcurrencyManager } from './services/concurrency-manager.js';
import { ErrorHandler, errorHandler as sharedErrorHandler } from './services/error-handler.js';
import { Miner } from './services/miner.js';
import { TransactionPool } from './services/transaction-pool.js';

export interface AppDependencies {
  blockchain?: Blockchain;
  concurrencyManager?: ConcurrencyManager;
  errorHandler?: ErrorHandler;
  transactionPool?: TransactionPool;
  /** Serve the OpenAPI document and UI under /docs */
  docs?: boolean;
}

/**
 * Wire the ledger and its services into a Fastify instance with every route
 * registered. Does not listen; callers either listen or use inject().
 */
export async function buildApp(config: AppConfig, dependencies: AppDependencies = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: createLoggerOptions(config.logLevel, config.environment)
  });

  const blockchain = dependencies.blockchain ?? new Blockchain({
    initialTarget: config.chain.initialTarget,
    maxTarget: config.chain.maxTarget,
    expectedTimespan: config.chain.expectedTimespan,
    logger: fastify.log
  });
  const concurrencyManager = dependencies.concurrencyManager ?? sharedConcurrencyManager;
  const errorHandler = dependencies.errorHandler ?? sharedErrorHandler;

  const blockProcessor = new BlockProcessor(blockchain, {
    concurrencyManager,
    errorHandler,
    logger: fastify.log
  });
  const miner = new Miner(blockchain, blockProcessor, {
    batchSize: config.mining.batchSize,
    timeoutMs: config.mining.timeoutMs,
    errorHandler,
    logger: fastify.log
  });

  fastify.decorate('blockchain', blockchain);
  fastify.decorate('blockProcessor', blockProcessor);
  fastify.decorate('transactionPool', dependencies.transactionPool ?? new TransactionPool());
  fastify.decorate('miner', miner);
  fastify.decorate('services', { concurrencyManager, errorHandler });

  fastify.addHook('onClose', async () => {
    miner.stop();
  });

  // Swagger has to see the routes as they are added
  if (dependencies.docs) {
    await fastify.register(import('@fastify/swagger'), swaggerOptions);
    await fastify.register(import('@fastify/swagger-ui'), swaggerUiOptions);
  }

  await registerRoutes(fastify);

  return fastify;
}
