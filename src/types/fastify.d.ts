import type { Blockchain } from '../ledger/blockchain.js';
import type { BlockProcessor } from '../services/block-processor.js';
import type { ConcurrencyManager } from '../services/concurrency-manager.js';
import type { ErrorHandler } from '../services/error-handler.js';
import type { Miner } from '../services/miner.js';
import type { TransactionPool } from '../services/transaction-pool.js';

declare module 'fastify' {
  interface FastifyInstance {
    blockchain: Blockchain;
    blockProcessor: BlockProcessor;
    transactionPool: TransactionPool;
    miner: Miner;
    services: {
      concurrencyManager: ConcurrencyManager;
      errorHandler: ErrorHandler;
    };
  }
}
