import type { BaseLogger } from 'pino';
import type { ProcessingResult } from '../types/ledger.js';
import { logger as defaultLogger } from '../config/logger.config.js';
import type { Block } from '../ledger/block.js';
import type { Blockchain, ChainValidationResult } from '../ledger/blockchain.js';
import { ChainError, ChainErrorCode } from '../ledger/errors.js';
import { ConcurrencyManager, concurrencyManager as defaultConcurrencyManager } from './concurrency-manager.js';
import { ErrorHandler, errorHandler as defaultErrorHandler } from './error-handler.js';

export interface BlockProcessorDependencies {
  concurrencyManager?: ConcurrencyManager;
  errorHandler?: ErrorHandler;
  logger?: BaseLogger;
}

export class BlockProcessor {
  private readonly blockchain: Blockchain;
  private readonly concurrencyManager: ConcurrencyManager;
  private readonly errorHandler: ErrorHandler;
  private readonly logger: BaseLogger;

  constructor(blockchain: Blockchain, dependencies: BlockProcessorDependencies = {}) {
    this.blockchain = blockchain;
    this.concurrencyManager = dependencies.concurrencyManager ?? defaultConcurrencyManager;
    this.errorHandler = dependencies.errorHandler ?? defaultErrorHandler;
    this.logger = dependencies.logger ?? defaultLogger;
  }

  /**
   * Submit a block for admission
   * Uses concurrency manager to ensure sequential processing
   * @param block The block to process
   * @returns ProcessingResult indicating success or failure
   */
  async processBlock(block: Block): Promise<ProcessingResult> {
    return this.concurrencyManager.queueBlockOperation(() => this.processBlockInternal(block));
  }

  /**
   * Run the structural audit and record any violation
   */
  validateChain(): ChainValidationResult {
    const result = this.blockchain.validate();
    if (!result.isValid) {
      this.errorHandler.createStructuredError(result.error, {
        operation: 'validate_chain',
        blockHeight: result.blockHeight
      });
    }
    return result;
  }

  /**
   * Internal block processing logic (called by concurrency manager)
   */
  private processBlockInternal(block: Block): ProcessingResult {
    // Only blocks that extend the current head are admitted through the node
    const head = this.blockchain.getLastBlockHash();
    const blockHeight = this.blockchain.height + 1;
    if (head !== undefined && block.prevHash === undefined) {
      return this.failure(block, new ChainError(
        ChainErrorCode.MissingPrevHash,
        `Block ${blockHeight} doesn't have prev_hash`,
        { blockHeight }
      ));
    }
    if (block.prevHash !== head) {
      return this.failure(block, new ChainError(
        ChainErrorCode.HashMismatch,
        head === undefined
          ? "Genesis block shouldn't have prev_hash"
          : `Block ${blockHeight} prev_hash doesn't match head ${head}`,
        { blockHeight }
      ));
    }

    const result = this.blockchain.appendBlock(block);
    if (!result.success) {
      return this.failure(block, result.error);
    }

    this.logger.info({
      blockHeight: result.blockHeight,
      hash: result.hash,
      transactionCount: block.transactions.length
    }, 'Block appended to chain');

    return {
      success: true,
      blockHeight: result.blockHeight,
      message: `Block ${result.blockHeight} processed successfully`
    };
  }

  private failure(block: Block, error: ChainError): ProcessingResult {
    const blockHeight = error.blockHeight ?? this.blockchain.height + 1;

    this.errorHandler.createStructuredError(error, {
      operation: 'block_processing',
      blockHeight,
      transactionIndex: error.transactionIndex,
      additionalData: { blockHash: block.hash, transactionCount: block.transactions.length }
    });

    return {
      success: false,
      blockHeight,
      error: error.message,
      code: error.code
    };
  }
}
