import { setImmediate as yieldToEventLoop } from 'timers/promises';
import type { BaseLogger } from 'pino';
import type { MiningResult, Target } from '../types/ledger.js';
import { logger as defaultLogger } from '../config/logger.config.js';
import { Block } from '../ledger/block.js';
import type { Blockchain } from '../ledger/blockchain.js';
import { formatTarget } from '../ledger/target.js';
import type { Transaction } from '../ledger/transaction.js';
import type { BlockProcessor } from './block-processor.js';
import { ErrorHandler, errorHandler as defaultErrorHandler } from './error-handler.js';

export interface MinerOptions {
  /** Nonces tried before yielding back to the event loop */
  batchSize: number;
  /** Abort a job that runs longer than this */
  timeoutMs?: number;
  errorHandler?: ErrorHandler;
  logger?: BaseLogger;
}

/**
 * Out-of-band proof-of-work. Mining runs in slices between event loop turns so
 * queries and block submissions stay responsive, and every job can be aborted.
 */
export class Miner {
  private readonly blockchain: Blockchain;
  private readonly blockProcessor: BlockProcessor;
  private readonly batchSize: number;
  private readonly timeoutMs?: number;
  private readonly errorHandler: ErrorHandler;
  private readonly logger: BaseLogger;
  private controller?: AbortController;

  constructor(blockchain: Blockchain, blockProcessor: BlockProcessor, options: MinerOptions) {
    this.blockchain = blockchain;
    this.blockProcessor = blockProcessor;
    this.batchSize = options.batchSize;
    this.timeoutMs = options.timeoutMs;
    this.errorHandler = options.errorHandler ?? defaultErrorHandler;
    this.logger = options.logger ?? defaultLogger;
  }

  get isMining(): boolean {
    return this.controller !== undefined;
  }

  /**
   * Mine a block against a target, yielding between batches
   * @returns the winning nonce; rejects with the signal's reason once aborted
   */
  async mine(block: Block, target: Target, signal?: AbortSignal): Promise<bigint> {
    const startedAt = Date.now();

    while (!block.tryMine(target, this.batchSize, signal)) {
      await yieldToEventLoop();
    }

    this.logger.debug({
      nonce: block.nonce.toString(),
      hash: block.hash,
      target: formatTarget(target),
      elapsedMs: Date.now() - startedAt
    }, 'Block mined');

    return block.nonce;
  }

  /**
   * Build a block on the current head from the given transactions, mine it
   * against the next target and submit it. One job at a time.
   */
  async mineAndSubmit(transactions: Transaction[], signal?: AbortSignal): Promise<MiningResult> {
    const blockHeight = this.blockchain.height + 1;

    if (this.controller) {
      return {
        success: false,
        blockHeight,
        transactionCount: transactions.length,
        error: 'Mining already in progress',
        code: 'MiningInProgress'
      };
    }

    const controller = new AbortController();
    this.controller = controller;
    const signals = [controller.signal];
    if (this.timeoutMs !== undefined) {
      signals.push(AbortSignal.timeout(this.timeoutMs));
    }
    if (signal) {
      signals.push(signal);
    }
    const jobSignal = AbortSignal.any(signals);

    const block = new Block(this.blockchain.getLastBlockHash());
    for (const transaction of transactions) {
      block.addTransaction(transaction);
    }

    try {
      await this.mine(block, this.blockchain.nextTarget(), jobSignal);
    } catch (error) {
      if (!jobSignal.aborted) {
        throw error;
      }
      this.errorHandler.createStructuredError(
        error instanceof Error ? error : new Error(String(error)),
        { operation: 'mining', blockHeight, additionalData: { nonce: block.nonce.toString() } }
      );
      return {
        success: false,
        blockHeight,
        transactionCount: transactions.length,
        error: 'Mining aborted before a valid nonce was found',
        code: 'MiningAborted'
      };
    } finally {
      this.controller = undefined;
    }

    const result = await this.blockProcessor.processBlock(block);
    return {
      ...result,
      hash: block.hash,
      nonce: block.nonce.toString(),
      transactionCount: transactions.length
    };
  }

  /**
   * Abort the job in flight
   * @returns false when nothing was being mined
   */
  stop(): boolean {
    if (!this.controller) {
      return false;
    }
    this.controller.abort();
    return true;
  }
}
