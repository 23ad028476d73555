import type { BaseLogger } from 'pino';
import type { Account, AccountId, ChainStatus, Hash, Target, Timestamp } from '../types/ledger.js';
import { logger as defaultLogger } from '../config/logger.config.js';
import { AccountLedger } from './account-ledger.js';
import type { LedgerSnapshot } from './account-ledger.js';
import { Block, currentTimestamp } from './block.js';
import { Chain } from './chain.js';
import { compactValue } from './digest.js';
import { EXPECTED_TIMESPAN_SECONDS, retarget } from './difficulty.js';
import type { RetargetResult } from './difficulty.js';
import { ChainError, ChainErrorCode, isChainError } from './errors.js';
import { formatTarget, MAX_TARGET } from './target.js';
import { executeTransaction } from './transaction.js';

export interface BlockchainOptions {
  initialTarget?: Target;
  maxTarget?: Target;
  expectedTimespan?: number;
  /** Seconds since the epoch; injectable so retargeting can be driven deterministically */
  clock?: () => Timestamp;
  logger?: BaseLogger;
}

export type AppendResult =
  | { success: true; blockHeight: number; hash: Hash; target: Target; difficulty: number }
  | { success: false; blockHeight: number; error: ChainError };

export type ChainValidationResult =
  | { isValid: true }
  | { isValid: false; blockHeight: number; error: ChainError };

/**
 * Chain + ledger + difficulty engine. Blocks are admitted only through
 * appendBlock, which either applies every transaction of a block or none.
 */
export class Blockchain {
  private readonly chain = new Chain<Block>();
  private readonly ledger = new AccountLedger();
  private readonly maxTarget: Target;
  private readonly expectedTimespan: number;
  private readonly clock: () => Timestamp;
  private readonly logger: BaseLogger;

  private currentTarget: Target;
  private currentDifficulty = 1;
  private firstBlockTimestamp?: Timestamp;
  private lastBlockTimestamp?: Timestamp;

  constructor(options: BlockchainOptions = {}) {
    this.maxTarget = options.maxTarget ?? MAX_TARGET;
    this.currentTarget = Math.min(options.initialTarget ?? this.maxTarget, this.maxTarget);
    this.expectedTimespan = options.expectedTimespan ?? EXPECTED_TIMESPAN_SECONDS;
    this.clock = options.clock ?? currentTimestamp;
    this.logger = options.logger ?? defaultLogger;
  }

  get height(): number {
    return this.chain.length;
  }

  get target(): Target {
    return this.currentTarget;
  }

  get difficulty(): number {
    return this.currentDifficulty;
  }

  blocks(): Iterable<Block> {
    return this.chain;
  }

  getAccount(id: AccountId): Readonly<Account> | undefined {
    return this.ledger.getAccount(id);
  }

  snapshotLedger(): LedgerSnapshot {
    return this.ledger.snapshot();
  }

  /**
   * Head block's recomputed hash, or undefined for an empty chain
   */
  getLastBlockHash(): Hash | undefined {
    return this.chain.head()?.computeHash();
  }

  /**
   * Target the next block will be gated against. Genesis is exempt from the
   * check, so an empty chain reports the current target.
   */
  nextTarget(): Target {
    return this.chain.length === 0 ? this.currentTarget : this.computeRetarget().target;
  }

  status(): ChainStatus {
    return {
      height: this.chain.length,
      lastBlockHash: this.getLastBlockHash() ?? null,
      target: formatTarget(this.currentTarget),
      difficulty: this.currentDifficulty
    };
  }

  /**
   * Validate, execute and commit a block. On any failure the ledger is restored
   * to its state before the call and nothing else changes.
   */
  appendBlock(block: Block): AppendResult {
    const blockHeight = this.chain.length + 1;

    if (!block.verify()) {
      return this.reject(new ChainError(ChainErrorCode.InvalidHash, 'Block has invalid hash', { blockHeight }));
    }
    if (block.transactions.length === 0) {
      return this.reject(new ChainError(ChainErrorCode.EmptyBlock, 'Block has 0 transactions.', { blockHeight }));
    }

    const isGenesis = this.chain.length === 0;
    const snapshot = this.ledger.snapshot();

    try {
      block.transactions.forEach((transaction, transactionIndex) => {
        try {
          executeTransaction(transaction, this.ledger, isGenesis);
        } catch (error) {
          throw isChainError(error) ? error.withDetails({ blockHeight, transactionIndex }) : error;
        }
      });

      let retargeted: RetargetResult = { target: this.currentTarget, difficulty: this.currentDifficulty };
      if (!isGenesis) {
        retargeted = this.computeRetarget();
        if (!block.meetsTarget(retargeted.target)) {
          throw new ChainError(
            ChainErrorCode.HashAboveTarget,
            `Block hash value ${formatTarget(compactValue(block.hash))} is not below target ${formatTarget(retargeted.target)}`,
            { blockHeight }
          );
        }
      }

      const now = this.clock();
      if (isGenesis) {
        this.firstBlockTimestamp = now;
      }
      this.lastBlockTimestamp = now;
      this.currentTarget = retargeted.target;
      this.currentDifficulty = retargeted.difficulty;
      block.seal();
      this.chain.append(block);
    } catch (error) {
      this.ledger.restore(snapshot);
      if (isChainError(error)) {
        return this.reject(error);
      }
      throw error;
    }

    this.logger.debug({
      blockHeight,
      hash: block.hash,
      transactionCount: block.transactions.length,
      target: formatTarget(this.currentTarget),
      difficulty: this.currentDifficulty
    }, 'Block appended');

    return {
      success: true,
      blockHeight,
      hash: block.hash,
      target: this.currentTarget,
      difficulty: this.currentDifficulty
    };
  }

  /**
   * Structural audit of the whole chain, oldest block first
   * @returns the first violation found, with the offending block's height
   */
  validate(): ChainValidationResult {
    let previous: Block | undefined;
    let blockHeight = 0;

    for (const block of this.chain) {
      blockHeight++;
      const isGenesis = blockHeight === 1;

      if (!block.verify()) {
        return this.invalid(ChainErrorCode.InvalidHash, `Block ${blockHeight} has invalid hash`, blockHeight);
      }
      if (isGenesis && block.prevHash !== undefined) {
        return this.invalid(ChainErrorCode.HashMismatch, "Genesis block shouldn't have prev_hash", blockHeight);
      }
      if (!isGenesis && block.prevHash === undefined) {
        return this.invalid(ChainErrorCode.MissingPrevHash, `Block ${blockHeight} doesn't have prev_hash`, blockHeight);
      }
      if (previous && block.prevHash !== previous.hash) {
        return this.invalid(
          ChainErrorCode.HashMismatch,
          `Block ${blockHeight} prev_hash doesn't match Block ${blockHeight - 1} hash`,
          blockHeight
        );
      }

      previous = block;
    }

    return { isValid: true };
  }

  private computeRetarget(): RetargetResult {
    const elapsed = (this.lastBlockTimestamp ?? 0) - (this.firstBlockTimestamp ?? 0);
    return retarget(this.currentTarget, elapsed, {
      expectedTimespan: this.expectedTimespan,
      maxTarget: this.maxTarget
    });
  }

  private reject(error: ChainError): AppendResult {
    const blockHeight = error.blockHeight ?? this.chain.length + 1;
    this.logger.debug({ blockHeight, code: error.code }, error.message);
    return { success: false, blockHeight, error };
  }

  private invalid(code: ChainErrorCode, message: string, blockHeight: number): ChainValidationResult {
    return { isValid: false, blockHeight, error: new ChainError(code, message, { blockHeight }) };
  }
}
