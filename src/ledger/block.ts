import type { Hash, Target, Timestamp } from '../types/ledger.js';
import { hashParts, meetsTarget } from './digest.js';
import { parseTarget } from './target.js';
import { Transaction } from './transaction.js';

export function currentTimestamp(): Timestamp {
  return Math.floor(Date.now() / 1000);
}

/**
 * An ordered batch of transactions plus a proof-of-work nonce.
 * The stored hash is recomputed after every mutation and cannot be set from outside.
 * Once sealed by the chain it accepts no further mutation.
 */
export class Block {
  readonly prevHash?: Hash;
  readonly timestamp: Timestamp;
  private powNonce = 0n;
  private readonly txs: Transaction[] = [];
  private selfHash: Hash;
  private sealed = false;

  constructor(prevHash?: Hash, timestamp: Timestamp = currentTimestamp()) {
    this.prevHash = prevHash;
    this.timestamp = timestamp;
    this.selfHash = this.computeHash();
  }

  get hash(): Hash {
    return this.selfHash;
  }

  get nonce(): bigint {
    return this.powNonce;
  }

  get transactions(): readonly Transaction[] {
    return this.txs;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Freeze nonce and transaction list. Called when the block is committed.
   */
  seal(): void {
    this.sealed = true;
  }

  setNonce(nonce: bigint): void {
    this.assertMutable();
    this.powNonce = nonce;
    this.updateHash();
  }

  addTransaction(transaction: Transaction): void {
    this.assertMutable();
    this.txs.push(transaction);
    this.updateHash();
  }

  computeHash(): Hash {
    const header = JSON.stringify([this.prevHash ?? null, this.powNonce.toString()]);
    return hashParts(header, ...this.txs.map(tx => tx.hash()));
  }

  /**
   * Recompute from current contents and compare with the stored hash
   * @returns false when anything changed behind the block's back
   */
  verify(): boolean {
    return this.selfHash === this.computeHash();
  }

  meetsTarget(target: Target): boolean {
    return meetsTarget(this.selfHash, target);
  }

  /**
   * Mine until the hash meets the target. Unbounded; pass a signal to be able
   * to stop it. Throws the signal's reason once aborted.
   * @param target compact bits, or the same as a hex string such as "207fffff"
   * @returns the winning nonce
   */
  mine(target: Target | string, signal?: AbortSignal): bigint {
    const bits = typeof target === 'string' ? parseTarget(target) : target;
    this.tryMine(bits, Number.POSITIVE_INFINITY, signal);
    return this.powNonce;
  }

  /**
   * Run at most maxIterations nonce increments
   * @returns true once the hash meets the target
   */
  tryMine(target: Target, maxIterations: number, signal?: AbortSignal): boolean {
    for (let i = 0; i < maxIterations; i++) {
      if (this.meetsTarget(target)) {
        return true;
      }
      signal?.throwIfAborted();
      this.setNonce(this.powNonce + 1n);
    }
    return this.meetsTarget(target);
  }

  private assertMutable(): void {
    if (this.sealed) {
      throw new Error('Block is sealed: a committed block cannot be modified');
    }
  }

  private updateHash(): void {
    this.selfHash = this.computeHash();
  }
}
