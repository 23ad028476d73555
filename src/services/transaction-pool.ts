import type { Transaction } from '../ledger/transaction.js';

/**
 * Pending transactions waiting to be mined, in submission order
 */
export class TransactionPool {
  private pending: Transaction[] = [];

  constructor(private readonly maxSize = 5000) { }

  get size(): number {
    return this.pending.length;
  }

  /**
   * @returns false when the pool is full
   */
  add(transaction: Transaction): boolean {
    if (this.pending.length >= this.maxSize) {
      return false;
    }
    this.pending.push(transaction);
    return true;
  }

  /**
   * Remove and return up to max transactions, oldest first
   */
  take(max = this.pending.length): Transaction[] {
    return this.pending.splice(0, max);
  }

  /**
   * Put taken transactions back ahead of anything submitted since, in their
   * original order. Ignores the size cap: these were already admitted once.
   */
  restore(transactions: Transaction[]): void {
    this.pending.unshift(...transactions);
  }

  clear(): void {
    this.pending = [];
  }
}
