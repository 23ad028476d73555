import { MAX_BALANCE } from '../types/ledger.js';
import type { Account, AccountId, AccountKind } from '../types/ledger.js';
import { ChainError, ChainErrorCode } from './errors.js';

export type LedgerSnapshot = ReadonlyMap<AccountId, Readonly<Account>>;

/**
 * Overflow-checked u128 addition
 * @returns the sum, or null when it would not fit in 128 bits
 */
export function checkedAdd(a: bigint, b: bigint): bigint | null {
  const sum = a + b;
  return sum > MAX_BALANCE ? null : sum;
}

/**
 * Underflow-checked u128 subtraction
 * @returns the difference, or null when it would go negative
 */
export function checkedSub(a: bigint, b: bigint): bigint | null {
  const difference = a - b;
  return difference < 0n ? null : difference;
}

/**
 * In-memory account state. Every id maps to at most one account and no
 * account is ever removed.
 */
export class AccountLedger {
  private accounts = new Map<AccountId, Account>();

  get size(): number {
    return this.accounts.size;
  }

  createAccount(id: AccountId, kind: AccountKind, publicKey: Uint8Array): void {
    if (this.accounts.has(id)) {
      throw new ChainError(ChainErrorCode.AccountExists, `AccountId already exists: ${id}`);
    }
    this.accounts.set(id, { kind, balance: 0n, publicKey });
  }

  getAccount(id: AccountId): Readonly<Account> | undefined {
    return this.accounts.get(id);
  }

  getAccountMut(id: AccountId): Account | undefined {
    return this.accounts.get(id);
  }

  credit(id: AccountId, amount: bigint): void {
    const account = this.requireAccount(id);
    const balance = checkedAdd(account.balance, amount);
    if (balance === null) {
      throw new ChainError(ChainErrorCode.AmountOverflow, `Crediting ${amount} to ${id} overflows its balance`);
    }
    account.balance = balance;
  }

  debit(id: AccountId, amount: bigint): void {
    const account = this.requireAccount(id);
    const balance = checkedSub(account.balance, amount);
    if (balance === null) {
      throw new ChainError(ChainErrorCode.InsufficientFunds, `Account ${id} doesn't have enough currency`);
    }
    account.balance = balance;
  }

  /**
   * Copy every account record. Cost grows with the ledger, which is fine at the
   * scale one block of transactions implies.
   */
  snapshot(): LedgerSnapshot {
    const copy = new Map<AccountId, Account>();
    for (const [id, account] of this.accounts) {
      copy.set(id, { ...account });
    }
    return copy;
  }

  restore(snapshot: LedgerSnapshot): void {
    const accounts = new Map<AccountId, Account>();
    for (const [id, account] of snapshot) {
      accounts.set(id, { ...account });
    }
    this.accounts = accounts;
  }

  private requireAccount(id: AccountId): Account {
    const account = this.accounts.get(id);
    if (!account) {
      throw new ChainError(ChainErrorCode.UnknownAccount, `Invalid account: ${id}`);
    }
    return account;
  }
}
