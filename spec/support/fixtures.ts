import nacl from 'tweetnacl';
import { Block } from '../../src/ledger/block.js';
import { ChainError } from '../../src/ledger/errors.js';
import { MAX_TARGET } from '../../src/ledger/target.js';
import { Transaction } from '../../src/ledger/transaction.js';
import type { Target } from '../../src/types/ledger.js';

export interface TestKeyPair {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

/**
 * Deterministic key pair, so failures reproduce
 */
export function keyPair(seed: number): TestKeyPair {
  return nacl.sign.keyPair.fromSeed(new Uint8Array(32).fill(seed));
}

export function sign(transaction: Transaction, keys: TestKeyPair): Transaction {
  transaction.attachSignature(nacl.sign.detached(transaction.signingMessage(), keys.secretKey));
  return transaction;
}

export function signedTransfer(from: string, to: string, amount: bigint, keys: TestKeyPair): Transaction {
  return sign(Transaction.transfer(from, to, amount), keys);
}

export function buildBlock(prevHash: string | undefined, transactions: Transaction[]): Block {
  const block = new Block(prevHash, 1_700_000_000);
  for (const transaction of transactions) {
    block.addTransaction(transaction);
  }
  return block;
}

export function minedBlock(prevHash: string | undefined, transactions: Transaction[], target: Target = MAX_TARGET): Block {
  const block = buildBlock(prevHash, transactions);
  block.mine(target);
  return block;
}

/**
 * Clock that moves one full expected timespan per reading. With it every
 * block after the second keeps the target the second block was gated on.
 */
export function steppingClock(step: number, start = 1_700_000_000): () => number {
  let now = start - step;
  return () => {
    now += step;
    return now;
  };
}

export function captureChainError(action: () => void): ChainError {
  try {
    action();
  } catch (error) {
    if (error instanceof ChainError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ChainError');
}
