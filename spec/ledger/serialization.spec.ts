import { describe, it, expect } from 'vitest';
import { bytesToHex } from '../../src/ledger/digest.js';
import { ChainError, ChainErrorCode } from '../../src/ledger/errors.js';
import {
  accountToView,
  blockFromJSON,
  blockToJSON,
  transactionFromJSON,
  transactionToJSON,
  WireFormatError
} from '../../src/ledger/serialization.js';
import { Transaction } from '../../src/ledger/transaction.js';
import { AccountKind } from '../../src/types/ledger.js';
import type { BlockJSON } from '../../src/types/ledger.js';
import { keyPair, minedBlock, signedTransfer } from '../support/fixtures.js';

describe('Serialization', () => {
  const alice = keyPair(1);

  describe('transactions', () => {
    it('should encode amounts and keys as strings and omit absent fields', () => {
      expect(transactionToJSON(Transaction.createAccount('alice', alice.publicKey))).toEqual({
        nonce: '0',
        timestamp: 0,
        payload: { type: 'CreateAccount', accountId: 'alice', publicKey: bytesToHex(alice.publicKey) }
      });
    });

    it('should carry sender and signature for transfers', () => {
      const transfer = signedTransfer('alice', 'bob', 12345678901234567890n, alice);
      const json = transactionToJSON(transfer);

      expect(json.senderId).toBe('alice');
      expect(json.payload).toEqual({ type: 'Transfer', to: 'bob', amount: '12345678901234567890' });
      expect(json.signature).toHaveLength(128);

      const decoded = transactionFromJSON(json);
      expect(decoded.hash()).toBe(transfer.hash());
      expect(decoded.verifySignature(alice.publicKey)).toBe(true);
    });

    it('should reject malformed amounts', () => {
      expect(() => transactionFromJSON({ payload: { type: 'Transfer', to: 'bob', amount: '-5' } }))
        .toThrow(WireFormatError);
      expect(() => transactionFromJSON({ payload: { type: 'Transfer', to: 'bob', amount: '1.5' } }))
        .toThrow('Invalid amount: must be a non-negative integer string');
    });

    it('should reject amounts beyond 128 bits', () => {
      const amount = (1n << 128n).toString();
      expect(() => transactionFromJSON({ payload: { type: 'MintInitialSupply', to: 'bob', amount } }))
        .toThrow(WireFormatError);
    });

    it('should reject public keys of the wrong size and bad hex', () => {
      expect(() => transactionFromJSON({ payload: { type: 'CreateAccount', accountId: 'a', publicKey: 'ab'.repeat(31) } }))
        .toThrow('Public key must be 32 bytes, got 31');
      expect(() => transactionFromJSON({ payload: { type: 'CreateAccount', accountId: 'a', publicKey: 'xyz' } }))
        .toThrow('Invalid publicKey: must be an even-length hex string');
    });

    it('should reject a malformed signature', () => {
      const json = transactionToJSON(Transaction.transfer('alice', 'bob', 1n));
      expect(() => transactionFromJSON({ ...json, signature: 'abc' })).toThrow(WireFormatError);
    });
  });

  describe('blocks', () => {
    it('should rebuild a block with the same hash', () => {
      const block = minedBlock('aa', [
        Transaction.createAccount('alice', alice.publicKey),
        signedTransfer('alice', 'bob', 5n, alice)
      ]);

      const json = blockToJSON(block);
      const decoded = blockFromJSON(json);

      expect(json.prevHash).toBe('aa');
      expect(json.powNonce).toBe(block.nonce.toString());
      expect(decoded.hash).toBe(block.hash);
      expect(decoded.nonce).toBe(block.nonce);
      expect(decoded.timestamp).toBe(block.timestamp);
      expect(decoded.transactions).toHaveLength(2);
    });

    it('should omit the previous hash of a genesis block', () => {
      const json = blockToJSON(minedBlock(undefined, [Transaction.createAccount('alice', alice.publicKey)]));
      expect('prevHash' in json).toBe(false);
    });

    it('should reject a block whose claimed hash does not match its contents', () => {
      const json: BlockJSON = {
        ...blockToJSON(minedBlock(undefined, [Transaction.createAccount('alice', alice.publicKey)])),
        hash: '0'.repeat(64)
      };

      let caught: unknown;
      try {
        blockFromJSON(json);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ChainError);
      if (caught instanceof ChainError) {
        expect(caught.code).toBe(ChainErrorCode.InvalidHash);
      }
    });
  });

  it('should render account balances and keys as strings', () => {
    expect(accountToView('alice', { kind: AccountKind.User, balance: 10n, publicKey: alice.publicKey })).toEqual({
      id: 'alice',
      kind: 'User',
      balance: '10',
      publicKey: bytesToHex(alice.publicKey)
    });
  });
});
