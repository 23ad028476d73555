import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app.js';
import type { AppDependencies } from '../../src/app.js';
import { getTestConfig } from '../../src/config/app.config.js';
import { Blockchain } from '../../src/ledger/blockchain.js';
import { bytesToHex } from '../../src/ledger/digest.js';
import { blockToJSON, transactionToJSON } from '../../src/ledger/serialization.js';
import { Transaction } from '../../src/ledger/transaction.js';
import { ConcurrencyManager } from '../../src/services/concurrency-manager.js';
import { ErrorHandler } from '../../src/services/error-handler.js';
import { buildBlock, keyPair, minedBlock } from '../support/fixtures.js';

describe('API Routes', () => {
  const satoshi = keyPair(1);
  let app: FastifyInstance;

  async function createApp(dependencies: AppDependencies = {}): Promise<FastifyInstance> {
    return buildApp(getTestConfig(), {
      concurrencyManager: new ConcurrencyManager(),
      errorHandler: new ErrorHandler(),
      ...dependencies
    });
  }

  const genesis = () => minedBlock(undefined, [
    Transaction.createAccount('satoshi', satoshi.publicKey),
    Transaction.mintInitialSupply('satoshi', 100000000n)
  ]);

  beforeEach(async () => {
    app = await createApp();
  });

  afterEach(async () => {
    await app.close();
  });

  describe('Status Endpoints', () => {
    it('should return basic service status', async () => {
      const response = await app.inject({ method: 'GET', url: '/' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('ok');
      expect(body.service).toBe('pow-ledger');
      expect(body.height).toBe(0);
      expect(body.timestamp).toBeDefined();
    });

    it('should return detailed health information', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.status).toBe('healthy');
      expect(body.uptime).toBeTypeOf('number');
      expect(body.chain).toEqual({ height: 0, lastBlockHash: null, target: '207fffff', difficulty: 1, isValid: true });
      expect(body.concurrency).toEqual({ queueLength: 0, isProcessingBlocks: false });
      expect(body.mining).toEqual({ isMining: false, pendingTransactions: 0 });
      expect(body.errors.totalErrors).toBe(0);
      expect(body.errors.lastError).toBeNull();
    });
  });

  describe('POST /blocks', () => {
    it('should append a mined genesis block', async () => {
      const response = await app.inject({ method: 'POST', url: '/blocks', payload: blockToJSON(genesis()) });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        success: true,
        blockHeight: 1,
        message: 'Block 1 processed successfully'
      });
    });

    it('should reject a block whose claimed hash is wrong', async () => {
      const payload = { ...blockToJSON(genesis()), hash: 'f'.repeat(64) };

      const response = await app.inject({ method: 'POST', url: '/blocks', payload });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body)).toEqual({
        success: false,
        blockHeight: 1,
        error: 'Block has invalid hash',
        code: 'InvalidHash'
      });
    });

    it('should reject a body that fails schema validation', async () => {
      const payload = blockToJSON(genesis());
      const response = await app.inject({
        method: 'POST',
        url: '/blocks',
        payload: { ...payload, powNonce: 'not-a-number' }
      });

      expect(response.statusCode).toBe(400);
    });

    it('should reject a transaction that fails on the ledger with 400', async () => {
      await app.inject({ method: 'POST', url: '/blocks', payload: blockToJSON(genesis()) });

      const block = minedBlock(
        app.blockchain.getLastBlockHash(),
        [Transaction.mintInitialSupply('satoshi', 1n)],
        app.blockchain.nextTarget()
      );
      const response = await app.inject({ method: 'POST', url: '/blocks', payload: blockToJSON(block) });

      expect(response.statusCode).toBe(400);
      const body = JSON.parse(response.body);
      expect(body.code).toBe('NotGenesisMint');
      expect(body.blockHeight).toBe(2);
    });

    it('should answer 409 for a block above the target', async () => {
      await app.close();
      app = await createApp({ blockchain: new Blockchain({ initialTarget: 0x01000001 }) });

      const first = buildBlock(undefined, [Transaction.createAccount('satoshi', satoshi.publicKey)]);
      await app.inject({ method: 'POST', url: '/blocks', payload: blockToJSON(first) });

      const second = buildBlock(first.hash, [Transaction.createAccount('alice', keyPair(2).publicKey)]);
      const response = await app.inject({ method: 'POST', url: '/blocks', payload: blockToJSON(second) });

      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body).code).toBe('HashAboveTarget');
    });
  });

  describe('Queries', () => {
    beforeEach(async () => {
      await app.inject({ method: 'POST', url: '/blocks', payload: blockToJSON(genesis()) });
    });

    it('should return an accepted block by height', async () => {
      const response = await app.inject({ method: 'GET', url: '/blocks/1' });

      expect(response.statusCode).toBe(200);
      const [block] = [...app.blockchain.blocks()];
      expect(JSON.parse(response.body)).toEqual(blockToJSON(block));
    });

    it('should return 404 for a height beyond the head', async () => {
      const response = await app.inject({ method: 'GET', url: '/blocks/2' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error).toBe('Block 2 not found');
    });

    it('should return an account with its balance as a string', async () => {
      const response = await app.inject({ method: 'GET', url: '/accounts/satoshi' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        id: 'satoshi',
        kind: 'User',
        balance: '100000000',
        publicKey: bytesToHex(satoshi.publicKey)
      });
    });

    it('should return 404 for an unknown account', async () => {
      const response = await app.inject({ method: 'GET', url: '/accounts/nobody' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error).toBe('Account not found: nobody');
    });

    it('should report chain status and validity', async () => {
      const status = await app.inject({ method: 'GET', url: '/chain' });
      expect(JSON.parse(status.body)).toEqual({
        height: 1,
        lastBlockHash: app.blockchain.getLastBlockHash(),
        target: '207fffff',
        difficulty: 1
      });

      const validation = await app.inject({ method: 'GET', url: '/chain/validate' });
      expect(JSON.parse(validation.body)).toEqual({ isValid: true });
    });

    it('should report the first invalid block', async () => {
      const [block] = [...app.blockchain.blocks()];
      Object.assign(block.transactions[1].payload, { amount: 1n });

      const response = await app.inject({ method: 'GET', url: '/chain/validate' });

      expect(JSON.parse(response.body)).toEqual({
        isValid: false,
        blockHeight: 1,
        error: 'Block 1 has invalid hash',
        code: 'InvalidHash'
      });
    });
  });

  describe('Transactions and Mining', () => {
    it('should queue transactions and mine them into a block', async () => {
      const create = Transaction.createAccount('satoshi', satoshi.publicKey);
      const queued = await app.inject({ method: 'POST', url: '/transactions', payload: transactionToJSON(create) });

      expect(queued.statusCode).toBe(202);
      expect(JSON.parse(queued.body)).toEqual({ accepted: true, hash: create.hash(), poolSize: 1 });

      await app.inject({
        method: 'POST',
        url: '/transactions',
        payload: transactionToJSON(Transaction.mintInitialSupply('satoshi', 500n))
      });

      const mined = await app.inject({ method: 'POST', url: '/mine', payload: {} });

      expect(mined.statusCode).toBe(200);
      const body = JSON.parse(mined.body);
      expect(body.success).toBe(true);
      expect(body.blockHeight).toBe(1);
      expect(body.transactionCount).toBe(2);
      expect(body.hash).toBe(app.blockchain.getLastBlockHash());
      expect(app.transactionPool.size).toBe(0);

      const account = await app.inject({ method: 'GET', url: '/accounts/satoshi' });
      expect(JSON.parse(account.body).balance).toBe('500');
    });

    it('should reject a transaction that cannot be decoded', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/transactions',
        payload: { payload: { type: 'Transfer', to: 'bob', amount: (1n << 128n).toString() }, senderId: 'alice' }
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).success).toBe(false);
      expect(app.transactionPool.size).toBe(0);
    });

    it('should refuse to mine an empty pool', async () => {
      const response = await app.inject({ method: 'POST', url: '/mine', payload: {} });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error).toBe('No pending transactions to mine');
    });

    it('should put an aborted job back in front of newer transactions', async () => {
      await app.close();
      app = await createApp({ blockchain: new Blockchain({ initialTarget: 0x01000001 }) });

      const first = Transaction.createAccount('satoshi', satoshi.publicKey);
      const later = Transaction.mintInitialSupply('satoshi', 500n);
      await app.inject({ method: 'POST', url: '/transactions', payload: transactionToJSON(first) });

      const mining = app.inject({ method: 'POST', url: '/mine', payload: {} });
      await vi.waitFor(() => expect(app.miner.isMining).toBe(true));

      await app.inject({ method: 'POST', url: '/transactions', payload: transactionToJSON(later) });
      const stopped = await app.inject({ method: 'DELETE', url: '/mine' });
      expect(JSON.parse(stopped.body)).toEqual({ stopped: true });

      const mined = await mining;
      expect(mined.statusCode).toBe(503);
      expect(JSON.parse(mined.body).code).toBe('MiningAborted');
      expect(app.blockchain.height).toBe(0);
      expect(app.transactionPool.take().map(transaction => transaction.hash())).toEqual([first.hash(), later.hash()]);
    });

    it('should return the pool batch when mining fails unexpectedly', async () => {
      const create = Transaction.createAccount('satoshi', satoshi.publicKey);
      await app.inject({ method: 'POST', url: '/transactions', payload: transactionToJSON(create) });
      vi.spyOn(app.miner, 'mineAndSubmit').mockRejectedValueOnce(new Error('mining backend failed'));

      const response = await app.inject({ method: 'POST', url: '/mine', payload: {} });

      expect(response.statusCode).toBe(500);
      expect(JSON.parse(response.body)).toEqual({ success: false, error: 'Internal server error while mining' });
      expect(app.transactionPool.take().map(transaction => transaction.hash())).toEqual([create.hash()]);
    });

    it('should report that nothing was stopped when idle', async () => {
      const response = await app.inject({ method: 'DELETE', url: '/mine' });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({ stopped: false });
    });
  });
});
