import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { errorResponseSchema, miningResultSchema } from '../config/route-schemas.js';
import { statusForResult } from './responses.js';

interface MineRequest {
  Body: {
    maxTransactions?: number;
  } | undefined;
}

export async function miningRoutes(fastify: FastifyInstance) {
  const transactionPool = fastify.transactionPool;
  const miner = fastify.miner;

  // POST /mine - Mine pending transactions into a block and submit it
  fastify.post<MineRequest>('/mine', {
    schema: {
      tags: ['Mining'],
      summary: 'Mine a block',
      description: 'Take pending transactions from the pool, mine a block on the current head and submit it',
      body: {
        type: 'object',
        nullable: true,
        properties: {
          maxTransactions: { type: 'integer', minimum: 1 }
        }
      },
      response: {
        200: miningResultSchema,
        400: miningResultSchema,
        409: miningResultSchema,
        503: miningResultSchema,
        500: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<MineRequest>, reply: FastifyReply) => {
    if (miner.isMining) {
      return reply.status(409).send({
        success: false,
        blockHeight: fastify.blockchain.height + 1,
        transactionCount: 0,
        error: 'Mining already in progress',
        code: 'MiningInProgress'
      });
    }
    if (transactionPool.size === 0) {
      return reply.status(400).send({
        success: false,
        blockHeight: fastify.blockchain.height + 1,
        transactionCount: 0,
        error: 'No pending transactions to mine'
      });
    }

    const transactions = transactionPool.take(request.body?.maxTransactions);

    try {
      const result = await miner.mineAndSubmit(transactions);

      // An aborted job never reached the ledger; its transactions go back to the pool
      if (result.code === 'MiningAborted') {
        transactionPool.restore(transactions);
      }

      return reply.status(statusForResult(result)).send(result);
    } catch (error) {
      transactionPool.restore(transactions);

      const structuredError = fastify.services.errorHandler.createStructuredError(
        error instanceof Error ? error : new Error(String(error)),
        {
          operation: 'mining_route_handler',
          blockHeight: fastify.blockchain.height + 1,
          additionalData: { transactionCount: transactions.length, endpoint: 'POST /mine' }
        }
      );

      fastify.log.error({ structuredError }, 'Unexpected error while mining');

      return reply.status(500).send({
        success: false,
        error: 'Internal server error while mining'
      });
    }
  });

  // DELETE /mine - Abort the mining job in flight
  fastify.delete('/mine', {
    schema: {
      tags: ['Mining'],
      summary: 'Stop mining',
      description: 'Abort the current mining job, if any',
      response: {
        200: {
          type: 'object',
          properties: {
            stopped: { type: 'boolean' }
          }
        }
      }
    }
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ stopped: miner.stop() });
  });
}
