import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { TransactionJSON } from '../types/ledger.js';
import { errorResponseSchema, transactionSchema } from '../config/route-schemas.js';
import { transactionFromJSON, WireFormatError } from '../ledger/serialization.js';

interface TransactionRequest {
  Body: TransactionJSON;
}

export async function transactionRoutes(fastify: FastifyInstance) {
  const transactionPool = fastify.transactionPool;

  // POST /transactions - Queue a transaction for the next mined block
  fastify.post<TransactionRequest>('/transactions', {
    schema: {
      tags: ['Transactions'],
      summary: 'Submit a transaction',
      description: 'Add a transaction to the pending pool. It is executed only when a block containing it is appended.',
      body: transactionSchema,
      response: {
        202: {
          type: 'object',
          properties: {
            accepted: { type: 'boolean' },
            hash: { type: 'string' },
            poolSize: { type: 'number' }
          }
        },
        400: errorResponseSchema,
        503: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<TransactionRequest>, reply: FastifyReply) => {
    try {
      const transaction = transactionFromJSON(request.body);

      if (!transactionPool.add(transaction)) {
        return reply.status(503).send({ success: false, error: 'Transaction pool is full' });
      }

      return reply.status(202).send({
        accepted: true,
        hash: transaction.hash(),
        poolSize: transactionPool.size
      });
    } catch (error) {
      if (error instanceof WireFormatError) {
        return reply.status(400).send({ success: false, error: error.message });
      }
      throw error;
    }
  });
}
