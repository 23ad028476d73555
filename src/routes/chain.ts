import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { chainStatusSchema } from '../config/route-schemas.js';

export async function chainRoutes(fastify: FastifyInstance) {
  const blockchain = fastify.blockchain;
  const blockProcessor = fastify.blockProcessor;

  // GET /chain - Height, head and difficulty state
  fastify.get('/chain', {
    schema: {
      tags: ['Chain'],
      summary: 'Chain status',
      description: 'Height, head hash, current target and last difficulty adjustment',
      response: {
        200: chainStatusSchema
      }
    }
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send(blockchain.status());
  });

  // GET /chain/validate - Structural audit of the whole chain
  fastify.get('/chain/validate', {
    schema: {
      tags: ['Chain'],
      summary: 'Validate chain',
      description: 'Re-verify every block hash and the prev_hash linkage, oldest block first',
      response: {
        200: {
          type: 'object',
          properties: {
            isValid: { type: 'boolean' },
            blockHeight: { type: 'number' },
            error: { type: 'string' },
            code: { type: 'string' }
          }
        }
      }
    }
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    const result = blockProcessor.validateChain();
    if (result.isValid) {
      return reply.status(200).send({ isValid: true });
    }
    return reply.status(200).send({
      isValid: false,
      blockHeight: result.blockHeight,
      error: result.error.message,
      code: result.error.code
    });
  });
}
