import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { BlockJSON } from '../types/ledger.js';
import { blockSchema, errorResponseSchema, processingResultSchema } from '../config/route-schemas.js';
import type { Block } from '../ledger/block.js';
import { isChainError } from '../ledger/errors.js';
import { blockFromJSON, blockToJSON, WireFormatError } from '../ledger/serialization.js';
import { statusForResult } from './responses.js';

// Request body schema for POST /blocks
interface BlockRequest {
  Body: BlockJSON;
}

interface BlockByHeightRequest {
  Params: {
    height: number;
  };
}

export async function blockRoutes(fastify: FastifyInstance) {
  // Get services from fastify instance (injected during bootstrap)
  const blockchain = fastify.blockchain;
  const blockProcessor = fastify.blockProcessor;

  // POST /blocks - Submit a mined block
  fastify.post<BlockRequest>('/blocks', {
    schema: {
      tags: ['Blocks'],
      summary: 'Submit a block',
      description: 'Submit a mined block for validation, execution and admission to the chain',
      body: blockSchema,
      response: {
        200: processingResultSchema,
        400: processingResultSchema,
        409: processingResultSchema,
        500: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<BlockRequest>, reply: FastifyReply) => {
    const blockHeight = blockchain.height + 1;

    let block: Block;
    try {
      block = blockFromJSON(request.body);
    } catch (error) {
      if (error instanceof WireFormatError) {
        return reply.status(400).send({ success: false, blockHeight, error: error.message });
      }
      if (isChainError(error)) {
        return reply.status(400).send({ success: false, blockHeight, error: error.message, code: error.code });
      }
      throw error;
    }

    try {
      const result = await blockProcessor.processBlock(block);
      return reply.status(statusForResult(result)).send(result);
    } catch (error) {
      const structuredError = fastify.services.errorHandler.createStructuredError(
        error instanceof Error ? error : new Error(String(error)),
        {
          operation: 'block_route_handler',
          blockHeight,
          additionalData: { blockHash: block.hash, endpoint: 'POST /blocks' }
        }
      );

      fastify.log.error({ structuredError }, 'Unexpected error processing block');

      return reply.status(500).send({
        success: false,
        error: 'Internal server error while processing block'
      });
    }
  });

  // GET /blocks/:height - Fetch an accepted block
  fastify.get<BlockByHeightRequest>('/blocks/:height', {
    schema: {
      tags: ['Blocks'],
      summary: 'Get block by height',
      description: 'Return an accepted block by its 1-based height',
      params: {
        type: 'object',
        required: ['height'],
        properties: {
          height: { type: 'integer', minimum: 1 }
        }
      },
      response: {
        200: blockSchema,
        404: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<BlockByHeightRequest>, reply: FastifyReply) => {
    const { height } = request.params;

    let current = 0;
    for (const block of blockchain.blocks()) {
      current++;
      if (current === height) {
        return reply.status(200).send(blockToJSON(block));
      }
    }

    return reply.status(404).send({ error: `Block ${height} not found` });
  });
}
