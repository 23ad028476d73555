import type { FastifyInstance } from 'fastify';
import { accountRoutes } from './accounts.js';
import { blockRoutes } from './blocks.js';
import { chainRoutes } from './chain.js';
import { healthRoutes } from './health.js';
import { miningRoutes } from './mining.js';
import { transactionRoutes } from './transactions.js';

export async function registerRoutes(fastify: FastifyInstance) {
  // Service status endpoint
  fastify.get('/', {
    schema: {
      tags: ['Health'],
      summary: 'Service status check',
      description: 'Returns basic service status information',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            service: { type: 'string' },
            height: { type: 'number' },
            timestamp: { type: 'string', format: 'date-time' }
          }
        }
      }
    }
  }, async () => {
    return {
      status: 'ok',
      service: 'pow-ledger',
      height: fastify.blockchain.height,
      timestamp: new Date().toISOString()
    };
  });

  // Register all API routes
  await fastify.register(blockRoutes);
  await fastify.register(accountRoutes);
  await fastify.register(chainRoutes);
  await fastify.register(transactionRoutes);
  await fastify.register(miningRoutes);
  await fastify.register(healthRoutes);
}
