import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ChainStatus } from '../types/ledger.js';
import { chainStatusSchema } from '../config/route-schemas.js';
import type { ConcurrencyStatus } from '../services/concurrency-manager.js';
import type { ErrorStatistics } from '../services/error-handler.js';

interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptime: number;
  chain: ChainStatus & { isValid: boolean };
  concurrency: ConcurrencyStatus;
  mining: {
    isMining: boolean;
    pendingTransactions: number;
  };
  errors: Omit<ErrorStatistics, 'lastError'> & { lastError: string | null };
}

export async function healthRoutes(fastify: FastifyInstance) {
  // GET /health - System health and monitoring endpoint
  fastify.get('/health', {
    schema: {
      tags: ['Health'],
      summary: 'System health check',
      description: 'Chain state and validity, block queue, mining activity and error statistics',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: ['healthy', 'degraded', 'unhealthy'] },
            timestamp: { type: 'string' },
            uptime: { type: 'number' },
            chain: {
              type: 'object',
              properties: {
                ...chainStatusSchema.properties,
                isValid: { type: 'boolean' }
              }
            },
            concurrency: {
              type: 'object',
              properties: {
                queueLength: { type: 'number' },
                isProcessingBlocks: { type: 'boolean' }
              }
            },
            mining: {
              type: 'object',
              properties: {
                isMining: { type: 'boolean' },
                pendingTransactions: { type: 'number' }
              }
            },
            errors: {
              type: 'object',
              properties: {
                totalErrors: { type: 'number' },
                recentErrors: { type: 'number' },
                dailyErrors: { type: 'number' },
                errorsByType: { type: 'object', additionalProperties: { type: 'number' } },
                errorsBySeverity: { type: 'object', additionalProperties: { type: 'number' } },
                lastError: { type: 'string', nullable: true }
              }
            }
          }
        }
      }
    }
  }, async (request: FastifyRequest, reply: FastifyReply) => {
    const { concurrencyManager, errorHandler } = fastify.services;

    const validation = fastify.blockchain.validate();
    const concurrencyStatus = concurrencyManager.getStatus();

    // Clean up old errors periodically
    errorHandler.clearOldErrors();
    const errorStats = errorHandler.getErrorStatistics();

    let overallStatus: HealthResponse['status'] = 'healthy';
    if (!validation.isValid) {
      overallStatus = 'unhealthy';
    } else if (errorStats.recentErrors > 10 || concurrencyStatus.queueLength > 20) {
      overallStatus = 'degraded';
    }

    const healthResponse: HealthResponse = {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      chain: { ...fastify.blockchain.status(), isValid: validation.isValid },
      concurrency: concurrencyStatus,
      mining: {
        isMining: fastify.miner.isMining,
        pendingTransactions: fastify.transactionPool.size
      },
      errors: { ...errorStats, lastError: errorStats.lastError?.message ?? null }
    };

    return reply.status(200).send(healthResponse);
  });
}
