import type { FastifyDynamicSwaggerOptions } from '@fastify/swagger';
import type { FastifySwaggerUiOptions } from '@fastify/swagger-ui';

export const swaggerOptions: FastifyDynamicSwaggerOptions = {
  openapi: {
    openapi: '3.0.0',
    info: {
      title: 'PoW Ledger API',
      description: 'Single-process account ledger that admits blocks of transactions under a proof-of-work gate',
      version: '1.0.0',
      license: {
        name: 'MIT',
        url: 'https://opensource.org/licenses/MIT'
      }
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server'
      }
    ],
    tags: [
      { name: 'Health', description: 'Health check and monitoring endpoints' },
      { name: 'Blocks', description: 'Block submission and lookup' },
      { name: 'Accounts', description: 'Account state queries' },
      { name: 'Chain', description: 'Chain status and structural validation' },
      { name: 'Transactions', description: 'Pending transaction pool' },
      { name: 'Mining', description: 'Proof-of-work mining jobs' }
    ]
  }
};

export const swaggerUiOptions: FastifySwaggerUiOptions = {
  routePrefix: '/docs',
  uiConfig: {
    docExpansion: 'list',
    deepLinking: false
  },
  staticCSP: true,
  transformSpecificationClone: true
};
