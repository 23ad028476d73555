import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { accountSchema, errorResponseSchema } from '../config/route-schemas.js';
import { accountToView } from '../ledger/serialization.js';

// Request params schema for GET /accounts/:id
interface AccountRequest {
  Params: {
    id: string;
  };
}

export async function accountRoutes(fastify: FastifyInstance) {
  const blockchain = fastify.blockchain;

  // GET /accounts/:id - Current state of one account
  fastify.get<AccountRequest>('/accounts/:id', {
    schema: {
      tags: ['Accounts'],
      summary: 'Get account',
      description: 'Retrieve the kind, balance and public key of an account',
      params: {
        type: 'object',
        required: ['id'],
        properties: {
          id: { type: 'string', minLength: 1, description: 'Account id to query' }
        }
      },
      response: {
        200: accountSchema,
        404: errorResponseSchema
      }
    }
  }, async (request: FastifyRequest<AccountRequest>, reply: FastifyReply) => {
    const { id } = request.params;
    const account = blockchain.getAccount(id);

    if (!account) {
      return reply.status(404).send({ error: `Account not found: ${id}` });
    }

    return reply.status(200).send(accountToView(id, account));
  });
}
