/**
 * JSON schemas shared by the route definitions and the OpenAPI document
 */

const hexString = { type: 'string', pattern: '^([0-9a-fA-F]{2})*$' } as const;
const unsignedString = { type: 'string', pattern: '^[0-9]+$' } as const;

export const transactionPayloadSchema = {
  type: 'object',
  required: ['type'],
  oneOf: [
    {
      type: 'object',
      required: ['type', 'accountId', 'publicKey'],
      properties: {
        type: { type: 'string', enum: ['CreateAccount'] },
        accountId: { type: 'string', minLength: 1 },
        publicKey: { ...hexString, minLength: 64, maxLength: 64 }
      }
    },
    {
      type: 'object',
      required: ['type', 'to', 'amount'],
      properties: {
        type: { type: 'string', enum: ['MintInitialSupply', 'Transfer'] },
        to: { type: 'string', minLength: 1 },
        amount: unsignedString
      }
    }
  ]
} as const;

export const transactionSchema = {
  type: 'object',
  required: ['payload'],
  properties: {
    nonce: unsignedString,
    timestamp: { type: 'integer', minimum: 0 },
    senderId: { type: 'string', minLength: 1 },
    payload: transactionPayloadSchema,
    signature: hexString
  }
} as const;

export const blockSchema = {
  type: 'object',
  required: ['powNonce', 'timestamp', 'hash', 'transactions'],
  properties: {
    prevHash: { type: 'string', minLength: 1 },
    powNonce: unsignedString,
    timestamp: { type: 'integer', minimum: 0 },
    hash: { type: 'string', minLength: 64, maxLength: 64 },
    transactions: { type: 'array', items: transactionSchema }
  }
} as const;

export const processingResultSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    blockHeight: { type: 'number' },
    message: { type: 'string' },
    error: { type: 'string' },
    code: { type: 'string' }
  }
} as const;

export const miningResultSchema = {
  type: 'object',
  properties: {
    ...processingResultSchema.properties,
    hash: { type: 'string' },
    nonce: { type: 'string' },
    transactionCount: { type: 'number' }
  }
} as const;

export const errorResponseSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    error: { type: 'string' },
    code: { type: 'string' }
  }
} as const;

export const accountSchema = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    kind: { type: 'string', enum: ['User', 'Contract'] },
    balance: { type: 'string' },
    publicKey: { type: 'string' }
  }
} as const;

export const chainStatusSchema = {
  type: 'object',
  properties: {
    height: { type: 'number' },
    lastBlockHash: { type: 'string', nullable: true },
    target: { type: 'string' },
    difficulty: { type: 'number' }
  }
} as const;
