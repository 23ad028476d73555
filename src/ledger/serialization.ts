import type {
  Account,
  AccountId,
  AccountView,
  BlockJSON,
  TransactionJSON,
  TransactionPayload,
  TransactionPayloadJSON
} from '../types/ledger.js';
import { Block } from './block.js';
import { bytesToHex, hexToBytes } from './digest.js';
import { ChainError, ChainErrorCode } from './errors.js';
import { Transaction } from './transaction.js';

/**
 * Raised when a JSON body cannot be turned into ledger objects
 */
export class WireFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WireFormatError';
  }
}

function decodeUnsigned(field: string, value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new WireFormatError(`Invalid ${field}: must be a non-negative integer string`);
  }
  return BigInt(value);
}

function decodeHex(field: string, value: string): Uint8Array {
  try {
    return hexToBytes(value);
  } catch {
    throw new WireFormatError(`Invalid ${field}: must be an even-length hex string`);
  }
}

function payloadFromJSON(json: TransactionPayloadJSON): TransactionPayload {
  switch (json.type) {
    case 'CreateAccount':
      return { type: json.type, accountId: json.accountId, publicKey: decodeHex('publicKey', json.publicKey) };
    case 'MintInitialSupply':
    case 'Transfer':
      return { type: json.type, to: json.to, amount: decodeUnsigned('amount', json.amount) };
  }
}

function payloadToJSON(payload: TransactionPayload): TransactionPayloadJSON {
  switch (payload.type) {
    case 'CreateAccount':
      return { type: payload.type, accountId: payload.accountId, publicKey: bytesToHex(payload.publicKey) };
    case 'MintInitialSupply':
    case 'Transfer':
      return { type: payload.type, to: payload.to, amount: payload.amount.toString() };
  }
}

export function transactionFromJSON(json: TransactionJSON): Transaction {
  let transaction: Transaction;
  try {
    transaction = new Transaction(payloadFromJSON(json.payload), {
      senderId: json.senderId,
      nonce: json.nonce === undefined ? undefined : decodeUnsigned('nonce', json.nonce),
      timestamp: json.timestamp
    });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new WireFormatError(error.message);
    }
    throw error;
  }

  if (json.signature !== undefined) {
    transaction.attachSignature(decodeHex('signature', json.signature));
  }
  return transaction;
}

export function transactionToJSON(transaction: Transaction): TransactionJSON {
  const json: TransactionJSON = {
    nonce: transaction.nonce.toString(),
    timestamp: transaction.timestamp,
    payload: payloadToJSON(transaction.payload)
  };
  if (transaction.senderId !== undefined) {
    json.senderId = transaction.senderId;
  }
  if (transaction.signature) {
    json.signature = bytesToHex(transaction.signature);
  }
  return json;
}

/**
 * Rebuild a block and check it against the hash its sender claims
 * @throws ChainError InvalidHash when the contents do not hash to json.hash
 */
export function blockFromJSON(json: BlockJSON): Block {
  const block = new Block(json.prevHash, json.timestamp);
  block.setNonce(decodeUnsigned('powNonce', json.powNonce));
  for (const transaction of json.transactions) {
    block.addTransaction(transactionFromJSON(transaction));
  }

  if (block.hash !== json.hash) {
    throw new ChainError(ChainErrorCode.InvalidHash, 'Block has invalid hash');
  }
  return block;
}

export function blockToJSON(block: Block): BlockJSON {
  const json: BlockJSON = {
    powNonce: block.nonce.toString(),
    timestamp: block.timestamp,
    hash: block.hash,
    transactions: block.transactions.map(transactionToJSON)
  };
  if (block.prevHash !== undefined) {
    json.prevHash = block.prevHash;
  }
  return json;
}

export function accountToView(id: AccountId, account: Readonly<Account>): AccountView {
  return {
    id,
    kind: account.kind,
    balance: account.balance.toString(),
    publicKey: bytesToHex(account.publicKey)
  };
}
