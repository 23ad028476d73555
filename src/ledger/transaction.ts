import nacl from 'tweetnacl';
import {
  AccountKind,
  MAX_BALANCE,
  PUBLIC_KEY_LENGTH,
  SIGNATURE_LENGTH
} from '../types/ledger.js';
import type { AccountId, Hash, Timestamp, TransactionPayload } from '../types/ledger.js';
import { checkedAdd, checkedSub } from './account-ledger.js';
import type { AccountLedger } from './account-ledger.js';
import { bytesToHex, hashParts } from './digest.js';
import { ChainError, ChainErrorCode } from './errors.js';

export interface TransactionOptions {
  senderId?: AccountId;
  nonce?: bigint;
  timestamp?: Timestamp;
}

// Fixed field order: changing it changes every content hash
function encodePayload(payload: TransactionPayload): Array<string> {
  switch (payload.type) {
    case 'CreateAccount':
      return [payload.type, payload.accountId, bytesToHex(payload.publicKey)];
    case 'MintInitialSupply':
    case 'Transfer':
      return [payload.type, payload.to, payload.amount.toString()];
  }
}

function assertValidPayload(payload: TransactionPayload): void {
  if (payload.type === 'CreateAccount') {
    if (payload.publicKey.length !== PUBLIC_KEY_LENGTH) {
      throw new RangeError(`Public key must be ${PUBLIC_KEY_LENGTH} bytes, got ${payload.publicKey.length}`);
    }
    return;
  }
  if (payload.amount < 0n || payload.amount > MAX_BALANCE) {
    throw new RangeError(`Amount must fit in an unsigned 128-bit integer, got ${payload.amount}`);
  }
}

export class Transaction {
  readonly nonce: bigint;
  readonly timestamp: Timestamp;
  readonly senderId?: AccountId;
  readonly payload: TransactionPayload;
  private signatureBytes?: Uint8Array;

  constructor(payload: TransactionPayload, options: TransactionOptions = {}) {
    assertValidPayload(payload);
    this.payload = payload;
    this.senderId = options.senderId;
    this.nonce = options.nonce ?? 0n;
    this.timestamp = options.timestamp ?? 0;
  }

  static createAccount(accountId: AccountId, publicKey: Uint8Array): Transaction {
    return new Transaction({ type: 'CreateAccount', accountId, publicKey });
  }

  static mintInitialSupply(to: AccountId, amount: bigint): Transaction {
    return new Transaction({ type: 'MintInitialSupply', to, amount });
  }

  static transfer(senderId: AccountId, to: AccountId, amount: bigint): Transaction {
    return new Transaction({ type: 'Transfer', to, amount }, { senderId });
  }

  get signature(): Uint8Array | undefined {
    return this.signatureBytes;
  }

  /**
   * Content hash over nonce, timestamp, sender and payload. Recomputed on every
   * call so that an altered payload is always visible.
   */
  hash(): Hash {
    return hashParts(JSON.stringify([
      this.nonce.toString(),
      this.timestamp,
      this.senderId ?? null,
      encodePayload(this.payload)
    ]));
  }

  /** The bytes an external signer signs: the content hash as text. */
  signingMessage(): Uint8Array {
    return new Uint8Array(Buffer.from(this.hash(), 'utf8'));
  }

  attachSignature(signature: Uint8Array): void {
    this.signatureBytes = signature;
  }

  verifySignature(publicKey: Uint8Array): boolean {
    const signature = this.signatureBytes;
    if (!signature) {
      return false;
    }
    if (publicKey.length !== PUBLIC_KEY_LENGTH || signature.length !== SIGNATURE_LENGTH) {
      return false;
    }
    return nacl.sign.detached.verify(this.signingMessage(), signature, publicKey);
  }
}

/**
 * Apply one transaction to the ledger. Throws a ChainError and leaves the
 * ledger untouched when any check fails.
 * @param isGenesis true when the enclosing block would be the first in the chain
 */
export function executeTransaction(tx: Transaction, ledger: AccountLedger, isGenesis: boolean): void {
  const payload = tx.payload;

  switch (payload.type) {
    case 'CreateAccount':
      ledger.createAccount(payload.accountId, AccountKind.User, payload.publicKey);
      return;

    case 'MintInitialSupply':
      if (!isGenesis) {
        throw new ChainError(ChainErrorCode.NotGenesisMint, 'Initial supply can be minted only in genesis block.');
      }
      ledger.credit(payload.to, payload.amount);
      return;

    case 'Transfer': {
      const { to, amount } = payload;
      const from = tx.senderId;

      if (from === undefined) {
        throw new ChainError(ChainErrorCode.InvalidSenderId, 'Invalid sender account id.');
      }
      if (from === to) {
        throw new ChainError(ChainErrorCode.SelfTransfer, 'Transfer to yourself.');
      }

      const sender = ledger.getAccountMut(from);
      if (!sender) {
        throw new ChainError(ChainErrorCode.UnknownSender, 'Invalid sender account.');
      }
      const receiver = ledger.getAccountMut(to);
      if (!receiver) {
        throw new ChainError(ChainErrorCode.UnknownReceiver, 'Invalid receiver account.');
      }

      // Checked ahead of the signature: an overdrawn transfer without a valid
      // signature reports InsufficientFunds.
      const senderBalance = checkedSub(sender.balance, amount);
      if (senderBalance === null) {
        throw new ChainError(ChainErrorCode.InsufficientFunds, "Sender doesn't have enough currency.");
      }
      if (!tx.verifySignature(sender.publicKey)) {
        throw new ChainError(ChainErrorCode.InvalidSignature, 'Signature invalid.');
      }

      const receiverBalance = checkedAdd(receiver.balance, amount);
      if (receiverBalance === null) {
        throw new ChainError(ChainErrorCode.AmountOverflow, 'Transfer amount overflow.');
      }

      sender.balance = senderBalance;
      receiver.balance = receiverBalance;
      return;
    }

    default: {
      const unhandled: never = payload;
      throw new Error(`Unhandled transaction payload: ${JSON.stringify(unhandled)}`);
    }
  }
}
