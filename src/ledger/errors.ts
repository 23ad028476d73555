/**
 * Typed failures raised by the ledger core.
 * The orchestrator catches these at its boundary and hands them back as results.
 */

export enum ChainErrorCode {
  // Structural
  InvalidHash = 'InvalidHash',
  EmptyBlock = 'EmptyBlock',
  MissingPrevHash = 'MissingPrevHash',
  HashMismatch = 'HashMismatch',
  // Ledger / transaction
  AccountExists = 'AccountExists',
  UnknownAccount = 'UnknownAccount',
  UnknownSender = 'UnknownSender',
  UnknownReceiver = 'UnknownReceiver',
  InsufficientFunds = 'InsufficientFunds',
  AmountOverflow = 'AmountOverflow',
  SelfTransfer = 'SelfTransfer',
  InvalidSenderId = 'InvalidSenderId',
  NotGenesisMint = 'NotGenesisMint',
  InvalidSignature = 'InvalidSignature',
  // Consensus
  HashAboveTarget = 'HashAboveTarget'
}

export type ChainErrorCategory = 'structural' | 'ledger' | 'consensus';

const CATEGORY_BY_CODE: Record<ChainErrorCode, ChainErrorCategory> = {
  [ChainErrorCode.InvalidHash]: 'structural',
  [ChainErrorCode.EmptyBlock]: 'structural',
  [ChainErrorCode.MissingPrevHash]: 'structural',
  [ChainErrorCode.HashMismatch]: 'structural',
  [ChainErrorCode.AccountExists]: 'ledger',
  [ChainErrorCode.UnknownAccount]: 'ledger',
  [ChainErrorCode.UnknownSender]: 'ledger',
  [ChainErrorCode.UnknownReceiver]: 'ledger',
  [ChainErrorCode.InsufficientFunds]: 'ledger',
  [ChainErrorCode.AmountOverflow]: 'ledger',
  [ChainErrorCode.SelfTransfer]: 'ledger',
  [ChainErrorCode.InvalidSenderId]: 'ledger',
  [ChainErrorCode.NotGenesisMint]: 'ledger',
  [ChainErrorCode.InvalidSignature]: 'ledger',
  [ChainErrorCode.HashAboveTarget]: 'consensus'
};

export function categoryOf(code: ChainErrorCode): ChainErrorCategory {
  return CATEGORY_BY_CODE[code];
}

export interface ChainErrorDetails {
  blockHeight?: number;
  transactionIndex?: number;
}

export class ChainError extends Error {
  readonly code: ChainErrorCode;
  readonly category: ChainErrorCategory;
  readonly blockHeight?: number;
  readonly transactionIndex?: number;

  constructor(code: ChainErrorCode, message: string, details: ChainErrorDetails = {}) {
    super(message);
    this.name = 'ChainError';
    this.code = code;
    this.category = categoryOf(code);
    this.blockHeight = details.blockHeight;
    this.transactionIndex = details.transactionIndex;
  }

  /**
   * Re-raise a transaction failure with the position it occurred at
   */
  withDetails(details: ChainErrorDetails): ChainError {
    const prefix = details.transactionIndex !== undefined
      ? `Error during tx ${details.transactionIndex} execution: `
      : '';
    return new ChainError(this.code, prefix + this.message, {
      blockHeight: details.blockHeight ?? this.blockHeight,
      transactionIndex: details.transactionIndex ?? this.transactionIndex
    });
  }
}

export function isChainError(error: unknown): error is ChainError {
  return error instanceof ChainError;
}
