// Core ledger data models
import type { ChainErrorCode } from '../ledger/errors.js';

export type AccountId = string;
export type Hash = string;

/** Seconds since the Unix epoch. */
export type Timestamp = number;

/** Compact "bits" encoding: 1-byte exponent followed by a 3-byte coefficient. */
export type Target = number;

export const PUBLIC_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;

/** Largest value an unsigned 128-bit balance can hold. */
export const MAX_BALANCE = (1n << 128n) - 1n;

export enum AccountKind {
  User = 'User',
  Contract = 'Contract'
}

export interface Account {
  kind: AccountKind;
  balance: bigint;
  publicKey: Uint8Array;
}

export type TransactionPayload =
  | { readonly type: 'CreateAccount'; readonly accountId: AccountId; readonly publicKey: Uint8Array }
  | { readonly type: 'MintInitialSupply'; readonly to: AccountId; readonly amount: bigint }
  | { readonly type: 'Transfer'; readonly to: AccountId; readonly amount: bigint };

// Wire (JSON) shapes used by the HTTP surface
export type TransactionPayloadJSON =
  | { type: 'CreateAccount'; accountId: string; publicKey: string }
  | { type: 'MintInitialSupply'; to: string; amount: string }
  | { type: 'Transfer'; to: string; amount: string };

export interface TransactionJSON {
  nonce?: string;
  timestamp?: number;
  senderId?: string;
  payload: TransactionPayloadJSON;
  signature?: string;
}

export interface BlockJSON {
  prevHash?: string;
  powNonce: string;
  timestamp: number;
  hash: string;
  transactions: TransactionJSON[];
}

export interface AccountView {
  id: AccountId;
  kind: AccountKind;
  balance: string;
  publicKey: string;
}

// Processing result types
export type ProcessingErrorCode = ChainErrorCode | 'MiningAborted' | 'MiningInProgress';

export interface ProcessingResult {
  success: boolean;
  blockHeight: number;
  message?: string;
  error?: string;
  code?: ProcessingErrorCode;
}

export interface MiningResult extends ProcessingResult {
  hash?: Hash;
  nonce?: string;
  transactionCount: number;
}

export interface ChainStatus {
  height: number;
  lastBlockHash: Hash | null;
  target: string;
  difficulty: number;
}
