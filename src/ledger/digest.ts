import { createHash } from 'crypto';
import type { Hash, Target } from '../types/ledger.js';

const HASH_ALGORITHM = 'blake2s256';
const COEFFICIENT_DIGITS = 6;

/**
 * Blake2s-256 over the given parts, fed to the hasher in order
 * @returns lowercase hex digest (64 characters)
 */
export function hashParts(...parts: Array<string | Uint8Array>): Hash {
  const hasher = createHash(HASH_ALGORITHM);
  for (const part of parts) {
    hasher.update(part);
  }
  return hasher.digest('hex');
}

/**
 * Compact value of a hex hash, comparable against a compact target.
 * Leading zero digits are dropped, then the remainder is left-padded until its
 * sixth digit is non-zero and its length is even. The exponent is the padded
 * byte length and the coefficient its first three bytes.
 */
export function compactValue(hash: Hash): Target {
  const firstNonZero = hash.search(/[^0]/);
  if (firstNonZero === -1) {
    return 0;
  }

  let digits = hash.slice(firstNonZero).padStart(COEFFICIENT_DIGITS, '0');
  while (digits[COEFFICIENT_DIGITS - 1] === '0') {
    digits = '0' + digits;
  }
  if (digits.length % 2 !== 0) {
    digits = '0' + digits;
  }

  const exponent = digits.length / 2;
  const coefficient = parseInt(digits.slice(0, COEFFICIENT_DIGITS), 16);
  return exponent * 0x1000000 + coefficient;
}

export function meetsTarget(hash: Hash, target: Target): boolean {
  return compactValue(hash) < target;
}

export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error(`Invalid hex string: ${hex}`);
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
}
