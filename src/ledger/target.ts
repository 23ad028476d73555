import type { Target } from '../types/ledger.js';

/** Easiest target the puzzle may ever retarget to. */
export const MAX_TARGET: Target = 0x207fffff;

const EXPONENT_UNIT = 0x1000000;

/**
 * Parse a target given as hex bits, e.g. "207fffff"
 */
export function parseTarget(hex: string): Target {
  if (!/^[0-9a-fA-F]{1,8}$/.test(hex)) {
    throw new RangeError(`Target must be 1 to 8 hex digits, got "${hex}"`);
  }
  return parseInt(hex, 16);
}

export function formatTarget(target: Target): string {
  return target.toString(16).padStart(8, '0');
}

export function decodeTarget(bits: Target): bigint {
  const exponent = Math.floor(bits / EXPONENT_UNIT);
  const coefficient = BigInt(bits % EXPONENT_UNIT);

  if (exponent <= 3) {
    return coefficient >> BigInt(8 * (3 - exponent));
  }
  return coefficient << BigInt(8 * (exponent - 3));
}

export function encodeTarget(value: bigint): Target {
  if (value <= 0n) {
    return 0;
  }

  let hex = value.toString(16);
  if (hex.length % 2 !== 0) {
    hex = '0' + hex;
  }

  const size = hex.length / 2;
  const coefficient = parseInt(hex.slice(0, 6).padEnd(6, '0'), 16);
  return size * EXPONENT_UNIT + coefficient;
}
