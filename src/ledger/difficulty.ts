import type { Target } from '../types/ledger.js';
import { decodeTarget, encodeTarget } from './target.js';

/** Two weeks, the span a full retarget epoch is expected to take. */
export const EXPECTED_TIMESPAN_SECONDS = 14 * 24 * 60 * 60;

/** A single retarget moves the target by at most this factor either way. */
export const MAX_ADJUSTMENT_FACTOR = 4;

export interface RetargetOptions {
  expectedTimespan: number;
  maxTarget: Target;
}

export interface RetargetResult {
  target: Target;
  difficulty: number;
}

export function clampTimespan(actual: number, expected: number): number {
  const lower = Math.floor(expected / MAX_ADJUSTMENT_FACTOR);
  const upper = expected * MAX_ADJUSTMENT_FACTOR;
  return Math.min(Math.max(Math.floor(actual), lower), upper);
}

/**
 * Scale the current target by observed over expected chain time.
 * Runs on every non-genesis block; the result never exceeds maxTarget.
 * @param elapsed seconds between the first and the latest accepted block
 */
export function retarget(current: Target, elapsed: number, options: RetargetOptions): RetargetResult {
  const timespan = clampTimespan(elapsed, options.expectedTimespan);
  const difficulty = timespan / options.expectedTimespan;

  const scaled = (decodeTarget(current) * BigInt(timespan)) / BigInt(options.expectedTimespan);
  const ceiling = decodeTarget(options.maxTarget);

  return {
    target: scaled >= ceiling ? options.maxTarget : encodeTarget(scaled),
    difficulty
  };
}
