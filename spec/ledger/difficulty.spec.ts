import { describe, it, expect } from 'vitest';
import { clampTimespan, EXPECTED_TIMESPAN_SECONDS, retarget } from '../../src/ledger/difficulty.js';
import { MAX_TARGET } from '../../src/ledger/target.js';

const options = { expectedTimespan: EXPECTED_TIMESPAN_SECONDS, maxTarget: MAX_TARGET };

describe('Difficulty Retarget', () => {
  it('should clamp the observed timespan to a factor of four either way', () => {
    expect(clampTimespan(0, EXPECTED_TIMESPAN_SECONDS)).toBe(302400);
    expect(clampTimespan(10 * EXPECTED_TIMESPAN_SECONDS, EXPECTED_TIMESPAN_SECONDS)).toBe(4838400);
    expect(clampTimespan(500000, EXPECTED_TIMESPAN_SECONDS)).toBe(500000);
  });

  it('should make the target four times harder when blocks arrive instantly', () => {
    expect(retarget(MAX_TARGET, 0, options)).toEqual({ target: 0x201fffff, difficulty: 0.25 });
  });

  it('should keep the target when blocks arrive on schedule', () => {
    expect(retarget(MAX_TARGET, EXPECTED_TIMESPAN_SECONDS, options)).toEqual({ target: MAX_TARGET, difficulty: 1 });
    expect(retarget(0x201fffff, EXPECTED_TIMESPAN_SECONDS, options)).toEqual({ target: 0x201fffff, difficulty: 1 });
  });

  it('should ease the target when blocks are slow', () => {
    expect(retarget(0x201fffff, 2 * EXPECTED_TIMESPAN_SECONDS, options)).toEqual({ target: 0x203ffffe, difficulty: 2 });
  });

  it('should never exceed the maximum target', () => {
    expect(retarget(MAX_TARGET, 2 * EXPECTED_TIMESPAN_SECONDS, options)).toEqual({ target: MAX_TARGET, difficulty: 2 });
  });
});
