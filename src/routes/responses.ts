import type { ProcessingResult } from '../types/ledger.js';
import { categoryOf } from '../ledger/errors.js';

/**
 * HTTP status for a processing outcome. Consensus rejections and a busy miner
 * map to 409, an aborted mining job to 503.
 */
export function statusForResult(result: ProcessingResult): number {
  if (result.success) {
    return 200;
  }

  const code = result.code;
  if (code === undefined) {
    return 500;
  }
  if (code === 'MiningAborted') {
    return 503;
  }
  if (code === 'MiningInProgress') {
    return 409;
  }
  return categoryOf(code) === 'consensus' ? 409 : 400;
}
