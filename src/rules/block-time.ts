import { config } from '../config';
import type { BlockTimeTier } from './types';

/**
 * Classify the average seconds per block against the chain's target cadence.
 */
export function classifyBlockTime(
  seconds: number,
  expected: number = config.EXPECTED_BLOCK_TIME_SEC
): BlockTimeTier {
  if (seconds === 0) {
    return 'Invalid';
  }

  // Integer numerators keep 12 * 0.8 from drifting to 9.600000000000001
  if (seconds < (expected * 8) / 10) {
    return 'Excellent';
  }
  if (seconds <= (expected * 12) / 10) {
    return 'Good';
  }
  if (seconds <= (expected * 15) / 10) {
    return 'Slow';
  }
  return 'VerySlow';
}
