import type { LatencyTier } from './types';

// Upper bounds (exclusive) in milliseconds, checked in order
const LATENCY_BANDS_MS: ReadonlyArray<[number, LatencyTier]> = [
  [25, 'Excellent'],
  [50, 'Good'],
  [200, 'Acceptable'],
  [500, 'Slow'],
];

/**
 * Classify an average response time. Zero means nothing was measured,
 * not an instant response.
 */
export function classifyLatency(seconds: number): LatencyTier {
  if (seconds === 0) {
    return 'Invalid';
  }

  const ms = seconds * 1000;
  for (const [limit, tier] of LATENCY_BANDS_MS) {
    if (ms < limit) {
      return tier;
    }
  }
  return 'VerySlow';
}
