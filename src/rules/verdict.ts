import { config } from '../config';
import { classifyBlockTime } from './block-time';
import { classifyLatency } from './latency';
import type {
  BlockTimeTier,
  LatencyTier,
  RateLimitStatus,
  VerdictInputs,
  VerdictReport,
  VerdictThresholds,
  VerdictTier,
} from './types';

// Weights: L1 latency 35, consensus latency 20, cadence 20,
// L1 rate limit 12, consensus rate limit 7, freshness 5
const L1_LATENCY_POINTS: Record<LatencyTier, number> = {
  Invalid: 0,
  Excellent: 35,
  Good: 30,
  Acceptable: 20,
  Slow: 10,
  VerySlow: 5,
};

const CONSENSUS_LATENCY_POINTS: Record<LatencyTier, number> = {
  Invalid: 0,
  Excellent: 20,
  Good: 15,
  Acceptable: 10,
  Slow: 5,
  VerySlow: 5,
};

const BLOCK_TIME_POINTS: Record<BlockTimeTier, number> = {
  Invalid: 0,
  Excellent: 20,
  Good: 15,
  Slow: 10,
  VerySlow: 5,
};

const L1_RATE_LIMIT_POINTS: Record<RateLimitStatus, number> = {
  NONE: 12,
  POSSIBLE: 8,
  LIKELY: 4,
  DETECTED: 0,
};

const CONSENSUS_RATE_LIMIT_POINTS: Record<RateLimitStatus, number> = {
  NONE: 7,
  POSSIBLE: 5,
  LIKELY: 2,
  DETECTED: 0,
};

const STALE_PENALTY = 30;
const FRESH_AGE_SEC = 15;

export function defaultThresholds(): VerdictThresholds {
  return {
    criticalBlockAgeSeconds: config.CRITICAL_BLOCK_AGE_SEC,
    staleBlockAgeSeconds: config.STALE_BLOCK_AGE_SEC,
    expectedBlockTimeSeconds: config.EXPECTED_BLOCK_TIME_SEC,
  };
}

export function tierForScore(score: number): VerdictTier {
  if (score >= 90) return 'BEST';
  if (score >= 75) return 'GOOD';
  if (score >= 60) return 'ACCEPTABLE';
  return 'WORST';
}

function criticalFailure(reason: string): VerdictReport {
  return { score: 0, tier: 'WORST', criticalFailureReason: reason };
}

// Penalty then bonus, applied as one step to the accumulated score
function adjustForBlockAge(score: number, age: number, staleAfter: number): number {
  let adjusted = score;
  if (age > staleAfter) {
    adjusted = Math.max(0, adjusted - STALE_PENALTY);
  }

  if (age <= FRESH_AGE_SEC) {
    adjusted += 5;
  } else if (age <= staleAfter) {
    adjusted += 3;
  } else {
    adjusted += 1;
  }
  return adjusted;
}

/**
 * Score a node out of 100. The four hard overrides are checked in order and
 * short-circuit to 0 before any points are accumulated.
 */
export function calculateVerdict(
  inputs: VerdictInputs,
  thresholds: VerdictThresholds = defaultThresholds()
): VerdictReport {
  const age = inputs.blockAgeSeconds;

  if (age === null || age > thresholds.criticalBlockAgeSeconds) {
    return criticalFailure(
      `block production exceeded ${thresholds.criticalBlockAgeSeconds}s`
    );
  }

  if (!inputs.consensusStatus.functional) {
    return criticalFailure('consensus layer failed');
  }

  if (inputs.l1RateLimit === 'DETECTED' && inputs.avgL1LatencySeconds === 0) {
    return criticalFailure('L1 RPC completely failed');
  }

  if (inputs.consensusRateLimit === 'DETECTED' && inputs.avgConsensusLatencySeconds === 0) {
    return criticalFailure('consensus RPC completely failed');
  }

  let score = 0;
  score += L1_LATENCY_POINTS[classifyLatency(inputs.avgL1LatencySeconds)];
  score += CONSENSUS_LATENCY_POINTS[classifyLatency(inputs.avgConsensusLatencySeconds)];

  if (inputs.avgBlockTimeSeconds > 0) {
    const cadence = classifyBlockTime(
      inputs.avgBlockTimeSeconds,
      thresholds.expectedBlockTimeSeconds
    );
    score += BLOCK_TIME_POINTS[cadence];
  }

  score += L1_RATE_LIMIT_POINTS[inputs.l1RateLimit];
  score += CONSENSUS_RATE_LIMIT_POINTS[inputs.consensusRateLimit];

  score = adjustForBlockAge(score, age, thresholds.staleBlockAgeSeconds);
  score = Math.min(100, Math.max(0, score));

  return {
    score,
    tier: tierForScore(score),
    criticalFailureReason: null,
  };
}
