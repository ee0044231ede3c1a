import { classifyBlockTime } from './block-time';
import { validateConsensus } from './consensus';
import { classifyLatency } from './latency';
import { detectRateLimit } from './rate-limit';
import { calculateVerdict, defaultThresholds } from './verdict';
import { averageOf } from '../utils/stats';
import type {
  BlockStatus,
  BlockTimeTier,
  ConsensusStatus,
  LatencyTier,
  RateLimitVerdict,
  SampleSet,
  VerdictReport,
  VerdictThresholds,
} from './types';

export * from './types';
export { classifyLatency } from './latency';
export { classifyBlockTime } from './block-time';
export { detectRateLimit } from './rate-limit';
export { validateConsensus } from './consensus';
export { calculateVerdict, defaultThresholds, tierForScore } from './verdict';

export interface NodeMeasurements {
  l1RateSamples: SampleSet;
  consensusRateSamples: SampleSet;
  l1LatencySeconds: readonly number[];
  consensusLatencySeconds: readonly number[];
  blockTimesSeconds: readonly number[];
  blockAgeSeconds: number | null;
  beaconFinalizedSlot?: string | null;
  beaconHeadSlot?: string | null;
}

export interface NodeBreakdown {
  avgL1LatencySeconds: number;
  avgConsensusLatencySeconds: number;
  avgBlockTimeSeconds: number;
  blockAgeSeconds: number | null;
  l1Latency: LatencyTier;
  consensusLatency: LatencyTier;
  // null when no cadence could be measured
  blockTime: BlockTimeTier | null;
  blockStatus: BlockStatus;
  l1RateLimit: RateLimitVerdict;
  consensusRateLimit: RateLimitVerdict;
  consensus: ConsensusStatus;
}

export interface NodeEvaluation {
  report: VerdictReport;
  breakdown: NodeBreakdown;
}

export function classifyBlockStatus(
  ageSeconds: number | null,
  consensus: ConsensusStatus,
  staleAfterSeconds: number
): BlockStatus {
  if (!consensus.functional) return 'CONSENSUS_FAILED';
  if (ageSeconds === null || ageSeconds > staleAfterSeconds) return 'STALE';
  return 'FRESH';
}

// Run every classifier once and feed the results into the verdict
export function evaluateNode(
  measurements: NodeMeasurements,
  thresholds: VerdictThresholds = defaultThresholds()
): NodeEvaluation {
  const consensus = validateConsensus(
    measurements.beaconFinalizedSlot,
    measurements.beaconHeadSlot
  );
  const l1RateLimit = detectRateLimit(measurements.l1RateSamples, 'execution');
  const consensusRateLimit = detectRateLimit(measurements.consensusRateSamples, 'beacon');

  const avgL1LatencySeconds = averageOf(measurements.l1LatencySeconds);
  const avgConsensusLatencySeconds = averageOf(measurements.consensusLatencySeconds);
  const avgBlockTimeSeconds = averageOf(measurements.blockTimesSeconds);

  const report = calculateVerdict(
    {
      blockAgeSeconds: measurements.blockAgeSeconds,
      consensusStatus: consensus,
      l1RateLimit: l1RateLimit.status,
      l1RateLimitDetails: l1RateLimit.details,
      consensusRateLimit: consensusRateLimit.status,
      consensusRateLimitDetails: consensusRateLimit.details,
      avgL1LatencySeconds,
      avgConsensusLatencySeconds,
      avgBlockTimeSeconds,
    },
    thresholds
  );

  return {
    report,
    breakdown: {
      avgL1LatencySeconds,
      avgConsensusLatencySeconds,
      avgBlockTimeSeconds,
      blockAgeSeconds: measurements.blockAgeSeconds,
      l1Latency: classifyLatency(avgL1LatencySeconds),
      consensusLatency: classifyLatency(avgConsensusLatencySeconds),
      blockTime:
        avgBlockTimeSeconds > 0
          ? classifyBlockTime(avgBlockTimeSeconds, thresholds.expectedBlockTimeSeconds)
          : null,
      blockStatus: classifyBlockStatus(
        measurements.blockAgeSeconds,
        consensus,
        thresholds.staleBlockAgeSeconds
      ),
      l1RateLimit,
      consensusRateLimit,
      consensus,
    },
  };
}
