export type LatencyTier =
  | 'Invalid'
  | 'Excellent'
  | 'Good'
  | 'Acceptable'
  | 'Slow'
  | 'VerySlow';

export type BlockTimeTier = 'Invalid' | 'Excellent' | 'Good' | 'Slow' | 'VerySlow';

export type RateLimitStatus = 'NONE' | 'POSSIBLE' | 'LIKELY' | 'DETECTED';

export type VerdictTier = 'BEST' | 'GOOD' | 'ACCEPTABLE' | 'WORST';

export type BlockStatus = 'FRESH' | 'STALE' | 'CONSENSUS_FAILED';

// Execution endpoints speak JSON-RPC, beacon endpoints speak REST
export type EndpointKind = 'execution' | 'beacon';

export interface Sample {
  readonly elapsedSeconds: number;
  readonly httpStatus?: number;
  readonly rpcErrorCode?: number;
}

export type SampleSet = readonly Sample[];

export interface RateLimitVerdict {
  readonly status: RateLimitStatus;
  readonly details: string;
  readonly sampleCount: number;
  readonly failureRate: number;
  readonly averageSeconds: number;
}

export interface ConsensusStatus {
  readonly beaconFinalityWorking: boolean;
  readonly beaconHeadWorking: boolean;
  readonly functional: boolean;
}

export interface BlockObservation {
  readonly blockNumber: number | null;
  readonly timestampUnix: number | null;
  /** null when no valid block was retrieved */
  readonly ageSeconds: number | null;
}

export interface VerdictInputs {
  blockAgeSeconds: number | null;
  consensusStatus: ConsensusStatus;
  l1RateLimit: RateLimitStatus;
  l1RateLimitDetails: string;
  consensusRateLimit: RateLimitStatus;
  consensusRateLimitDetails: string;
  avgL1LatencySeconds: number;
  avgConsensusLatencySeconds: number;
  avgBlockTimeSeconds: number;
}

export interface VerdictThresholds {
  criticalBlockAgeSeconds: number;
  staleBlockAgeSeconds: number;
  expectedBlockTimeSeconds: number;
}

export interface VerdictReport {
  readonly score: number;
  readonly tier: VerdictTier;
  readonly criticalFailureReason: string | null;
}
