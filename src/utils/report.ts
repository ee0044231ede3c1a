import type { NodeEvaluation } from '../rules/index';
import type { LatencyTier, RateLimitVerdict, VerdictTier } from '../rules/types';
import type { NodeInfo } from './node-info';

const VERDICT_LABELS: Record<VerdictTier, string> = {
  BEST: 'BEST FOR NODE',
  GOOD: 'GOOD FOR NODE',
  ACCEPTABLE: 'ACCEPTABLE FOR NODE',
  WORST: 'NOT SUITABLE FOR NODE',
};

const LATENCY_LABELS: Record<LatencyTier, string> = {
  Invalid: 'Invalid',
  Excellent: 'Excellent',
  Good: 'Good',
  Acceptable: 'Acceptable',
  Slow: 'Slow',
  VerySlow: 'Very Slow',
};

export function verdictLabel(tier: VerdictTier): string {
  return VERDICT_LABELS[tier];
}

function latencyLine(tier: LatencyTier, seconds: number): string {
  return `${LATENCY_LABELS[tier]} (${(seconds * 1000).toFixed(1)}ms)`;
}

function rateLimitLine(verdict: RateLimitVerdict): string {
  return `${verdict.status} (${verdict.details})`;
}

function orUnknown(value: string | number | null): string {
  return value === null ? 'unknown' : String(value);
}

function syncingLine(syncing: boolean | null): string {
  if (syncing === null) return 'unknown';
  return syncing ? 'Syncing' : 'Synced';
}

function infoLines(info: NodeInfo): string[] {
  return [
    'Basic Metrics:',
    `  - Chain ID: ${info.chainId === null ? 'Unable to determine' : info.chainId}`,
    `  - Client: ${orUnknown(info.clientVersion)}`,
    `  - Latest Block: ${orUnknown(info.latestBlockNumber)}`,
    `  - Finalized Block: ${orUnknown(info.finalizedBlockNumber)}`,
    'Consensus Metrics:',
    `  - Beacon Finalized Slot: ${info.beaconFinalizedSlot ?? 'No Beacon Finality'}`,
    `  - Beacon Head Slot: ${info.beaconHeadSlot ?? 'No Beacon Head'}`,
    `  - Consensus Sync: ${syncingLine(info.syncing)}`,
    `  - Consensus Client: ${orUnknown(info.consensusClient)} | Peers: ${orUnknown(info.peerCount)}`,
  ];
}

/**
 * Flat text rendering of an evaluation, one fact per line. Node metadata
 * sections follow the breakdown when `info` is given.
 */
export function renderReport(evaluation: NodeEvaluation, info?: NodeInfo): string {
  const { report, breakdown } = evaluation;
  const consensusFailed = !breakdown.consensus.functional;
  const lines: string[] = [];

  lines.push(`Overall Score: ${report.score}/100`);
  lines.push(`Verdict: ${verdictLabel(report.tier)}`);
  if (report.criticalFailureReason) {
    lines.push(`Critical Failure: ${report.criticalFailureReason}`);
  }

  lines.push('Breakdown:');

  const l1 = latencyLine(breakdown.l1Latency, breakdown.avgL1LatencySeconds);
  if (consensusFailed) {
    lines.push(`  - L1 RPC Performance: ${l1} (CONSENSUS FAILED)`);
    lines.push('  - Consensus RPC Performance: FAILED - No Beacon Data');
  } else {
    if (breakdown.blockStatus === 'STALE') {
      lines.push('  - L1 RPC Performance: Stale Block - Not Producing');
    } else {
      lines.push(`  - L1 RPC Performance: ${l1}`);
    }
    const cons = latencyLine(breakdown.consensusLatency, breakdown.avgConsensusLatencySeconds);
    lines.push(`  - Consensus RPC Performance: ${cons}`);
  }

  if (breakdown.blockTime) {
    const perBlock = breakdown.avgBlockTimeSeconds.toFixed(2);
    lines.push(`  - Block Production: ${LATENCY_LABELS[breakdown.blockTime]} (${perBlock} sec/block)`);
  } else {
    lines.push('  - Block Production: Unable to assess');
  }

  lines.push(`  - L1 Rate Limiting: ${rateLimitLine(breakdown.l1RateLimit)}`);
  lines.push(`  - Consensus Rate Limiting: ${rateLimitLine(breakdown.consensusRateLimit)}`);

  const age = breakdown.blockAgeSeconds === null ? 'unknown' : `${breakdown.blockAgeSeconds}s`;
  lines.push(`  - Block Freshness: ${breakdown.blockStatus} (age ${age})`);

  if (info) {
    lines.push(...infoLines(info));
  }

  return lines.join('\n') + '\n';
}
