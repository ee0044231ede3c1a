import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { SCORING_VERSION } from '../config';
import { evaluateNode } from '../rules/index';
import type { NodeEvaluation, NodeMeasurements } from '../rules/index';
import type { RateLimitVerdict } from '../rules/types';
import { extractBeaconSlot } from '../utils/beacon-parser';
import { internalError, invalidRequest } from '../utils/errors';
import { collectNodeInfo } from '../utils/node-info';
import type { NodeInfo } from '../utils/node-info';
import { verdictLabel, renderReport } from '../utils/report';
import { cadenceFromBlocks, extractBlockHeader, observeBlock } from '../utils/rpc-parser';
import { formatIssues, probeSchema, toSample } from './schemas';

const router = Router();

const slotSchema = z.union([z.string(), z.number()]).nullable().optional();

const evaluateSchema = z.object({
  l1_rate_samples: z.array(probeSchema).default([]),
  consensus_rate_samples: z.array(probeSchema).default([]),
  l1_latency_seconds: z.array(z.number().min(0)).default([]),
  consensus_latency_seconds: z.array(z.number().min(0)).default([]),
  block_times_seconds: z.array(z.number().min(0)).default([]),
  // Raw latest/earlier eth_getBlockByNumber pairs, each adding one cadence measurement
  cadence_blocks: z.array(z.object({ latest: z.unknown(), earlier: z.unknown() })).default([]),

  // Either the age directly, or the raw latest-block response and when it was fetched
  block_age_seconds: z.number().nullable().optional(),
  latest_block: z.unknown().optional(),
  observed_at_unix: z.number().int().optional(),

  // Either the slots directly, or the raw beacon header responses
  beacon_finalized_slot: slotSchema,
  beacon_head_slot: slotSchema,
  beacon_finalized_header: z.unknown().optional(),
  beacon_head_header: z.unknown().optional(),

  // Raw responses reported as node metadata
  chain_id_response: z.unknown().optional(),
  client_version_response: z.unknown().optional(),
  finalized_block: z.unknown().optional(),
  beacon_syncing_response: z.unknown().optional(),
  beacon_identity_response: z.unknown().optional(),
});

type EvaluateRequest = z.infer<typeof evaluateSchema>;

function resolveSlot(
  slot: string | number | null | undefined,
  header: unknown
): string | null {
  if (slot !== undefined && slot !== null) return String(slot);
  if (header !== undefined) return extractBeaconSlot(header);
  return null;
}

function resolveBlockAge(body: EvaluateRequest): number | null {
  if (body.block_age_seconds !== undefined) return body.block_age_seconds;
  if (body.latest_block === undefined) return null;
  return observeBlock(extractBlockHeader(body.latest_block), body.observed_at_unix).ageSeconds;
}

function resolveBlockTimes(body: EvaluateRequest): number[] {
  const derived = body.cadence_blocks
    .map(pair => cadenceFromBlocks(pair.latest, pair.earlier))
    .filter((cadence): cadence is number => cadence !== null);
  return [...body.block_times_seconds, ...derived];
}

export function toMeasurements(body: EvaluateRequest): NodeMeasurements {
  return {
    l1RateSamples: body.l1_rate_samples.map(p => toSample(p, 'execution')),
    consensusRateSamples: body.consensus_rate_samples.map(p => toSample(p, 'beacon')),
    l1LatencySeconds: body.l1_latency_seconds,
    consensusLatencySeconds: body.consensus_latency_seconds,
    blockTimesSeconds: resolveBlockTimes(body),
    blockAgeSeconds: resolveBlockAge(body),
    beaconFinalizedSlot: resolveSlot(body.beacon_finalized_slot, body.beacon_finalized_header),
    beaconHeadSlot: resolveSlot(body.beacon_head_slot, body.beacon_head_header),
  };
}

export function toNodeInfo(
  body: EvaluateRequest,
  measurements: NodeMeasurements,
  evaluation: NodeEvaluation
): NodeInfo {
  const { consensus } = evaluation.breakdown;
  return collectNodeInfo(
    {
      chainId: body.chain_id_response,
      clientVersion: body.client_version_response,
      latestBlock: body.latest_block,
      finalizedBlock: body.finalized_block,
      syncing: body.beacon_syncing_response,
      identity: body.beacon_identity_response,
    },
    {
      finalized: consensus.beaconFinalityWorking ? measurements.beaconFinalizedSlot ?? null : null,
      head: consensus.beaconHeadWorking ? measurements.beaconHeadSlot ?? null : null,
    }
  );
}

export function rateLimitBody(verdict: RateLimitVerdict) {
  return {
    status: verdict.status,
    details: verdict.details,
    sample_count: verdict.sampleCount,
    failure_rate: verdict.failureRate,
    average_seconds: verdict.averageSeconds,
  };
}

export function nodeInfoBody(info: NodeInfo) {
  return {
    chain_id: info.chainId,
    client_version: info.clientVersion,
    latest_block: info.latestBlockNumber,
    finalized_block: info.finalizedBlockNumber,
    beacon_finalized_slot: info.beaconFinalizedSlot,
    beacon_head_slot: info.beaconHeadSlot,
    syncing: info.syncing,
    consensus_client: info.consensusClient,
    peer_count: info.peerCount,
  };
}

export function evaluationBody(
  evaluation: NodeEvaluation,
  info: NodeInfo,
  requestId: string,
  computedAt: string
) {
  const { report, breakdown } = evaluation;
  return {
    request_id: requestId,
    computed_at: computedAt,
    scoring_version: SCORING_VERSION,
    score: report.score,
    tier: report.tier,
    verdict: verdictLabel(report.tier),
    critical_failure_reason: report.criticalFailureReason,
    breakdown: {
      l1_latency: { avg_seconds: breakdown.avgL1LatencySeconds, tier: breakdown.l1Latency },
      consensus_latency: {
        avg_seconds: breakdown.avgConsensusLatencySeconds,
        tier: breakdown.consensusLatency,
      },
      block_time: { avg_seconds: breakdown.avgBlockTimeSeconds, tier: breakdown.blockTime },
      block_freshness: { age_seconds: breakdown.blockAgeSeconds, status: breakdown.blockStatus },
      l1_rate_limit: rateLimitBody(breakdown.l1RateLimit),
      consensus_rate_limit: rateLimitBody(breakdown.consensusRateLimit),
      consensus: {
        beacon_finality_working: breakdown.consensus.beaconFinalityWorking,
        beacon_head_working: breakdown.consensus.beaconHeadWorking,
        functional: breakdown.consensus.functional,
      },
    },
    node_info: nodeInfoBody(info),
  };
}

// POST /node/evaluate - Score a node from already-sampled measurements
router.post('/', (req: Request, res: Response, next: NextFunction) => {
  const requestId = uuidv4();
  const computedAt = new Date().toISOString();
  const startTime = Date.now();

  const parsed = evaluateSchema.safeParse(req.body);
  if (!parsed.success) {
    return next(invalidRequest('Invalid evaluation request', formatIssues(parsed.error)));
  }

  try {
    const measurements = toMeasurements(parsed.data);
    const evaluation = evaluateNode(measurements);
    const info = toNodeInfo(parsed.data, measurements, evaluation);

    console.log(JSON.stringify({
      level: 'info',
      event: 'node_evaluated',
      request_id: requestId,
      score: evaluation.report.score,
      tier: evaluation.report.tier,
      critical: evaluation.report.criticalFailureReason,
      elapsed_ms: Date.now() - startTime,
      ts: computedAt,
    }));

    if (req.query.format === 'text') {
      return res.type('text/plain').send(renderReport(evaluation, info));
    }
    res.json(evaluationBody(evaluation, info, requestId, computedAt));
  } catch (err) {
    console.error('[evaluate] Error:', err);
    next(internalError('Failed to evaluate node'));
  }
});

export default router;
