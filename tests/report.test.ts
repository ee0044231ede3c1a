import { describe, it, expect } from 'vitest';
import { evaluateNode } from '../src/rules/index';
import type { NodeMeasurements, Sample } from '../src/rules/index';
import type { NodeInfo } from '../src/utils/node-info';
import { renderReport, verdictLabel } from '../src/utils/report';

const healthy: Sample[] = Array.from({ length: 5 }, () => ({ elapsedSeconds: 0.015, httpStatus: 200 }));

const measurements: NodeMeasurements = {
  l1RateSamples: healthy,
  consensusRateSamples: healthy,
  l1LatencySeconds: [0.010],
  consensusLatencySeconds: [0.040],
  blockTimesSeconds: [11],
  blockAgeSeconds: 10,
  beaconFinalizedSlot: '100',
  beaconHeadSlot: '164',
};

describe('Flat report', () => {
  it('should label every verdict tier', () => {
    expect(verdictLabel('BEST')).toBe('BEST FOR NODE');
    expect(verdictLabel('GOOD')).toBe('GOOD FOR NODE');
    expect(verdictLabel('ACCEPTABLE')).toBe('ACCEPTABLE FOR NODE');
    expect(verdictLabel('WORST')).toBe('NOT SUITABLE FOR NODE');
  });

  it('should render a healthy evaluation', () => {
    expect(renderReport(evaluateNode(measurements))).toBe(
      [
        'Overall Score: 89/100',
        'Verdict: GOOD FOR NODE',
        'Breakdown:',
        '  - L1 RPC Performance: Excellent (10.0ms)',
        '  - Consensus RPC Performance: Good (40.0ms)',
        '  - Block Production: Good (11.00 sec/block)',
        '  - L1 Rate Limiting: NONE (All tests passed)',
        '  - Consensus Rate Limiting: NONE (All tests passed)',
        '  - Block Freshness: FRESH (age 10s)',
        '',
      ].join('\n')
    );
  });

  it('should flag a consensus failure on the latency lines', () => {
    const lines = renderReport(evaluateNode({ ...measurements, beaconHeadSlot: null })).split('\n');

    expect(lines[0]).toBe('Overall Score: 0/100');
    expect(lines[1]).toBe('Verdict: NOT SUITABLE FOR NODE');
    expect(lines[2]).toBe('Critical Failure: consensus layer failed');
    expect(lines[4]).toBe('  - L1 RPC Performance: Excellent (10.0ms) (CONSENSUS FAILED)');
    expect(lines[5]).toBe('  - Consensus RPC Performance: FAILED - No Beacon Data');
    expect(lines[9]).toBe('  - Block Freshness: CONSENSUS_FAILED (age 10s)');
  });

  it('should report a node without blocks as stale', () => {
    const lines = renderReport(
      evaluateNode({ ...measurements, blockAgeSeconds: null, blockTimesSeconds: [] })
    ).split('\n');

    expect(lines[2]).toBe('Critical Failure: block production exceeded 20s');
    expect(lines[4]).toBe('  - L1 RPC Performance: Stale Block - Not Producing');
    expect(lines[6]).toBe('  - Block Production: Unable to assess');
    expect(lines[9]).toBe('  - Block Freshness: STALE (age unknown)');
  });

  it('should spell out very slow latency', () => {
    const lines = renderReport(evaluateNode({ ...measurements, l1LatencySeconds: [0.6] })).split('\n');

    expect(lines[3]).toBe('  - L1 RPC Performance: Very Slow (600.0ms)');
  });

  it('should append node metadata sections after the breakdown', () => {
    const info: NodeInfo = {
      chainId: 1,
      clientVersion: 'Geth/v1.14.12',
      latestBlockNumber: 500,
      finalizedBlockNumber: null,
      beaconFinalizedSlot: '100',
      beaconHeadSlot: null,
      syncing: true,
      consensusClient: null,
      peerCount: 12,
    };
    const lines = renderReport(evaluateNode(measurements), info).split('\n');

    expect(lines.slice(9)).toEqual([
      'Basic Metrics:',
      '  - Chain ID: 1',
      '  - Client: Geth/v1.14.12',
      '  - Latest Block: 500',
      '  - Finalized Block: unknown',
      'Consensus Metrics:',
      '  - Beacon Finalized Slot: 100',
      '  - Beacon Head Slot: No Beacon Head',
      '  - Consensus Sync: Syncing',
      '  - Consensus Client: unknown | Peers: 12',
      '',
    ]);
  });

  it('should say when the chain id is unknown', () => {
    const info: NodeInfo = {
      chainId: null,
      clientVersion: null,
      latestBlockNumber: null,
      finalizedBlockNumber: null,
      beaconFinalizedSlot: null,
      beaconHeadSlot: null,
      syncing: false,
      consensusClient: 'lighthouse',
      peerCount: null,
    };
    const lines = renderReport(evaluateNode(measurements), info).split('\n');

    expect(lines[10]).toBe('  - Chain ID: Unable to determine');
    expect(lines[15]).toBe('  - Beacon Finalized Slot: No Beacon Finality');
    expect(lines[17]).toBe('  - Consensus Sync: Synced');
    expect(lines[18]).toBe('  - Consensus Client: lighthouse | Peers: unknown');
  });
});
