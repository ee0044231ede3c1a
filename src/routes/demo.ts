import { Router } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { evaluateNode } from '../rules/index';
import type { NodeMeasurements, Sample } from '../rules/index';
import type { NodeInfo } from '../utils/node-info';
import { evaluationBody } from './evaluate';

const router = Router();

const healthyBurst: Sample[] = Array.from({ length: 10 }, () => ({
  elapsedSeconds: 0.012,
  httpStatus: 200,
}));

// A healthy node with a slightly slow consensus client
export const SAMPLE_MEASUREMENTS: NodeMeasurements = {
  l1RateSamples: healthyBurst,
  consensusRateSamples: healthyBurst,
  l1LatencySeconds: [0.009, 0.011, 0.010, 0.010, 0.010],
  consensusLatencySeconds: [0.040, 0.040, 0.040, 0.040, 0.040],
  blockTimesSeconds: [11, 11, 11, 11, 11],
  blockAgeSeconds: 10,
  beaconFinalizedSlot: '9000000',
  beaconHeadSlot: '9000064',
};

export const SAMPLE_NODE_INFO: NodeInfo = {
  chainId: 1,
  clientVersion: 'Geth/v1.14.12-stable/linux-amd64/go1.23.4',
  latestBlockNumber: 21500000,
  finalizedBlockNumber: 21499936,
  beaconFinalizedSlot: '9000000',
  beaconHeadSlot: '9000064',
  syncing: false,
  consensusClient: 'lighthouse',
  peerCount: 64,
};

// GET /demo/sample - Free endpoint returning an example evaluation
router.get('/sample', (_req, res) => {
  const evaluation = evaluateNode(SAMPLE_MEASUREMENTS);
  res.json(evaluationBody(evaluation, SAMPLE_NODE_INFO, uuidv4(), new Date().toISOString()));
});

export default router;
