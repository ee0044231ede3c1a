import { extractIdentity, extractSyncing } from './beacon-parser';
import { decodeChainId, decodeClientVersion, extractBlockHeader } from './rpc-parser';

// Raw responses as the sampler received them; any may be missing
export interface NodeResponses {
  chainId?: unknown;
  clientVersion?: unknown;
  latestBlock?: unknown;
  finalizedBlock?: unknown;
  syncing?: unknown;
  identity?: unknown;
}

// Descriptive facts about the node; none of them affect the score
export interface NodeInfo {
  chainId: number | null;
  clientVersion: string | null;
  latestBlockNumber: number | null;
  finalizedBlockNumber: number | null;
  beaconFinalizedSlot: string | null;
  beaconHeadSlot: string | null;
  syncing: boolean | null;
  consensusClient: string | null;
  peerCount: number | null;
}

export function collectNodeInfo(
  responses: NodeResponses,
  slots: { finalized: string | null; head: string | null }
): NodeInfo {
  const identity = extractIdentity(responses.identity);
  return {
    chainId: decodeChainId(responses.chainId),
    clientVersion: decodeClientVersion(responses.clientVersion),
    latestBlockNumber: extractBlockHeader(responses.latestBlock)?.blockNumber ?? null,
    finalizedBlockNumber: extractBlockHeader(responses.finalizedBlock)?.blockNumber ?? null,
    beaconFinalizedSlot: slots.finalized,
    beaconHeadSlot: slots.head,
    syncing: extractSyncing(responses.syncing),
    consensusClient: identity.clientName,
    peerCount: identity.peerCount,
  };
}
