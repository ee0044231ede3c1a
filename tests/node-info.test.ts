import { describe, it, expect } from 'vitest';
import { collectNodeInfo } from '../src/utils/node-info';

const rpc = (result: unknown) => ({ jsonrpc: '2.0', id: 1, result });

describe('collectNodeInfo', () => {
  it('should decode every raw response', () => {
    const info = collectNodeInfo(
      {
        chainId: rpc('0xaa36a7'),
        clientVersion: rpc('Nethermind/v1.29.1'),
        latestBlock: rpc({ number: '0x10', timestamp: '0x64' }),
        finalizedBlock: '{"jsonrpc":"2.0","id":1,"result":{"number":"0x4","timestamp":"0x10"}}',
        syncing: { data: { head_slot: '164', sync_distance: '0', is_syncing: false } },
        identity: { data: { peer_id: '16Uiu2', client_name: 'teku', peer_count: 48 } },
      },
      { finalized: '100', head: '164' }
    );

    expect(info).toEqual({
      chainId: 11155111,
      clientVersion: 'Nethermind/v1.29.1',
      latestBlockNumber: 16,
      finalizedBlockNumber: 4,
      beaconFinalizedSlot: '100',
      beaconHeadSlot: '164',
      syncing: false,
      consensusClient: 'teku',
      peerCount: 48,
    });
  });

  it('should leave missing responses as null', () => {
    expect(collectNodeInfo({}, { finalized: null, head: null })).toEqual({
      chainId: null,
      clientVersion: null,
      latestBlockNumber: null,
      finalizedBlockNumber: null,
      beaconFinalizedSlot: null,
      beaconHeadSlot: null,
      syncing: null,
      consensusClient: null,
      peerCount: null,
    });
  });
});
