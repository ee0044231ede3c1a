import { z } from 'zod';
import type { Sample } from '../rules/types';
import { decodeJsonBody } from './rpc-parser';
import type { RawProbe } from './rpc-parser';

const numberish = z.union([z.string(), z.number()]);

// /eth/v1/beacon/headers/{head,finalized}
const headerSchema = z.object({
  data: z.object({
    header: z.object({
      message: z.object({
        slot: numberish,
      }),
    }),
  }),
});

// /eth/v1/node/syncing
const syncingSchema = z.object({
  data: z.object({
    is_syncing: z.boolean(),
  }),
});

// /eth/v1/node/identity; client_name and peer_count are non-standard extras
const identitySchema = z.object({
  data: z.object({
    peer_id: z.string().optional(),
    client_name: z.string().optional(),
    peer_count: numberish.optional(),
  }),
});

const beaconErrorSchema = z.object({
  code: z.number().int(),
  message: z.string().optional(),
});

export interface BeaconIdentity {
  peerId: string | null;
  clientName: string | null;
  peerCount: number | null;
}

export function extractBeaconSlot(body: unknown): string | null {
  const parsed = headerSchema.safeParse(decodeJsonBody(body));
  if (!parsed.success) return null;
  return String(parsed.data.data.header.message.slot);
}

export function extractSyncing(body: unknown): boolean | null {
  const parsed = syncingSchema.safeParse(decodeJsonBody(body));
  return parsed.success ? parsed.data.data.is_syncing : null;
}

export function extractIdentity(body: unknown): BeaconIdentity {
  const parsed = identitySchema.safeParse(decodeJsonBody(body));
  if (!parsed.success) {
    return { peerId: null, clientName: null, peerCount: null };
  }

  const { peer_id, client_name, peer_count } = parsed.data.data;
  const peers = peer_count === undefined ? NaN : Number(peer_count);
  return {
    peerId: peer_id ?? null,
    clientName: client_name ?? null,
    peerCount: Number.isFinite(peers) ? peers : null,
  };
}

export function beaconErrorCode(body: unknown): number | null {
  const parsed = beaconErrorSchema.safeParse(decodeJsonBody(body));
  return parsed.success ? parsed.data.code : null;
}

export function toBeaconSample(probe: RawProbe): Sample {
  const code = probe.body === undefined ? null : beaconErrorCode(probe.body);
  return {
    elapsedSeconds: probe.elapsedSeconds,
    httpStatus: probe.httpStatus,
    rpcErrorCode: code ?? undefined,
  };
}
