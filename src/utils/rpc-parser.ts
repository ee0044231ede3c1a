import { z } from 'zod';
import { config } from '../config';
import type { BlockObservation, Sample } from '../rules/types';

const HEX_QUANTITY = /^0x[0-9a-fA-F]+$/;

const jsonRpcErrorSchema = z.object({
  code: z.number().int(),
  message: z.string().optional(),
});

const jsonRpcResponseSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: jsonRpcErrorSchema.optional(),
});

const blockSchema = z.object({
  number: z.string(),
  timestamp: z.string(),
});

export type JsonRpcResponse = z.infer<typeof jsonRpcResponseSchema>;

export interface BlockHeader {
  blockNumber: number;
  timestampUnix: number;
}

export interface RawProbe {
  elapsedSeconds: number;
  httpStatus?: number;
  body?: unknown;
}

// Bodies arrive either already decoded or as the raw response text
export function decodeJsonBody(body: unknown): unknown {
  if (typeof body !== 'string') return body;
  try {
    return JSON.parse(body) as unknown;
  } catch {
    return null;
  }
}

export function parseHexQuantity(value: unknown): number | null {
  if (typeof value !== 'string' || !HEX_QUANTITY.test(value)) {
    return null;
  }
  return parseInt(value.slice(2), 16);
}

export function parseJsonRpcResponse(body: unknown): JsonRpcResponse | null {
  const result = jsonRpcResponseSchema.safeParse(decodeJsonBody(body));
  return result.success ? result.data : null;
}

export function jsonRpcErrorCode(body: unknown): number | null {
  return parseJsonRpcResponse(body)?.error?.code ?? null;
}

// eth_chainId
export function decodeChainId(body: unknown): number | null {
  return parseHexQuantity(parseJsonRpcResponse(body)?.result);
}

// web3_clientVersion
export function decodeClientVersion(body: unknown): string | null {
  const result = parseJsonRpcResponse(body)?.result;
  return typeof result === 'string' && result.length > 0 ? result : null;
}

// eth_getBlockByNumber; null result or non-hex fields mean no usable block
export function extractBlockHeader(body: unknown): BlockHeader | null {
  const parsed = blockSchema.safeParse(parseJsonRpcResponse(body)?.result);
  if (!parsed.success) return null;

  const blockNumber = parseHexQuantity(parsed.data.number);
  const timestampUnix = parseHexQuantity(parsed.data.timestamp);
  if (blockNumber === null || timestampUnix === null) return null;

  return { blockNumber, timestampUnix };
}

export function observeBlock(
  header: BlockHeader | null,
  nowUnix: number = Math.floor(Date.now() / 1000)
): BlockObservation {
  if (!header) {
    return { blockNumber: null, timestampUnix: null, ageSeconds: null };
  }
  return {
    blockNumber: header.blockNumber,
    timestampUnix: header.timestampUnix,
    ageSeconds: nowUnix - header.timestampUnix,
  };
}

/**
 * Average seconds per block between the latest block and the one `span`
 * blocks before it. Returns null when the timestamps do not advance.
 */
export function blockCadence(
  latestTimestampUnix: number,
  earlierTimestampUnix: number,
  span: number = config.BLOCK_CADENCE_SPAN
): number | null {
  const diff = latestTimestampUnix - earlierTimestampUnix;
  if (diff <= 0 || span <= 0) return null;
  return diff / span;
}

/**
 * Cadence from a raw latest block and a raw earlier block. The span is the
 * block-number distance between them, so any earlier block works.
 */
export function cadenceFromBlocks(latestBody: unknown, earlierBody: unknown): number | null {
  const latest = extractBlockHeader(latestBody);
  const earlier = extractBlockHeader(earlierBody);
  if (!latest || !earlier) return null;
  return blockCadence(
    latest.timestampUnix,
    earlier.timestampUnix,
    latest.blockNumber - earlier.blockNumber
  );
}

export function toExecutionSample(probe: RawProbe): Sample {
  const code = probe.body === undefined ? null : jsonRpcErrorCode(probe.body);
  return {
    elapsedSeconds: probe.elapsedSeconds,
    httpStatus: probe.httpStatus,
    rpcErrorCode: code ?? undefined,
  };
}
