import { config } from '../config';
import { averageOf } from '../utils/stats';
import type { EndpointKind, RateLimitVerdict, Sample, SampleSet } from './types';

const THROTTLE_HTTP_STATUSES = new Set([429, 503, 402, 403]);

// "Too many requests" family returned by execution clients and hosted providers
const THROTTLE_RPC_ERROR_CODES = new Set([-32029, -33000, -33200, -32005]);

// Beacon APIs echo the HTTP status in their JSON error body
const THROTTLE_BEACON_ERROR_CODES = new Set([429, 503]);

// A request that never got a response reports status 000
const NO_STATUS = '000';

function throttleCodes(kind: EndpointKind): Set<number> {
  return kind === 'beacon' ? THROTTLE_BEACON_ERROR_CODES : THROTTLE_RPC_ERROR_CODES;
}

function isFailure(sample: Sample): boolean {
  return sample.httpStatus !== 200;
}

function formatStatus(sample: Sample): string {
  return sample.httpStatus === undefined ? NO_STATUS : String(sample.httpStatus);
}

/**
 * Heuristic rate-limit classification for one endpoint's burst of samples.
 * First match wins: explicit throttling codes, then a high failure rate,
 * then a slow average.
 */
export function detectRateLimit(
  samples: SampleSet,
  kind: EndpointKind = 'execution'
): RateLimitVerdict {
  const sampleCount = samples.length;

  if (sampleCount === 0) {
    return {
      status: 'NONE',
      details: 'No samples collected',
      sampleCount: 0,
      failureRate: 0,
      averageSeconds: 0,
    };
  }

  const averageSeconds = averageOf(samples.map(s => s.elapsedSeconds));
  const failureRate = samples.filter(isFailure).length / sampleCount;
  const stats = { sampleCount, failureRate, averageSeconds };

  const errorCodes = throttleCodes(kind);
  const matchedErrors = samples
    .map(s => s.rpcErrorCode)
    .filter((code): code is number => code !== undefined && errorCodes.has(code));
  const throttledStatus = samples.some(
    s => s.httpStatus !== undefined && THROTTLE_HTTP_STATUSES.has(s.httpStatus)
  );

  if (throttledStatus || matchedErrors.length > 0) {
    const codes = samples.map(formatStatus).join(' ');
    // Beacon bodies echo the HTTP status, so only JSON-RPC codes get their own list
    if (kind === 'beacon') {
      return { status: 'DETECTED', details: `HTTP codes: ${codes}`, ...stats };
    }
    const errors = matchedErrors.length > 0 ? matchedErrors.join(' ') : 'none';
    return {
      status: 'DETECTED',
      details: `HTTP codes: ${codes}, JSON errors: ${errors}`,
      ...stats,
    };
  }

  if (failureRate > config.RATE_LIMIT_FAILURE_RATE_MAX) {
    return {
      status: 'LIKELY',
      details: `High failure rate: ${(failureRate * 100).toFixed(2)}%`,
      ...stats,
    };
  }

  if (averageSeconds > config.RATE_LIMIT_SLOW_AVG_SEC) {
    return {
      status: 'POSSIBLE',
      details: `Slow average response time: ${averageSeconds.toFixed(4)}s`,
      ...stats,
    };
  }

  return {
    status: 'NONE',
    details: 'All tests passed',
    ...stats,
  };
}
