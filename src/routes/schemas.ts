import { z } from 'zod';
import { toBeaconSample } from '../utils/beacon-parser';
import { toExecutionSample } from '../utils/rpc-parser';
import type { EndpointKind, Sample } from '../rules/types';
import type { ZodError } from 'zod';

export const probeSchema = z.object({
  elapsed_seconds: z.number().min(0),
  http_status: z.number().int().nullable().optional(),
  rpc_error_code: z.number().int().nullable().optional(),
  // Raw response body; the error code is read from it when rpc_error_code is absent
  body: z.unknown().optional(),
});

export type ProbeInput = z.infer<typeof probeSchema>;

export const endpointKindSchema = z.enum(['execution', 'beacon']);

export function toSample(probe: ProbeInput, kind: EndpointKind): Sample {
  const httpStatus = probe.http_status ?? undefined;

  if (probe.rpc_error_code !== undefined && probe.rpc_error_code !== null) {
    return {
      elapsedSeconds: probe.elapsed_seconds,
      httpStatus,
      rpcErrorCode: probe.rpc_error_code,
    };
  }

  const raw = { elapsedSeconds: probe.elapsed_seconds, httpStatus, body: probe.body };
  return kind === 'beacon' ? toBeaconSample(raw) : toExecutionSample(raw);
}

export function formatIssues(error: ZodError): string[] {
  return error.errors.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
}
