import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { detectRateLimit } from '../rules/index';
import { invalidRequest } from '../utils/errors';
import { rateLimitBody } from './evaluate';
import { endpointKindSchema, formatIssues, probeSchema, toSample } from './schemas';

const router = Router();

const detectSchema = z.object({
  kind: endpointKindSchema.default('execution'),
  samples: z.array(probeSchema),
});

// POST /rate-limit/detect - Classify one endpoint's burst of samples
router.post('/detect', (req: Request, res: Response, next: NextFunction) => {
  const parsed = detectSchema.safeParse(req.body);
  if (!parsed.success) {
    return next(invalidRequest('Invalid rate-limit request', formatIssues(parsed.error)));
  }

  const { kind, samples } = parsed.data;
  const verdict = detectRateLimit(samples.map(s => toSample(s, kind)), kind);
  res.json({ kind, ...rateLimitBody(verdict) });
});

export default router;
