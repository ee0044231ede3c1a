import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),

  // Rate limiting of this API
  RATE_LIMIT_RPM: z.coerce.number().default(60),

  // Block cadence
  EXPECTED_BLOCK_TIME_SEC: z.coerce.number().positive().default(12),
  BLOCK_CADENCE_SPAN: z.coerce.number().int().positive().default(10),

  // Block age overrides
  CRITICAL_BLOCK_AGE_SEC: z.coerce.number().default(20),
  STALE_BLOCK_AGE_SEC: z.coerce.number().default(30),

  // Rate-limit heuristics
  RATE_LIMIT_FAILURE_RATE_MAX: z.coerce.number().min(0).max(1).default(0.2),
  RATE_LIMIT_SLOW_AVG_SEC: z.coerce.number().default(3.0),
});

export type Config = z.infer<typeof envSchema>;

function loadConfig(): Config {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join('.')}: ${error.message}`);
    }
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

export const config = loadConfig();

// Stamped on every evaluation
export const SCORING_VERSION = 'node-standard-1.0.0';
