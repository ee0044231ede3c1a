import { describe, it, expect } from 'vitest';

// Config is validated at import time; with no overrides every default applies
describe('Config', () => {
  it('should load config with defaults when no env is set', async () => {
    const { config, SCORING_VERSION } = await import('../src/config');

    expect(config).toBeDefined();
    expect(config.PORT).toBe(3000);
    expect(config.RATE_LIMIT_RPM).toBe(60);
    expect(config.EXPECTED_BLOCK_TIME_SEC).toBe(12);
    expect(config.BLOCK_CADENCE_SPAN).toBe(10);
    expect(config.CRITICAL_BLOCK_AGE_SEC).toBe(20);
    expect(config.STALE_BLOCK_AGE_SEC).toBe(30);
    expect(config.RATE_LIMIT_FAILURE_RATE_MAX).toBe(0.2);
    expect(config.RATE_LIMIT_SLOW_AVG_SEC).toBe(3.0);

    expect(SCORING_VERSION).toBe('node-standard-1.0.0');
  });
});
