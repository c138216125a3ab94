/**
 * Test Setup
 *
 * Runs before each test file. Pins the environment so configuration
 * defaults are deterministic and log output stays quiet.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';

for (const name of [
  'REDIS_URL',
  'REDIS_COMMAND_TIMEOUT_MS',
  'RATE_LIMIT_ENABLED',
  'RATE_LIMIT_DEFAULT_TIER',
  'RATE_LIMIT_TIERS',
  'RATE_LIMIT_KEY_PREFIX',
  'RATE_LIMIT_API_KEY_PREFIX_LENGTH',
  'RATE_LIMIT_TRUST_PROXY',
  'HEALTH_PROBE_INTERVAL_MS',
  'HEALTH_PROBE_TIMEOUT_MS',
  'LOCAL_STORE_SWEEP_INTERVAL_MS',
]) {
  delete process.env[name];
}

afterEach(() => {
  vi.useRealTimers();
});
