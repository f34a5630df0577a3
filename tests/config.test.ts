import { DEFAULT_ENGINE_CONFIG, loadConfigFromEnv, mergeEngineConfig } from '../src/config';
import { EngineError } from '../src/domain/errors';
import { LogLevel } from '../src/logger';

function configErrorOf(env: NodeJS.ProcessEnv): string {
  try {
    loadConfigFromEnv(env);
  } catch (err) {
    if (err instanceof EngineError) return `${err.typedError.code}: ${err.typedError.message}`;
    throw err;
  }
  throw new Error('expected an invalid config');
}

describe('loadConfigFromEnv', () => {
  test('an empty environment yields the defaults', () => {
    expect(loadConfigFromEnv({})).toEqual({
      ...DEFAULT_ENGINE_CONFIG,
      pipelinesDir: undefined,
      webhookUrl: undefined,
      webhookSecret: undefined,
    });
  });

  test('reads every override', () => {
    const config = loadConfigFromEnv({
      PORT: '8080',
      ROLLOUT_POLL_INTERVAL_MS: '15000',
      ROLLOUT_CUTOVER_LOCK_POLICY: 'fail-fast',
      ROLLOUT_DEPLOY_MAX_ATTEMPTS: '5',
      ROLLOUT_DEPLOY_BACKOFF_MS: '0',
      ROLLOUT_NOTIFY_MAX_ATTEMPTS: '2',
      ROLLOUT_NOTIFY_BACKOFF_MS: '250',
      ROLLOUT_URGENT_CHANNEL: '#oncall',
      ROLLOUT_PIPELINES_DIR: './pipelines',
      ROLLOUT_WEBHOOK_URL: 'https://hooks.example.com/deploys',
      ROLLOUT_WEBHOOK_SECRET: 'test-secret',
      LOG_LEVEL: 'DEBUG',
    });
    expect(config).toEqual({
      port: 8080,
      pollIntervalMs: 15_000,
      cutoverLockPolicy: 'fail-fast',
      deployMaxAttempts: 5,
      deployBackoffMs: 0,
      notifyMaxAttempts: 2,
      notifyBackoffMs: 250,
      urgentChannel: '#oncall',
      pipelinesDir: './pipelines',
      webhookUrl: 'https://hooks.example.com/deploys',
      webhookSecret: 'test-secret',
      logLevel: LogLevel.Debug,
    });
  });

  test('empty strings fall back to defaults', () => {
    const config = loadConfigFromEnv({ PORT: '', ROLLOUT_URGENT_CHANNEL: '' });
    expect(config.port).toBe(5000);
    expect(config.urgentChannel).toBe('#deploy-urgent');
  });

  test('rejects invalid values', () => {
    expect(configErrorOf({ ROLLOUT_POLL_INTERVAL_MS: '0' })).toBe(
      'VALIDATION.CONFIG: Invalid value for ROLLOUT_POLL_INTERVAL_MS: "0" (expected an integer >= 1)',
    );
    expect(configErrorOf({ PORT: 'http' })).toBe('VALIDATION.CONFIG: Invalid value for PORT: "http" (expected an integer >= 0)');
    expect(configErrorOf({ ROLLOUT_DEPLOY_MAX_ATTEMPTS: '1.5' })).toBe(
      'VALIDATION.CONFIG: Invalid value for ROLLOUT_DEPLOY_MAX_ATTEMPTS: "1.5" (expected an integer >= 1)',
    );
    expect(configErrorOf({ ROLLOUT_CUTOVER_LOCK_POLICY: 'queue' })).toBe(
      'VALIDATION.CONFIG: Invalid value for ROLLOUT_CUTOVER_LOCK_POLICY: "queue" (expected "wait" or "fail-fast")',
    );
    expect(configErrorOf({ LOG_LEVEL: 'verbose' })).toBe(
      'VALIDATION.CONFIG: Invalid value for LOG_LEVEL: "verbose" (expected debug, info, warn or error)',
    );
  });
});

describe('mergeEngineConfig', () => {
  test('overrides only the given fields', () => {
    const config = mergeEngineConfig({ deployMaxAttempts: 1 });
    expect(config.deployMaxAttempts).toBe(1);
    expect(config.deployBackoffMs).toBe(DEFAULT_ENGINE_CONFIG.deployBackoffMs);
  });

  test('returns a copy of the defaults', () => {
    expect(mergeEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(mergeEngineConfig()).not.toBe(DEFAULT_ENGINE_CONFIG);
  });
});
