/**
 * Engine configuration.
 *
 * Defaults suit a single-process deployment; every field can be overridden
 * programmatically (mergeEngineConfig) or from the environment
 * (loadConfigFromEnv). Invalid values are rejected at load time.
 */

import { EngineError, createTypedError } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';

/** How a second cutover for the same service behaves while one is in flight. */
export type CutoverLockPolicy = 'wait' | 'fail-fast';

export interface EngineConfig {
  port: number;
  /** Interval between artifact registry polls. */
  pollIntervalMs: number;
  cutoverLockPolicy: CutoverLockPolicy;
  /** Default retry policy for Deploy stages that declare none. */
  deployMaxAttempts: number;
  deployBackoffMs: number;
  /** Delivery attempts per notification before it is left for recovery. */
  notifyMaxAttempts: number;
  notifyBackoffMs: number;
  /** Channel that always receives urgent, non-suppressible alerts. */
  urgentChannel: string;
  /** Directory of pipeline definition JSON files loaded once at startup. */
  pipelinesDir?: string;
  webhookUrl?: string;
  webhookSecret?: string;
  logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
  port: 5000,
  pollIntervalMs: 60_000,
  cutoverLockPolicy: 'wait',
  deployMaxAttempts: 3,
  deployBackoffMs: 2_000,
  notifyMaxAttempts: 3,
  notifyBackoffMs: 500,
  urgentChannel: '#deploy-urgent',
  logLevel: LogLevel.Info,
};

/** Merge a partial config with the defaults. */
export function mergeEngineConfig(override?: Partial<EngineConfig>): EngineConfig {
  if (!override) return { ...DEFAULT_ENGINE_CONFIG };
  return { ...DEFAULT_ENGINE_CONFIG, ...override };
}

function configError(key: string, value: string, expected: string): EngineError {
  return new EngineError(
    createTypedError({
      code: 'VALIDATION.CONFIG',
      message: `Invalid value for ${key}: "${value}" (expected ${expected})`,
      retryable: false,
      details: { key, value },
    }),
  );
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw configError(key, raw, `an integer >= ${min}`);
  }
  return value;
}

/** Build a config from environment variables, falling back to defaults. */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const lockPolicy = env.ROLLOUT_CUTOVER_LOCK_POLICY ?? DEFAULT_ENGINE_CONFIG.cutoverLockPolicy;
  if (lockPolicy !== 'wait' && lockPolicy !== 'fail-fast') {
    throw configError('ROLLOUT_CUTOVER_LOCK_POLICY', lockPolicy, '"wait" or "fail-fast"');
  }

  let logLevel = DEFAULT_ENGINE_CONFIG.logLevel;
  if (env.LOG_LEVEL) {
    const parsed = parseLogLevel(env.LOG_LEVEL);
    if (!parsed) throw configError('LOG_LEVEL', env.LOG_LEVEL, 'debug, info, warn or error');
    logLevel = parsed;
  }

  return {
    port: readInt(env, 'PORT', DEFAULT_ENGINE_CONFIG.port, 0),
    pollIntervalMs: readInt(env, 'ROLLOUT_POLL_INTERVAL_MS', DEFAULT_ENGINE_CONFIG.pollIntervalMs, 1),
    cutoverLockPolicy: lockPolicy,
    deployMaxAttempts: readInt(env, 'ROLLOUT_DEPLOY_MAX_ATTEMPTS', DEFAULT_ENGINE_CONFIG.deployMaxAttempts, 1),
    deployBackoffMs: readInt(env, 'ROLLOUT_DEPLOY_BACKOFF_MS', DEFAULT_ENGINE_CONFIG.deployBackoffMs, 0),
    notifyMaxAttempts: readInt(env, 'ROLLOUT_NOTIFY_MAX_ATTEMPTS', DEFAULT_ENGINE_CONFIG.notifyMaxAttempts, 1),
    notifyBackoffMs: readInt(env, 'ROLLOUT_NOTIFY_BACKOFF_MS', DEFAULT_ENGINE_CONFIG.notifyBackoffMs, 0),
    urgentChannel: env.ROLLOUT_URGENT_CHANNEL || DEFAULT_ENGINE_CONFIG.urgentChannel,
    pipelinesDir: env.ROLLOUT_PIPELINES_DIR || undefined,
    webhookUrl: env.ROLLOUT_WEBHOOK_URL || undefined,
    webhookSecret: env.ROLLOUT_WEBHOOK_SECRET || undefined,
    logLevel,
  };
}
