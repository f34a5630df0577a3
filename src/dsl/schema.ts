/**
 * Pipeline definition schema.
 *
 * Field lists and constraints the validator checks raw definitions
 * against. Fields not listed for an object are rejected.
 */

import { StageType } from '../domain/pipeline';

/** Top-level fields of a pipeline definition document. */
export const DEFINITION_FIELDS = [
  'schemaVersion',
  'service',
  'version',
  'description',
  'stages',
  'notifications',
  'finalizers',
  'createdAt',
] as const;

export const REQUIRED_DEFINITION_FIELDS = ['service', 'version', 'stages', 'notifications'] as const;

/** Fields every stage accepts. */
export const COMMON_STAGE_FIELDS = ['id', 'name', 'type', 'onFailure', 'timeoutMs'] as const;

/** Fields specific to each stage type. */
export const STAGE_FIELDS: Record<StageType, readonly string[]> = {
  [StageType.Deploy]: ['environment', 'role', 'replicas', 'retry'],
  [StageType.Wait]: ['durationMs'],
  [StageType.HealthCheck]: ['target', 'intervalMs', 'consecutiveSuccesses'],
  [StageType.VerificationJob]: ['target', 'test'],
  [StageType.CanaryAnalysis]: ['baseline', 'canary', 'analysis', 'onMarginal', 'judgment'],
  [StageType.ManualJudgment]: ['prompt', 'authorizedActors', 'judgmentTimeoutMs'],
  [StageType.Cutover]: ['strategy', 'target', 'baseline', 'steps', 'analysis'],
  [StageType.Cleanup]: ['target', 'gracePeriodMs'],
};

/** Stage types that cannot run inside a parallel group. */
export const SEQUENTIAL_ONLY_STAGE_TYPES: readonly StageType[] = [StageType.ManualJudgment, StageType.Cutover];

/** Stage types whose failure always ends the execution. */
export const ABORT_ONLY_STAGE_TYPES: readonly StageType[] = [StageType.CanaryAnalysis, StageType.Cutover];

export const PARALLEL_GROUP_FIELDS = ['type', 'id', 'stages'] as const;
export const RETRY_FIELDS = ['maxAttempts', 'backoffStrategy', 'backoffBaseMs'] as const;
export const TEST_FIELDS = ['suite', 'args'] as const;
export const JUDGMENT_GATE_FIELDS = ['prompt', 'authorizedActors', 'judgmentTimeoutMs'] as const;
export const ANALYSIS_FIELDS = [
  'metrics',
  'intervalMs',
  'durationMs',
  'passThreshold',
  'marginalThreshold',
  'maxMissingFraction',
] as const;
export const METRIC_FIELDS = ['name', 'query', 'direction', 'weight', 'tolerance', 'maxDeviation', 'required'] as const;
export const NOTIFICATION_FIELDS = ['channel', 'events'] as const;

export const VALID_NOTIFICATION_EVENTS = [
  'execution.succeeded',
  'execution.failed',
  'execution.terminated',
  'execution.needs-manual-intervention',
  'judgment.opened',
] as const;

export const VALID_METRIC_DIRECTIONS = ['lower-is-better', 'higher-is-better'] as const;

/** Validation constraints. */
export const SCHEMA_CONSTRAINTS = {
  /** Maximum number of stages per pipeline, counting parallel members. */
  maxStages: 100,
  /** Service names are DNS-label shaped. */
  servicePattern: /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/,
  stageIdPattern: /^[A-Za-z0-9][A-Za-z0-9_-]*$/,
  /** Maximum stage name length. */
  maxStageNameLength: 256,
  /** Maximum deploy retry attempts. */
  maxAttempts: 10,
} as const;
