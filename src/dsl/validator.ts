/**
 * Pipeline definition validator.
 *
 * Turns an untrusted JSON document into a typed PipelineDefinition, or a
 * list of typed errors. Unknown fields are rejected at every level, stage
 * IDs must be unique, server group references must point at an earlier
 * Deploy stage, and stage types that suspend or move traffic may not run
 * inside a parallel group.
 */

import { CanaryConfig, CanaryMetricSpec } from '../domain/canary';
import { SuggestedFix, TypedError, createTypedError } from '../domain/errors';
import {
  CanaryAnalysisStageSpec,
  CleanupStageSpec,
  CutoverStageSpec,
  DeployStageSpec,
  FinalizerSpec,
  HealthCheckStageSpec,
  JudgmentGateSpec,
  ManualJudgmentStageSpec,
  NotificationSettings,
  ParallelGroupSpec,
  PipelineDefinition,
  PipelineEntry,
  RetryPolicy,
  ServerGroupRef,
  StageSpec,
  StageType,
  VerificationJobStageSpec,
  VerificationTestSpec,
  WaitStageSpec,
  flattenStages,
  isParallelGroup,
} from '../domain/pipeline';
import { ServerGroupRole } from '../domain/server-group';
import {
  ABORT_ONLY_STAGE_TYPES,
  ANALYSIS_FIELDS,
  COMMON_STAGE_FIELDS,
  DEFINITION_FIELDS,
  JUDGMENT_GATE_FIELDS,
  METRIC_FIELDS,
  NOTIFICATION_FIELDS,
  PARALLEL_GROUP_FIELDS,
  REQUIRED_DEFINITION_FIELDS,
  RETRY_FIELDS,
  SCHEMA_CONSTRAINTS,
  SEQUENTIAL_ONLY_STAGE_TYPES,
  STAGE_FIELDS,
  TEST_FIELDS,
  VALID_METRIC_DIRECTIONS,
  VALID_NOTIFICATION_EVENTS,
} from './schema';
import { CURRENT_SCHEMA_VERSION, isSupportedVersion } from './version';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  /** Present only when valid. */
  definition?: PipelineDefinition;
}

export interface ValidateOptions {
  /** createdAt for definitions that carry none. */
  now?: string;
}

type RawObject = Record<string, unknown>;

const STAGE_TYPES: readonly StageType[] = Object.values(StageType);
const DEPLOY_ROLES = [ServerGroupRole.Active, ServerGroupRole.Candidate, ServerGroupRole.Canary] as const;
const REF_ROLES: readonly ServerGroupRole[] = Object.values(ServerGroupRole);
const FAILURE_POLICIES = ['ABORT', 'CONTINUE'] as const;
const BACKOFF_STRATEGIES = ['fixed', 'exponential'] as const;
const MARGINAL_POLICIES = ['fail', 'judgment'] as const;
const CUTOVER_STRATEGIES = ['blue-green', 'canary-ramp'] as const;
const FINALIZER_TYPES = ['notify', 'cleanup'] as const;

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface NumberRule {
  required?: boolean;
  integer?: boolean;
  min?: number;
  max?: number;
  /** Value must be strictly greater than min. */
  exclusiveMin?: boolean;
}

/** Reads typed fields out of raw objects, collecting errors as it goes. */
class FieldReader {
  readonly errors: TypedError[] = [];

  fail(code: string, path: string, message: string, stageId?: string, fixes?: SuggestedFix[]): void {
    this.errors.push(
      createTypedError({
        code: `VALIDATION.${code}`,
        message: `${path}: ${message}`,
        stageId,
        retryable: false,
        details: { path },
        suggestedFixes: fixes,
      }),
    );
  }

  object(value: unknown, path: string): RawObject | undefined {
    if (!isRecord(value)) {
      this.fail('INVALID_TYPE', path, 'must be an object');
      return undefined;
    }
    return value;
  }

  /** Reject any key not in the allowed list. */
  knownFields(obj: RawObject, allowed: readonly string[], path: string, stageId?: string): void {
    for (const key of Object.keys(obj)) {
      if (!allowed.includes(key)) {
        this.fail('UNKNOWN_FIELD', `${path}.${key}`, 'is not a recognized field', stageId, [
          { type: 'REMOVE_FIELD', params: { field: key, allowed: [...allowed] } },
        ]);
      }
    }
  }

  private missing(obj: RawObject, key: string, path: string, required: boolean | undefined): boolean {
    if (obj[key] !== undefined) return false;
    if (required) {
      this.fail('REQUIRED_FIELD', `${path}.${key}`, 'is required', undefined, [
        { type: 'ADD_FIELD', params: { field: key } },
      ]);
    }
    return true;
  }

  string(obj: RawObject, key: string, path: string, required?: boolean): string | undefined {
    if (this.missing(obj, key, path, required)) return undefined;
    const value = obj[key];
    if (typeof value !== 'string' || value.trim() === '') {
      this.fail('INVALID_TYPE', `${path}.${key}`, 'must be a non-empty string');
      return undefined;
    }
    return value;
  }

  number(obj: RawObject, key: string, path: string, rule: NumberRule = {}): number | undefined {
    if (this.missing(obj, key, path, rule.required)) return undefined;
    const value = obj[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.fail('INVALID_TYPE', `${path}.${key}`, 'must be a number');
      return undefined;
    }
    if (rule.integer && !Number.isInteger(value)) {
      this.fail('INVALID_VALUE', `${path}.${key}`, 'must be an integer');
      return undefined;
    }
    if (rule.min !== undefined && (rule.exclusiveMin ? value <= rule.min : value < rule.min)) {
      this.fail('INVALID_VALUE', `${path}.${key}`, `must be ${rule.exclusiveMin ? 'greater than' : 'at least'} ${rule.min}`);
      return undefined;
    }
    if (rule.max !== undefined && value > rule.max) {
      this.fail('INVALID_VALUE', `${path}.${key}`, `must be at most ${rule.max}`);
      return undefined;
    }
    return value;
  }

  boolean(obj: RawObject, key: string, path: string): boolean | undefined {
    if (this.missing(obj, key, path, false)) return undefined;
    const value = obj[key];
    if (typeof value !== 'boolean') {
      this.fail('INVALID_TYPE', `${path}.${key}`, 'must be a boolean');
      return undefined;
    }
    return value;
  }

  oneOf<T extends string>(
    obj: RawObject,
    key: string,
    values: readonly T[],
    path: string,
    required?: boolean,
  ): T | undefined {
    if (this.missing(obj, key, path, required)) return undefined;
    const raw = obj[key];
    const found = values.find((v) => v === raw);
    if (found === undefined) {
      this.fail('INVALID_VALUE', `${path}.${key}`, `must be one of: ${values.join(', ')}`, undefined, [
        { type: 'SET_VALUE', params: { field: key, validValues: [...values] } },
      ]);
    }
    return found;
  }

  stringArray(obj: RawObject, key: string, path: string, required?: boolean): string[] | undefined {
    if (this.missing(obj, key, path, required)) return undefined;
    const raw = obj[key];
    if (!Array.isArray(raw) || raw.length === 0) {
      this.fail('INVALID_TYPE', `${path}.${key}`, 'must be a non-empty array of strings');
      return undefined;
    }
    const values: string[] = [];
    for (const item of raw) {
      if (typeof item !== 'string' || item.trim() === '') {
        this.fail('INVALID_TYPE', `${path}.${key}`, 'must contain only non-empty strings');
        return undefined;
      }
      values.push(item);
    }
    return values;
  }

  array(obj: RawObject, key: string, path: string, required?: boolean): unknown[] | undefined {
    if (this.missing(obj, key, path, required)) return undefined;
    const raw = obj[key];
    if (!Array.isArray(raw)) {
      this.fail('INVALID_TYPE', `${path}.${key}`, 'must be an array');
      return undefined;
    }
    return raw;
  }
}

/** Validate a raw pipeline definition document. */
export function validatePipelineDefinition(raw: unknown, options: ValidateOptions = {}): ValidationResult {
  const reader = new FieldReader();
  const doc = reader.object(raw, '$');
  if (!doc) return { valid: false, errors: reader.errors };

  for (const field of REQUIRED_DEFINITION_FIELDS) {
    if (doc[field] === undefined) {
      reader.fail('REQUIRED_FIELD', `$.${field}`, 'is required', undefined, [{ type: 'ADD_FIELD', params: { field } }]);
    }
  }
  reader.knownFields(doc, DEFINITION_FIELDS, '$');

  const schemaVersion = reader.string(doc, 'schemaVersion', '$');
  if (schemaVersion !== undefined && !isSupportedVersion(schemaVersion)) {
    reader.fail('UNSUPPORTED_VERSION', '$.schemaVersion', `unsupported schema version "${schemaVersion}"`, undefined, [
      { type: 'USE_VERSION', params: { schemaVersion: CURRENT_SCHEMA_VERSION } },
    ]);
  }

  const service = reader.string(doc, 'service', '$');
  if (service !== undefined && !SCHEMA_CONSTRAINTS.servicePattern.test(service)) {
    reader.fail('INVALID_VALUE', '$.service', 'must be lowercase letters, digits and dashes, at most 63 characters');
  }
  const version = reader.number(doc, 'version', '$', { integer: true, min: 1 });
  const description = doc.description === undefined ? undefined : reader.string(doc, 'description', '$');
  const createdAt = reader.string(doc, 'createdAt', '$') ?? options.now ?? new Date().toISOString();

  const rawStages = reader.array(doc, 'stages', '$');
  const stages: PipelineEntry[] = [];
  if (rawStages) {
    if (rawStages.length === 0) reader.fail('EMPTY_STAGES', '$.stages', 'must contain at least one stage');
    rawStages.forEach((entry, i) => {
      const parsed = parseEntry(entry, `$.stages[${i}]`, reader);
      if (parsed) stages.push(parsed);
    });
  }

  const notifications = doc.notifications === undefined ? undefined : parseNotifications(doc.notifications, reader);

  const finalizers: FinalizerSpec[] = [];
  const rawFinalizers = reader.array(doc, 'finalizers', '$');
  rawFinalizers?.forEach((entry, i) => {
    const parsed = parseFinalizer(entry, `$.finalizers[${i}]`, reader);
    if (parsed) finalizers.push(parsed);
  });

  if (reader.errors.length === 0) {
    checkStructure(stages, finalizers, reader);
  }

  if (reader.errors.length > 0 || service === undefined || version === undefined || !notifications) {
    return { valid: false, errors: reader.errors };
  }

  const definition: PipelineDefinition = { service, version, stages, notifications, finalizers, createdAt };
  if (description !== undefined) definition.description = description;
  return { valid: true, errors: [], definition };
}

function parseEntry(raw: unknown, path: string, reader: FieldReader): PipelineEntry | undefined {
  const obj = reader.object(raw, path);
  if (!obj) return undefined;
  if (obj.type !== 'parallel') return parseStage(obj, path, reader);

  reader.knownFields(obj, PARALLEL_GROUP_FIELDS, path);
  const id = reader.string(obj, 'id', path, true);
  const members = reader.array(obj, 'stages', path, true);
  if (id === undefined || !members) return undefined;
  if (members.length === 0) {
    reader.fail('EMPTY_STAGES', `${path}.stages`, 'a parallel group needs at least one stage');
    return undefined;
  }

  const stages: StageSpec[] = [];
  members.forEach((member, i) => {
    const memberPath = `${path}.stages[${i}]`;
    if (isRecord(member) && member.type === 'parallel') {
      reader.fail('NESTED_PARALLEL', memberPath, 'parallel groups cannot be nested', id);
      return;
    }
    const stage = parseStage(member, memberPath, reader);
    if (stage) stages.push(stage);
  });
  const group: ParallelGroupSpec = { type: 'parallel', id, stages };
  return group;
}

function parseStage(raw: unknown, path: string, reader: FieldReader): StageSpec | undefined {
  const obj = reader.object(raw, path);
  if (!obj) return undefined;

  const id = reader.string(obj, 'id', path, true);
  const type = reader.oneOf(obj, 'type', STAGE_TYPES, path, true);
  if (id === undefined || type === undefined) return undefined;
  if (!SCHEMA_CONSTRAINTS.stageIdPattern.test(id)) {
    reader.fail('INVALID_VALUE', `${path}.id`, 'must be letters, digits, dashes and underscores', id);
  }
  reader.knownFields(obj, [...COMMON_STAGE_FIELDS, ...STAGE_FIELDS[type]], path, id);

  const name = reader.string(obj, 'name', path);
  if (name !== undefined && name.length > SCHEMA_CONSTRAINTS.maxStageNameLength) {
    reader.fail('NAME_TOO_LONG', `${path}.name`, `exceeds ${SCHEMA_CONSTRAINTS.maxStageNameLength} characters`, id);
  }
  const base = {
    id,
    ...(name !== undefined ? { name } : {}),
    onFailure: reader.oneOf(obj, 'onFailure', FAILURE_POLICIES, path) ?? 'ABORT',
    ...optional('timeoutMs', reader.number(obj, 'timeoutMs', path, { integer: true, min: 1 })),
  };

  switch (type) {
    case StageType.Deploy: {
      const environment = reader.string(obj, 'environment', path, true);
      const role = reader.oneOf(obj, 'role', DEPLOY_ROLES, path, true);
      const replicas = reader.number(obj, 'replicas', path, { integer: true, min: 1 });
      const retry = obj.retry === undefined ? undefined : parseRetry(obj.retry, `${path}.retry`, reader);
      if (environment === undefined || role === undefined) return undefined;
      const stage: DeployStageSpec = {
        ...base,
        type,
        environment,
        role,
        ...optional('replicas', replicas),
        ...optional('retry', retry),
      };
      return stage;
    }
    case StageType.Wait: {
      const durationMs = reader.number(obj, 'durationMs', path, { required: true, integer: true, min: 0 });
      if (durationMs === undefined) return undefined;
      const stage: WaitStageSpec = { ...base, type, durationMs };
      return stage;
    }
    case StageType.HealthCheck: {
      const target = parseRef(obj, 'target', path, reader, id);
      const intervalMs = reader.number(obj, 'intervalMs', path, { required: true, integer: true, min: 1 });
      const consecutiveSuccesses = reader.number(obj, 'consecutiveSuccesses', path, { integer: true, min: 1 });
      if (!target || intervalMs === undefined) return undefined;
      const stage: HealthCheckStageSpec = {
        ...base,
        type,
        target,
        intervalMs,
        ...optional('consecutiveSuccesses', consecutiveSuccesses),
      };
      return stage;
    }
    case StageType.VerificationJob: {
      const target = parseRef(obj, 'target', path, reader, id);
      const test = obj.test === undefined ? requiredMissing(reader, path, 'test') : parseTest(obj.test, `${path}.test`, reader);
      if (!target || !test) return undefined;
      const stage: VerificationJobStageSpec = { ...base, type, target, test };
      return stage;
    }
    case StageType.CanaryAnalysis: {
      const baseline = parseRef(obj, 'baseline', path, reader, id);
      const canary = parseRef(obj, 'canary', path, reader, id);
      const analysis =
        obj.analysis === undefined ? requiredMissing(reader, path, 'analysis') : parseAnalysis(obj.analysis, `${path}.analysis`, reader);
      const onMarginal = reader.oneOf(obj, 'onMarginal', MARGINAL_POLICIES, path) ?? 'fail';
      const judgment = obj.judgment === undefined ? undefined : parseGate(obj.judgment, `${path}.judgment`, reader);
      if (onMarginal === 'judgment' && obj.judgment === undefined) {
        reader.fail('REQUIRED_FIELD', `${path}.judgment`, 'is required when onMarginal is "judgment"', id);
      }
      if (!baseline || !canary || !analysis) return undefined;
      const stage: CanaryAnalysisStageSpec = {
        ...base,
        type,
        baseline,
        canary,
        analysis,
        onMarginal,
        ...optional('judgment', judgment),
      };
      return stage;
    }
    case StageType.ManualJudgment: {
      const gate = parseGateFields(obj, path, reader);
      if (!gate) return undefined;
      const stage: ManualJudgmentStageSpec = { ...base, type, ...gate };
      return stage;
    }
    case StageType.Cutover:
      return parseCutover(obj, path, reader, base);
    case StageType.Cleanup: {
      const target = parseRef(obj, 'target', path, reader, id);
      const gracePeriodMs = reader.number(obj, 'gracePeriodMs', path, { integer: true, min: 0 }) ?? 0;
      if (!target) return undefined;
      const stage: CleanupStageSpec = { ...base, type, target, gracePeriodMs };
      return stage;
    }
  }
}

type StageBase = Pick<StageSpec, 'id' | 'name' | 'onFailure' | 'timeoutMs'>;

function parseCutover(obj: RawObject, path: string, reader: FieldReader, base: StageBase): CutoverStageSpec | undefined {
  const strategy = reader.oneOf(obj, 'strategy', CUTOVER_STRATEGIES, path, true);
  const target = parseRef(obj, 'target', path, reader, base.id);
  if (strategy === undefined || !target) return undefined;

  if (strategy === 'blue-green') {
    for (const field of ['baseline', 'steps', 'analysis']) {
      if (obj[field] !== undefined) {
        reader.fail('UNKNOWN_FIELD', `${path}.${field}`, 'only applies to the canary-ramp strategy', base.id);
      }
    }
    return { ...base, type: StageType.Cutover, strategy, target };
  }

  const baseline = parseRef(obj, 'baseline', path, reader, base.id);
  const analysis =
    obj.analysis === undefined ? requiredMissing(reader, path, 'analysis') : parseAnalysis(obj.analysis, `${path}.analysis`, reader);
  const rawSteps = reader.array(obj, 'steps', path, true);
  const steps: number[] = [];
  if (rawSteps) {
    for (const step of rawSteps) {
      if (typeof step !== 'number' || !Number.isInteger(step) || step <= 0 || step > 100) {
        reader.fail('INVALID_VALUE', `${path}.steps`, 'must contain integer percentages in (0, 100]', base.id);
        return undefined;
      }
      if (steps.length > 0 && step <= steps[steps.length - 1]) {
        reader.fail('INVALID_VALUE', `${path}.steps`, 'must be strictly ascending', base.id);
        return undefined;
      }
      steps.push(step);
    }
    if (steps[steps.length - 1] !== 100) {
      reader.fail('INVALID_VALUE', `${path}.steps`, 'must end at 100', base.id, [
        { type: 'APPEND_STEP', params: { weight: 100 } },
      ]);
    }
  }
  if (!baseline || !analysis || !rawSteps) return undefined;
  return { ...base, type: StageType.Cutover, strategy, target, baseline, steps, analysis };
}

function parseRef(
  obj: RawObject,
  key: string,
  path: string,
  reader: FieldReader,
  stageId: string,
): ServerGroupRef | undefined {
  const raw = obj[key];
  const refPath = `${path}.${key}`;
  if (raw === undefined) {
    reader.fail('REQUIRED_FIELD', refPath, 'is required', stageId);
    return undefined;
  }
  const ref = reader.object(raw, refPath);
  if (!ref) return undefined;
  const keys = Object.keys(ref);
  if (keys.length !== 1 || (keys[0] !== 'fromStage' && keys[0] !== 'role')) {
    reader.fail('INVALID_REFERENCE', refPath, 'must be exactly one of { "fromStage": id } or { "role": role }', stageId);
    return undefined;
  }
  if (keys[0] === 'fromStage') {
    const fromStage = reader.string(ref, 'fromStage', refPath, true);
    return fromStage === undefined ? undefined : { fromStage };
  }
  const role = reader.oneOf(ref, 'role', REF_ROLES, refPath, true);
  return role === undefined ? undefined : { role };
}

function parseRetry(raw: unknown, path: string, reader: FieldReader): RetryPolicy | undefined {
  const obj = reader.object(raw, path);
  if (!obj) return undefined;
  reader.knownFields(obj, RETRY_FIELDS, path);
  const maxAttempts = reader.number(obj, 'maxAttempts', path, {
    required: true,
    integer: true,
    min: 1,
    max: SCHEMA_CONSTRAINTS.maxAttempts,
  });
  const backoffStrategy = reader.oneOf(obj, 'backoffStrategy', BACKOFF_STRATEGIES, path) ?? 'exponential';
  const backoffBaseMs = reader.number(obj, 'backoffBaseMs', path, { integer: true, min: 0 }) ?? 1000;
  if (maxAttempts === undefined) return undefined;
  return { maxAttempts, backoffStrategy, backoffBaseMs };
}

function parseTest(raw: unknown, path: string, reader: FieldReader): VerificationTestSpec | undefined {
  const obj = reader.object(raw, path);
  if (!obj) return undefined;
  reader.knownFields(obj, TEST_FIELDS, path);
  const suite = reader.string(obj, 'suite', path, true);
  let args: Record<string, string> | undefined;
  if (obj.args !== undefined) {
    const rawArgs = reader.object(obj.args, `${path}.args`);
    if (rawArgs) {
      args = {};
      for (const [key, value] of Object.entries(rawArgs)) {
        if (typeof value !== 'string') {
          reader.fail('INVALID_TYPE', `${path}.args.${key}`, 'must be a string');
        } else {
          args[key] = value;
        }
      }
    }
  }
  if (suite === undefined) return undefined;
  return { suite, ...optional('args', args) };
}

function parseGate(raw: unknown, path: string, reader: FieldReader): JudgmentGateSpec | undefined {
  const obj = reader.object(raw, path);
  if (!obj) return undefined;
  reader.knownFields(obj, JUDGMENT_GATE_FIELDS, path);
  return parseGateFields(obj, path, reader);
}

function parseGateFields(obj: RawObject, path: string, reader: FieldReader): JudgmentGateSpec | undefined {
  const prompt = reader.string(obj, 'prompt', path, true);
  const authorizedActors = reader.stringArray(obj, 'authorizedActors', path, true);
  const judgmentTimeoutMs = reader.number(obj, 'judgmentTimeoutMs', path, { integer: true, min: 1 });
  if (prompt === undefined || !authorizedActors) return undefined;
  return { prompt, authorizedActors, ...optional('judgmentTimeoutMs', judgmentTimeoutMs) };
}

function parseAnalysis(raw: unknown, path: string, reader: FieldReader): CanaryConfig | undefined {
  const obj = reader.object(raw, path);
  if (!obj) return undefined;
  reader.knownFields(obj, ANALYSIS_FIELDS, path);

  const intervalMs = reader.number(obj, 'intervalMs', path, { required: true, integer: true, min: 1 });
  const durationMs = reader.number(obj, 'durationMs', path, { required: true, integer: true, min: 1 });
  const passThreshold = reader.number(obj, 'passThreshold', path, { required: true, min: 0, max: 100 });
  const marginalThreshold = reader.number(obj, 'marginalThreshold', path, { required: true, min: 0, max: 100 });
  const maxMissingFraction = reader.number(obj, 'maxMissingFraction', path, { min: 0, max: 1 });

  if (intervalMs !== undefined && durationMs !== undefined && durationMs < intervalMs) {
    reader.fail('INVALID_VALUE', `${path}.durationMs`, 'must be at least one interval');
  }
  if (passThreshold !== undefined && marginalThreshold !== undefined && marginalThreshold > passThreshold) {
    reader.fail('INVALID_VALUE', `${path}.marginalThreshold`, 'must not exceed passThreshold');
  }

  const rawMetrics = reader.array(obj, 'metrics', path, true);
  const metrics: CanaryMetricSpec[] = [];
  if (rawMetrics) {
    if (rawMetrics.length === 0) reader.fail('INVALID_VALUE', `${path}.metrics`, 'must name at least one metric');
    const names = new Set<string>();
    rawMetrics.forEach((entry, i) => {
      const metric = parseMetric(entry, `${path}.metrics[${i}]`, reader);
      if (!metric) return;
      if (names.has(metric.name)) {
        reader.fail('DUPLICATE_METRIC', `${path}.metrics[${i}].name`, `duplicate metric "${metric.name}"`);
      }
      names.add(metric.name);
      metrics.push(metric);
    });
  }

  if (
    intervalMs === undefined ||
    durationMs === undefined ||
    passThreshold === undefined ||
    marginalThreshold === undefined ||
    !rawMetrics
  ) {
    return undefined;
  }
  return {
    metrics,
    intervalMs,
    durationMs,
    passThreshold,
    marginalThreshold,
    ...optional('maxMissingFraction', maxMissingFraction),
  };
}

function parseMetric(raw: unknown, path: string, reader: FieldReader): CanaryMetricSpec | undefined {
  const obj = reader.object(raw, path);
  if (!obj) return undefined;
  reader.knownFields(obj, METRIC_FIELDS, path);
  const name = reader.string(obj, 'name', path, true);
  const query = reader.string(obj, 'query', path, true);
  const direction = reader.oneOf(obj, 'direction', VALID_METRIC_DIRECTIONS, path, true);
  const weight = reader.number(obj, 'weight', path, { min: 0, exclusiveMin: true }) ?? 1;
  const tolerance = reader.number(obj, 'tolerance', path, { min: 0 });
  const maxDeviation = reader.number(obj, 'maxDeviation', path, { min: 0, exclusiveMin: true });
  const required = reader.boolean(obj, 'required', path);
  if (tolerance !== undefined && maxDeviation !== undefined && maxDeviation <= tolerance) {
    reader.fail('INVALID_VALUE', `${path}.maxDeviation`, 'must be greater than tolerance');
  }
  if (name === undefined || query === undefined || direction === undefined) return undefined;
  return {
    name,
    query,
    direction,
    weight,
    ...optional('tolerance', tolerance),
    ...optional('maxDeviation', maxDeviation),
    ...optional('required', required),
  };
}

function parseNotifications(raw: unknown, reader: FieldReader): NotificationSettings | undefined {
  const path = '$.notifications';
  const obj = reader.object(raw, path);
  if (!obj) return undefined;
  reader.knownFields(obj, NOTIFICATION_FIELDS, path);
  const channel = reader.string(obj, 'channel', path, true);
  const rawEvents = reader.array(obj, 'events', path);
  let events: NotificationSettings['events'];
  if (rawEvents) {
    events = [];
    for (const event of rawEvents) {
      const found = VALID_NOTIFICATION_EVENTS.find((e) => e === event);
      if (!found) {
        reader.fail('INVALID_VALUE', `${path}.events`, `unknown event ${JSON.stringify(event)}`, undefined, [
          { type: 'SET_VALUE', params: { validValues: [...VALID_NOTIFICATION_EVENTS] } },
        ]);
      } else {
        events.push(found);
      }
    }
  }
  if (channel === undefined) return undefined;
  return { channel, ...optional('events', events) };
}

function parseFinalizer(raw: unknown, path: string, reader: FieldReader): FinalizerSpec | undefined {
  const obj = reader.object(raw, path);
  if (!obj) return undefined;
  const type = reader.oneOf(obj, 'type', FINALIZER_TYPES, path, true);
  if (type === 'notify') {
    reader.knownFields(obj, ['type', 'channel'], path);
    const channel = reader.string(obj, 'channel', path, true);
    return channel === undefined ? undefined : { type, channel };
  }
  if (type === 'cleanup') {
    reader.knownFields(obj, ['type', 'target'], path);
    const target = parseRef(obj, 'target', path, reader, 'finalizer');
    return target ? { type, target } : undefined;
  }
  return undefined;
}

/** Cross-stage rules: unique IDs, references, parallel membership, failure policies. */
function checkStructure(entries: PipelineEntry[], finalizers: FinalizerSpec[], reader: FieldReader): void {
  const all = flattenStages(entries);
  if (all.length > SCHEMA_CONSTRAINTS.maxStages) {
    reader.fail('TOO_MANY_STAGES', '$.stages', `exceeds maximum of ${SCHEMA_CONSTRAINTS.maxStages} stages`);
  }

  const seen = new Set<string>();
  const claim = (id: string) => {
    if (seen.has(id)) reader.fail('DUPLICATE_STAGE_ID', '$.stages', `duplicate stage ID "${id}"`, id);
    seen.add(id);
  };

  /** Deploy stages completed before the current entry starts. */
  const deployedBefore = new Set<string>();
  const allDeploys = new Set(all.filter((s) => s.type === StageType.Deploy).map((s) => s.id));

  for (const entry of entries) {
    const members = isParallelGroup(entry) ? entry.stages : [entry];
    if (isParallelGroup(entry)) claim(entry.id);

    for (const stage of members) {
      claim(stage.id);
      if (isParallelGroup(entry) && SEQUENTIAL_ONLY_STAGE_TYPES.includes(stage.type)) {
        reader.fail('PARALLEL_STAGE_TYPE', `$.stages.${entry.id}`, `a ${stage.type} stage cannot run in a parallel group`, stage.id);
      }
      if (stage.onFailure === 'CONTINUE' && ABORT_ONLY_STAGE_TYPES.includes(stage.type)) {
        reader.fail('INVALID_POLICY', `$.stages.${stage.id}.onFailure`, `a ${stage.type} stage must use ABORT`, stage.id);
      }
      for (const ref of stageRefs(stage)) {
        if ('fromStage' in ref && !deployedBefore.has(ref.fromStage)) {
          reader.fail(
            'INVALID_REFERENCE',
            `$.stages.${stage.id}`,
            `"${ref.fromStage}" is not a Deploy stage that completes before this stage`,
            stage.id,
          );
        }
      }
    }
    for (const stage of members) {
      if (stage.type === StageType.Deploy) deployedBefore.add(stage.id);
    }
  }

  finalizers.forEach((finalizer, i) => {
    if (finalizer.type === 'cleanup' && 'fromStage' in finalizer.target && !allDeploys.has(finalizer.target.fromStage)) {
      reader.fail('INVALID_REFERENCE', `$.finalizers[${i}].target`, `"${finalizer.target.fromStage}" is not a Deploy stage`);
    }
  });
}

function stageRefs(stage: StageSpec): ServerGroupRef[] {
  switch (stage.type) {
    case StageType.HealthCheck:
    case StageType.VerificationJob:
    case StageType.Cleanup:
      return [stage.target];
    case StageType.CanaryAnalysis:
      return [stage.baseline, stage.canary];
    case StageType.Cutover:
      return stage.strategy === 'canary-ramp' ? [stage.target, stage.baseline] : [stage.target];
    default:
      return [];
  }
}

function requiredMissing(reader: FieldReader, path: string, key: string): undefined {
  reader.fail('REQUIRED_FIELD', `${path}.${key}`, 'is required');
  return undefined;
}

/** Spread helper that omits a key whose value is undefined. */
function optional<K extends string, V>(key: K, value: V | undefined): { [P in K]?: V } {
  const out: { [P in K]?: V } = {};
  if (value !== undefined) out[key] = value;
  return out;
}
