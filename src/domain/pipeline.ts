/**
 * Pipeline definition domain model.
 *
 * A PipelineDefinition is the validated, strongly-typed list of stages a
 * service's rollouts go through. Definitions are loaded once per service
 * and versioned independently of artifacts.
 */

import { CanaryConfig } from './canary';
import { ServerGroupRole } from './server-group';

export enum StageType {
  Deploy = 'deploy',
  Wait = 'wait',
  HealthCheck = 'health-check',
  VerificationJob = 'verification-job',
  CanaryAnalysis = 'canary-analysis',
  ManualJudgment = 'manual-judgment',
  Cutover = 'cutover',
  Cleanup = 'cleanup',
}

/** What happens to the execution when a stage fails. */
export type OnFailurePolicy = 'ABORT' | 'CONTINUE';

/**
 * Reference to a server group: either the group created by an earlier
 * Deploy stage, or whichever group currently holds a role.
 */
export type ServerGroupRef = { fromStage: string } | { role: ServerGroupRole };

/** Retry policy for stages that touch the infrastructure controller. */
export interface RetryPolicy {
  maxAttempts: number;
  backoffStrategy: 'fixed' | 'exponential';
  backoffBaseMs: number;
}

interface StageSpecBase {
  id: string;
  name?: string;
  onFailure: OnFailurePolicy;
  /** Deadline for suspending stages; exceeding it is TIMED_OUT. */
  timeoutMs?: number;
}

export interface DeployStageSpec extends StageSpecBase {
  type: StageType.Deploy;
  environment: string;
  role: ServerGroupRole.Active | ServerGroupRole.Candidate | ServerGroupRole.Canary;
  replicas?: number;
  retry?: RetryPolicy;
}

export interface WaitStageSpec extends StageSpecBase {
  type: StageType.Wait;
  durationMs: number;
}

export interface HealthCheckStageSpec extends StageSpecBase {
  type: StageType.HealthCheck;
  target: ServerGroupRef;
  intervalMs: number;
  /** Readiness predicate: ready must be reported this many polls in a row. */
  consecutiveSuccesses?: number;
}

export interface VerificationTestSpec {
  suite: string;
  args?: Record<string, string>;
}

export interface VerificationJobStageSpec extends StageSpecBase {
  type: StageType.VerificationJob;
  target: ServerGroupRef;
  test: VerificationTestSpec;
}

/** Judgment gate configuration shared by ManualJudgment and MARGINAL fallbacks. */
export interface JudgmentGateSpec {
  prompt: string;
  authorizedActors: string[];
  judgmentTimeoutMs?: number;
}

export interface CanaryAnalysisStageSpec extends StageSpecBase {
  type: StageType.CanaryAnalysis;
  baseline: ServerGroupRef;
  canary: ServerGroupRef;
  analysis: CanaryConfig;
  /** MARGINAL verdict handling: fail outright, or open a judgment gate. */
  onMarginal: 'fail' | 'judgment';
  judgment?: JudgmentGateSpec;
}

export interface ManualJudgmentStageSpec extends StageSpecBase, JudgmentGateSpec {
  type: StageType.ManualJudgment;
}

export interface BlueGreenCutoverSpec extends StageSpecBase {
  type: StageType.Cutover;
  strategy: 'blue-green';
  target: ServerGroupRef;
}

export interface CanaryRampCutoverSpec extends StageSpecBase {
  type: StageType.Cutover;
  strategy: 'canary-ramp';
  target: ServerGroupRef;
  baseline: ServerGroupRef;
  /** Ascending traffic percentages, ending at 100. */
  steps: number[];
  analysis: CanaryConfig;
}

export type CutoverStageSpec = BlueGreenCutoverSpec | CanaryRampCutoverSpec;

export interface CleanupStageSpec extends StageSpecBase {
  type: StageType.Cleanup;
  target: ServerGroupRef;
  gracePeriodMs: number;
}

export type StageSpec =
  | DeployStageSpec
  | WaitStageSpec
  | HealthCheckStageSpec
  | VerificationJobStageSpec
  | CanaryAnalysisStageSpec
  | ManualJudgmentStageSpec
  | CutoverStageSpec
  | CleanupStageSpec;

/** Stages with no ordering dependency, joined before the next entry. */
export interface ParallelGroupSpec {
  type: 'parallel';
  id: string;
  stages: StageSpec[];
}

export type PipelineEntry = StageSpec | ParallelGroupSpec;

/** Terminal and gate events a definition can subscribe notifications to. */
export type NotificationEvent =
  | 'execution.succeeded'
  | 'execution.failed'
  | 'execution.terminated'
  | 'execution.needs-manual-intervention'
  | 'judgment.opened';

export interface NotificationSettings {
  channel: string;
  /** Events to notify on. Omitted means all of them. */
  events?: NotificationEvent[];
}

/** Work guaranteed to run on every terminal transition. */
export type FinalizerSpec =
  | { type: 'notify'; channel: string }
  | { type: 'cleanup'; target: ServerGroupRef };

export interface PipelineDefinition {
  service: string;
  /** Monotonically increasing per service. */
  version: number;
  description?: string;
  stages: PipelineEntry[];
  notifications: NotificationSettings;
  finalizers: FinalizerSpec[];
  createdAt: string;
}

export function isParallelGroup(entry: PipelineEntry): entry is ParallelGroupSpec {
  return entry.type === 'parallel';
}

/** Flatten entries into their stage specs, in definition order. */
export function flattenStages(entries: PipelineEntry[]): StageSpec[] {
  const stages: StageSpec[] = [];
  for (const entry of entries) {
    if (isParallelGroup(entry)) {
      stages.push(...entry.stages);
    } else {
      stages.push(entry);
    }
  }
  return stages;
}
