/**
 * Pipeline execution domain model.
 *
 * One PipelineExecution instantiates a PipelineDefinition against one
 * Artifact. It is created by the trigger, mutated only by the stage
 * executor, and terminal once its status leaves RUNNING/AWAITING_JUDGMENT.
 */

import { Artifact } from './artifact';
import { CanaryProgress, CanaryResult } from './canary';
import { TypedError } from './errors';
import { FinalizerSpec, StageType } from './pipeline';
import { JudgmentDecision } from './judgment';
import { TrafficSnapshot, TrafficWeights } from './server-group';

export enum ExecutionStatus {
  Pending = 'PENDING',
  Running = 'RUNNING',
  AwaitingJudgment = 'AWAITING_JUDGMENT',
  Succeeded = 'SUCCEEDED',
  Failed = 'FAILED',
  Terminated = 'TERMINATED',
  TerminatedNeedsManualIntervention = 'TERMINATED_NEEDS_MANUAL_INTERVENTION',
}

export enum StageStatus {
  Pending = 'PENDING',
  Running = 'RUNNING',
  Succeeded = 'SUCCEEDED',
  Failed = 'FAILED',
  Skipped = 'SKIPPED',
  TimedOut = 'TIMED_OUT',
}

export const VALID_EXECUTION_TRANSITIONS: Record<ExecutionStatus, ExecutionStatus[]> = {
  [ExecutionStatus.Pending]: [
    ExecutionStatus.Running,
    ExecutionStatus.Terminated,
    ExecutionStatus.TerminatedNeedsManualIntervention,
  ],
  [ExecutionStatus.Running]: [
    ExecutionStatus.AwaitingJudgment,
    ExecutionStatus.Succeeded,
    ExecutionStatus.Failed,
    ExecutionStatus.Terminated,
    ExecutionStatus.TerminatedNeedsManualIntervention,
  ],
  [ExecutionStatus.AwaitingJudgment]: [
    ExecutionStatus.Running,
    ExecutionStatus.Terminated,
    ExecutionStatus.TerminatedNeedsManualIntervention,
  ],
  [ExecutionStatus.Succeeded]: [],
  [ExecutionStatus.Failed]: [],
  [ExecutionStatus.Terminated]: [],
  [ExecutionStatus.TerminatedNeedsManualIntervention]: [],
};

export const VALID_STAGE_TRANSITIONS: Record<StageStatus, StageStatus[]> = {
  [StageStatus.Pending]: [StageStatus.Running, StageStatus.Skipped],
  [StageStatus.Running]: [StageStatus.Succeeded, StageStatus.Failed, StageStatus.TimedOut],
  [StageStatus.Succeeded]: [],
  [StageStatus.Failed]: [],
  [StageStatus.Skipped]: [],
  [StageStatus.TimedOut]: [],
};

/** Who started an execution or made a decision. */
export interface Actor {
  kind: 'system' | 'human';
  id: string;
}

/** Stage-specific result payloads. */
export type StageResult =
  | { kind: 'deploy'; serverGroupId: string; endpoint: string }
  | { kind: 'wait'; waitedMs: number }
  | { kind: 'health'; ready: boolean; detail?: string; polls: number }
  | { kind: 'verification'; success: boolean; report: string }
  | { kind: 'canary'; canary: CanaryResult; judgment?: JudgmentDecision }
  | { kind: 'judgment'; decision: JudgmentDecision; decidedBy: string; timedOut: boolean }
  | { kind: 'cutover'; previousActive: string | null; newActive: string; weights: TrafficWeights }
  | { kind: 'cleanup'; serverGroupId: string; destroyed: boolean; error?: string };

/** Persisted suspension state, enough to resume after a restart. */
export interface StageCheckpoint {
  resumeAt?: string;
  canary?: CanaryProgress;
  /** Result held while a MARGINAL canary verdict awaits judgment. */
  pendingCanary?: CanaryResult;
  judgmentId?: string;
  healthStartedAt?: string;
  /** Canary ramp: index of the last step whose weights were applied. */
  rampStep?: number;
}

export interface StageExecution {
  stageId: string;
  type: StageType;
  /** Parallel group this stage belongs to, if any. */
  groupId?: string;
  status: StageStatus;
  attempts: number;
  startedAt?: string;
  completedAt?: string;
  result?: StageResult;
  error?: TypedError;
  checkpoint?: StageCheckpoint;
}

/** A finalizer not yet completed for a terminal execution. */
export interface PendingFinalizer {
  index: number;
  spec: FinalizerSpec;
  attempts: number;
}

export interface TerminationRequest {
  by: string;
  reason?: string;
  at: string;
  rollback: boolean;
}

export interface PipelineExecution {
  id: string;
  service: string;
  artifact: Artifact;
  pipelineVersion: number;
  status: ExecutionStatus;
  /** Index of the current entry in the definition's stage list. */
  cursor: number;
  stages: Record<string, StageExecution>;
  triggeredBy: Actor;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  /** Traffic state recorded at execution start; rollback always restores it. */
  rollbackTarget: TrafficSnapshot;
  /** Set once any Cutover stage has started shifting traffic. */
  cutoverReached: boolean;
  error?: TypedError;
  /** Set by terminate or an operator rollback; `rollback` forces a traffic restore. */
  terminateRequested?: TerminationRequest;
  /** Finalizers still to run (populated on terminal transition). */
  pendingFinalizers: PendingFinalizer[];
  finalized: boolean;
}

export function isTerminalExecutionStatus(status: ExecutionStatus): boolean {
  return (
    status === ExecutionStatus.Succeeded ||
    status === ExecutionStatus.Failed ||
    status === ExecutionStatus.Terminated ||
    status === ExecutionStatus.TerminatedNeedsManualIntervention
  );
}

export function isTerminalStageStatus(status: StageStatus): boolean {
  return status !== StageStatus.Pending && status !== StageStatus.Running;
}
