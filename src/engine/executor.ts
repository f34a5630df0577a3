/**
 * Pipeline Executor — the stage-sequencing state machine.
 *
 * Instantiates a pipeline definition against an artifact, walks its
 * entries in order (joining parallel groups before advancing), suspends on
 * judgment gates, and drives the execution to exactly one terminal status.
 * Every status change is appended to the audit ledger before it is
 * persisted. All state needed to resume lives in the store, so a new
 * executor over the same store picks up where a crashed one stopped.
 */

import { v4 as uuid } from 'uuid';
import { AuditLedger } from '../audit/audit-ledger';
import { AbortError, Clock, isoNow, systemClock } from '../clock';
import { CutoverContext, CutoverController } from '../cutover/cutover-controller';
import { Artifact } from '../domain/artifact';
import { EngineError, TypedError, createTypedError, notFoundError, toTypedError } from '../domain/errors';
import {
  Actor,
  ExecutionStatus,
  PendingFinalizer,
  PipelineExecution,
  StageExecution,
  StageResult,
  StageStatus,
  TerminationRequest,
  isTerminalExecutionStatus,
  isTerminalStageStatus,
} from '../domain/execution';
import { JudgmentDecision, JudgmentRequest, JudgmentState } from '../domain/judgment';
import {
  NotificationEvent,
  ParallelGroupSpec,
  PipelineDefinition,
  RetryPolicy,
  StageSpec,
  StageType,
  isParallelGroup,
} from '../domain/pipeline';
import { Logger, logger as rootLogger } from '../logger';
import { Notifier } from '../notifications/notifier';
import { Store } from '../storage/store';
import { JudgmentService } from './judgment-service';
import { StageContext, StageHandlers } from './stage-handlers';
import { StageRunner } from './stage-runner';
import { transitionExecutionStatus, transitionStageStatus } from './state-machine';

export interface ExecutorConfig {
  /** Retry policy for Deploy stages that declare none. */
  deployRetry: RetryPolicy;
}

export interface PipelineExecutorDeps {
  store: Store;
  ledger: AuditLedger;
  cutover: CutoverController;
  handlers: StageHandlers;
  judgments: JudgmentService;
  notifier: Notifier;
  clock?: Clock;
}

export interface InstantiateResult {
  execution: PipelineExecution;
  /** False when an execution already existed for this artifact. */
  created: boolean;
}

type EntryOutcome =
  | { kind: 'advance' }
  | { kind: 'suspended'; judgment: JudgmentRequest }
  | { kind: 'failed'; error: TypedError; stageType: StageType | null };

/** Failure codes that end the execution regardless of a stage's CONTINUE policy. */
const ESCALATING_DOMAINS = ['CANARY.', 'CUTOVER.', 'ROLLBACK.', 'JUDGMENT.'];

function escalates(error: TypedError): boolean {
  return ESCALATING_DOMAINS.some((prefix) => error.code.startsWith(prefix));
}

/**
 * The controller raises CUTOVER.* and CANARY.* only after its own rollback
 * or canary collapse, or before any weight moved.
 */
function restoredByController(error: TypedError, stageType: StageType | null): boolean {
  if (stageType !== StageType.Cutover) return false;
  return error.code.startsWith('CUTOVER.') || error.code.startsWith('CANARY.');
}

const TERMINAL_EVENTS: Record<string, NotificationEvent> = {
  [ExecutionStatus.Succeeded]: 'execution.succeeded',
  [ExecutionStatus.Failed]: 'execution.failed',
  [ExecutionStatus.Terminated]: 'execution.terminated',
  [ExecutionStatus.TerminatedNeedsManualIntervention]: 'execution.needs-manual-intervention',
};

/** Index of the implicit finalizer that sends the terminal notification. */
const TERMINAL_NOTICE = -1;

export class PipelineExecutor {
  private clock: Clock;
  private log: Logger;
  private runner: StageRunner;
  /** Executions being driven by this process. */
  private active = new Map<string, { controller: AbortController; done: Promise<PipelineExecution> }>();
  /** In-flight instantiations keyed by service and artifact. */
  private instantiating = new Map<string, Promise<InstantiateResult>>();
  private terminations = new Map<string, TerminationRequest>();
  private saves = new Map<string, Promise<unknown>>();

  constructor(
    private deps: PipelineExecutorDeps,
    config: ExecutorConfig,
    log: Logger = rootLogger,
  ) {
    this.clock = deps.clock ?? systemClock;
    this.log = log.child({ component: 'executor' });
    this.runner = new StageRunner(deps.handlers, { clock: this.clock, defaultRetry: config.deployRetry });
  }

  /**
   * Create an execution for an artifact, or return the one that already
   * exists for it. Records the traffic snapshot rollback will restore.
   */
  instantiate(service: string, artifact: Artifact, triggeredBy: Actor): Promise<InstantiateResult> {
    const key = `${service}\u0000${artifact.id}`;
    const inFlight = this.instantiating.get(key);
    if (inFlight) {
      return inFlight.then((result) => ({ execution: result.execution, created: false }));
    }
    const pending = this.instantiateOnce(service, artifact, triggeredBy).finally(() => {
      this.instantiating.delete(key);
    });
    this.instantiating.set(key, pending);
    return pending;
  }

  private async instantiateOnce(service: string, artifact: Artifact, triggeredBy: Actor): Promise<InstantiateResult> {
    const existingId = await this.deps.ledger.findExecutionFor(service, artifact.id);
    if (existingId) {
      const existing = await this.deps.store.executions.getById(existingId);
      if (existing) return { execution: existing, created: false };
    }

    const definition = await this.deps.store.pipelines.getLatest(service);
    if (!definition) {
      throw new EngineError(notFoundError('Pipeline definition', service));
    }

    const rollbackTarget = await this.deps.cutover.captureSnapshot(service);
    const now = isoNow(this.clock);
    const stages: Record<string, StageExecution> = {};
    for (const entry of definition.stages) {
      const members = isParallelGroup(entry) ? entry.stages : [entry];
      for (const spec of members) {
        stages[spec.id] = {
          stageId: spec.id,
          type: spec.type,
          groupId: isParallelGroup(entry) ? entry.id : undefined,
          status: StageStatus.Pending,
          attempts: 0,
        };
      }
    }

    const execution: PipelineExecution = {
      id: `exe_${uuid()}`,
      service,
      artifact: { ...artifact },
      pipelineVersion: definition.version,
      status: ExecutionStatus.Pending,
      cursor: 0,
      stages,
      triggeredBy,
      createdAt: now,
      updatedAt: now,
      rollbackTarget,
      cutoverReached: false,
      pendingFinalizers: [],
      finalized: false,
    };

    await this.deps.ledger.append({
      executionId: execution.id,
      service,
      event: 'execution.created',
      actor: triggeredBy.id,
      payload: {
        artifactId: artifact.id,
        pipelineVersion: definition.version,
        triggeredBy,
        rollbackTarget,
      },
    });
    const created = await this.deps.store.executions.create(execution);
    this.log.info('Execution created', { executionId: created.id, service, artifactId: artifact.id });
    return { execution: created, created: true };
  }

  /**
   * Drive an execution until it suspends or reaches a terminal status.
   * A second call while it is being driven returns the same promise.
   */
  run(executionId: string): Promise<PipelineExecution> {
    const existing = this.active.get(executionId);
    if (existing) return existing.done;

    const controller = new AbortController();
    const done = this.drive(executionId, controller.signal).finally(() => {
      this.active.delete(executionId);
    });
    this.active.set(executionId, { controller, done });
    return done;
  }

  /** Start driving an execution in the background. */
  launch(executionId: string): void {
    this.run(executionId).catch((err) => {
      this.log.error('Execution driver failed', {
        executionId,
        error: err instanceof Error ? err.message : String(err),
      });
    });
  }

  /** Resolve once this process stops driving the execution. */
  async whenSettled(executionId: string): Promise<PipelineExecution> {
    const active = this.active.get(executionId);
    if (active) return active.done;
    return this.load(executionId);
  }

  isActive(executionId: string): boolean {
    return this.active.has(executionId);
  }

  async getExecution(executionId: string): Promise<PipelineExecution> {
    return this.load(executionId);
  }

  /** Record a judgment decision and resume the execution. */
  async decide(executionId: string, actor: string, decision: JudgmentDecision): Promise<JudgmentRequest> {
    const judgment = await this.deps.judgments.decide(executionId, actor, decision);
    this.launch(executionId);
    return judgment;
  }

  /** Reject every expired judgment gate and resume the executions it held. */
  async expireJudgments(): Promise<JudgmentRequest[]> {
    const expired = await this.deps.judgments.expire();
    for (const judgment of expired) {
      this.log.warn('Judgment timed out', { executionId: judgment.executionId, judgmentId: judgment.id });
      this.launch(judgment.executionId);
    }
    return expired;
  }

  /**
   * Cancel an execution. In-flight stages are aborted; if traffic has
   * already shifted, the execution-start state is restored.
   */
  terminate(executionId: string, actor: string, reason?: string): Promise<PipelineExecution> {
    return this.requestTermination(executionId, actor, reason, false);
  }

  /**
   * Restore the execution-start traffic state on operator request. A live
   * execution is terminated on the way; a finished one only has its
   * traffic restored.
   */
  async requestRollback(executionId: string, actor: string, reason?: string): Promise<PipelineExecution> {
    const execution = await this.load(executionId);
    if (!isTerminalExecutionStatus(execution.status)) {
      return this.requestTermination(executionId, actor, reason, true);
    }

    await this.deps.ledger.append({
      executionId,
      service: execution.service,
      event: 'execution.rollback-requested',
      actor,
      payload: { reason },
    });
    try {
      await this.deps.cutover.rollback(execution.service, this.cutoverContext(execution, actor));
    } catch (err) {
      const failure = toTypedError(err, 'ROLLBACK.FAILED');
      const definition = await this.definitionFor(execution);
      await this.deps.notifier.notify(definition.notifications, 'execution.needs-manual-intervention', execution, {
        text: `Operator rollback failed: ${failure.message}`,
        urgent: true,
      });
      throw err;
    }
    return execution;
  }

  /**
   * Resume every non-terminal execution found in the store, and finish
   * finalizers a crash interrupted. Executions still waiting on a pending
   * judgment stay suspended.
   */
  async recover(): Promise<string[]> {
    const resumed: string[] = [];
    const live = await this.deps.store.executions.listByStatus([
      ExecutionStatus.Pending,
      ExecutionStatus.Running,
      ExecutionStatus.AwaitingJudgment,
    ]);
    for (const execution of live) {
      if (this.active.has(execution.id)) continue;
      if (execution.status === ExecutionStatus.AwaitingJudgment && !execution.terminateRequested) {
        const judgments = await this.deps.store.judgments.findByExecution(execution.id);
        if (judgments.some((j) => j.state === JudgmentState.Pending)) continue;
      }
      resumed.push(execution.id);
      this.launch(execution.id);
    }

    const finished = await this.deps.store.executions.listByStatus([
      ExecutionStatus.Succeeded,
      ExecutionStatus.Failed,
      ExecutionStatus.Terminated,
      ExecutionStatus.TerminatedNeedsManualIntervention,
    ]);
    for (const execution of finished) {
      if (execution.finalized || this.active.has(execution.id)) continue;
      resumed.push(execution.id);
      this.launch(execution.id);
    }

    this.log.info('Recovery complete', { resumed: resumed.length });
    return resumed;
  }

  // --- Driver ---

  private async drive(executionId: string, signal: AbortSignal): Promise<PipelineExecution> {
    const execution = await this.load(executionId);
    const definition = await this.definitionFor(execution);

    if (isTerminalExecutionStatus(execution.status)) {
      if (!execution.finalized) await this.runFinalizers(execution, definition);
      return execution;
    }
    if (execution.terminateRequested) {
      return this.terminateNow(execution, definition);
    }

    if (execution.status === ExecutionStatus.Pending) {
      await this.deps.ledger.append({
        executionId,
        service: execution.service,
        event: 'execution.started',
        actor: 'system',
        payload: { pipelineVersion: execution.pipelineVersion },
      });
      execution.startedAt = isoNow(this.clock);
      await this.transitionExecution(execution, ExecutionStatus.Running);
    } else if (execution.status === ExecutionStatus.AwaitingJudgment) {
      await this.transitionExecution(execution, ExecutionStatus.Running);
    }

    try {
      while (execution.cursor < definition.stages.length) {
        if (signal.aborted) throw new AbortError();
        const entry = definition.stages[execution.cursor];
        const outcome = isParallelGroup(entry)
          ? await this.runGroup(execution, entry, signal)
          : await this.runStage(execution, entry, signal);

        if (outcome.kind === 'suspended') {
          await this.transitionExecution(execution, ExecutionStatus.AwaitingJudgment, 'system', {
            judgmentId: outcome.judgment.id,
            stageId: outcome.judgment.stageId,
          });
          await this.deps.notifier.notify(definition.notifications, 'judgment.opened', execution, {
            text: outcome.judgment.prompt,
          });
          return execution;
        }
        if (outcome.kind === 'failed') {
          return this.fail(execution, definition, outcome.error, outcome.stageType);
        }
        execution.cursor++;
        await this.save(execution);
      }
      if (signal.aborted) throw new AbortError();
      return this.finish(execution, definition, ExecutionStatus.Succeeded);
    } catch (err) {
      if (signal.aborted || err instanceof AbortError) {
        const request = this.terminations.get(executionId);
        this.terminations.delete(executionId);
        execution.terminateRequested = request ?? {
          by: 'system',
          at: isoNow(this.clock),
          rollback: false,
        };
        return this.terminateNow(execution, definition);
      }
      const error = toTypedError(err, 'SYSTEM.INTERNAL');
      this.log.error('Execution failed unexpectedly', { executionId, code: error.code, error: error.message });
      return this.fail(execution, definition, error, null);
    }
  }

  private async runGroup(
    execution: PipelineExecution,
    group: ParallelGroupSpec,
    signal: AbortSignal,
  ): Promise<EntryOutcome> {
    const outcomes = await Promise.all(group.stages.map((spec) => this.runStage(execution, spec, signal)));
    const failed = outcomes.find((o) => o.kind === 'failed');
    if (failed) return failed;
    const suspended = outcomes.find((o) => o.kind === 'suspended');
    return suspended ?? { kind: 'advance' };
  }

  private async runStage(execution: PipelineExecution, spec: StageSpec, signal: AbortSignal): Promise<EntryOutcome> {
    const record = execution.stages[spec.id];
    if (isTerminalStageStatus(record.status)) {
      return this.afterStage(record, spec);
    }

    if (record.status === StageStatus.Pending) {
      record.startedAt = isoNow(this.clock);
      await this.transitionStage(execution, record, StageStatus.Running);
    }

    const ctx = this.stageContext(execution, record, signal);
    const startedAt = record.startedAt ? Date.parse(record.startedAt) : this.clock.now();
    const result = await this.runner.run(spec, ctx, startedAt, Math.max(0, record.attempts - 1));
    record.attempts = result.attempts;

    if (result.suspended) {
      await this.save(execution);
      return { kind: 'suspended', judgment: result.suspended };
    }
    if (result.status === StageStatus.Succeeded) {
      record.result = result.result;
      record.error = undefined;
      await this.transitionStage(execution, record, StageStatus.Succeeded);
      return { kind: 'advance' };
    }

    record.error = result.error;
    await this.transitionStage(execution, record, result.status, {
      code: result.error?.code,
      message: result.error?.message,
    });
    return this.afterStage(record, spec);
  }

  private afterStage(record: StageExecution, spec: StageSpec): EntryOutcome {
    if (record.status === StageStatus.Succeeded || record.status === StageStatus.Skipped) {
      return { kind: 'advance' };
    }
    const error =
      record.error ??
      createTypedError({ code: 'STAGE.FAILED', message: `Stage ${spec.id} failed`, stageId: spec.id });
    if (spec.onFailure === 'CONTINUE' && !escalates(error)) {
      this.log.warn('Stage failed, continuing', { stageId: spec.id, code: error.code });
      return { kind: 'advance' };
    }
    return { kind: 'failed', error, stageType: spec.type };
  }

  private stageContext(execution: PipelineExecution, record: StageExecution, signal: AbortSignal): StageContext {
    const stageResults: Record<string, StageResult> = {};
    for (const stage of Object.values(execution.stages)) {
      if (stage.status === StageStatus.Succeeded && stage.result) stageResults[stage.stageId] = stage.result;
    }
    return {
      executionId: execution.id,
      service: execution.service,
      artifact: execution.artifact,
      rollbackTarget: execution.rollbackTarget,
      stageResults: Object.freeze(stageResults),
      checkpoint: record.checkpoint,
      signal,
      log: this.log.child({ executionId: execution.id, stageId: record.stageId }),
      saveCheckpoint: async (checkpoint) => {
        record.checkpoint = checkpoint;
        await this.save(execution);
      },
      markCutoverReached: async () => {
        if (execution.cutoverReached) return;
        execution.cutoverReached = true;
        await this.save(execution);
      },
      record: async (event, payload) => {
        await this.deps.ledger.append({
          executionId: execution.id,
          service: execution.service,
          stageId: record.stageId,
          event,
          actor: 'system',
          payload,
        });
      },
    };
  }

  // --- Terminal paths ---

  private async fail(
    execution: PipelineExecution,
    definition: PipelineDefinition,
    error: TypedError,
    stageType: StageType | null,
  ): Promise<PipelineExecution> {
    await this.skipRemaining(execution);

    let finalError = error;
    let status = error.code.startsWith('JUDGMENT.') ? ExecutionStatus.Terminated : ExecutionStatus.Failed;
    if (error.code === 'ROLLBACK.FAILED') {
      status = ExecutionStatus.TerminatedNeedsManualIntervention;
    } else if (execution.cutoverReached && !restoredByController(error, stageType)) {
      const rollbackError = await this.rollback(execution, 'system');
      if (rollbackError) {
        finalError = rollbackError;
        status = ExecutionStatus.TerminatedNeedsManualIntervention;
      }
    }
    execution.error = finalError;
    this.log.warn('Execution did not succeed', {
      executionId: execution.id,
      status,
      code: finalError.code,
      stageId: error.stageId,
    });
    return this.finish(execution, definition, status);
  }

  private async terminateNow(execution: PipelineExecution, definition: PipelineDefinition): Promise<PipelineExecution> {
    const request = execution.terminateRequested ?? { by: 'system', at: isoNow(this.clock), rollback: false };
    await this.deps.judgments.closeForExecution(execution.id, request.by);

    const terminated = createTypedError({
      code: 'EXECUTION.TERMINATED',
      message: request.reason ? `Terminated by ${request.by}: ${request.reason}` : `Terminated by ${request.by}`,
      executionId: execution.id,
    });
    for (const record of Object.values(execution.stages)) {
      if (record.status === StageStatus.Running) {
        record.error = terminated;
        await this.transitionStage(execution, record, StageStatus.Failed, { code: terminated.code }, request.by);
      }
    }
    await this.skipRemaining(execution, request.by);
    execution.error = terminated;

    let status = ExecutionStatus.Terminated;
    if (execution.cutoverReached || request.rollback) {
      const rollbackError = await this.rollback(execution, request.by);
      if (rollbackError) {
        execution.error = rollbackError;
        status = ExecutionStatus.TerminatedNeedsManualIntervention;
      }
    }
    return this.finish(execution, definition, status, request.by);
  }

  /** Restore the execution-start traffic state; returns the failure, if any. */
  private async rollback(execution: PipelineExecution, actor: string): Promise<TypedError | null> {
    try {
      await this.deps.cutover.rollback(execution.service, this.cutoverContext(execution, actor));
      return null;
    } catch (err) {
      return toTypedError(err, 'ROLLBACK.FAILED');
    }
  }

  private async finish(
    execution: PipelineExecution,
    definition: PipelineDefinition,
    status: ExecutionStatus,
    actor = 'system',
  ): Promise<PipelineExecution> {
    execution.pendingFinalizers = [
      { index: TERMINAL_NOTICE, spec: { type: 'notify', channel: definition.notifications.channel }, attempts: 0 },
      ...definition.finalizers.map((spec, index) => ({ index, spec, attempts: 0 })),
    ];
    await this.transitionExecution(execution, status, actor, { code: execution.error?.code });
    this.log.info('Execution finished', { executionId: execution.id, status });
    await this.runFinalizers(execution, definition);
    return execution;
  }

  private async skipRemaining(execution: PipelineExecution, actor = 'system'): Promise<void> {
    for (const record of Object.values(execution.stages)) {
      if (record.status === StageStatus.Pending) {
        await this.transitionStage(execution, record, StageStatus.Skipped, undefined, actor);
      }
    }
  }

  // --- Finalizers ---

  /** Run pending finalizers; ones that fail stay pending for recovery. */
  private async runFinalizers(execution: PipelineExecution, definition: PipelineDefinition): Promise<void> {
    for (const pending of [...execution.pendingFinalizers]) {
      const { error, retry } = await this.runFinalizer(execution, definition, pending);
      await this.deps.ledger.append({
        executionId: execution.id,
        service: execution.service,
        event: error ? 'finalizer.failed' : 'finalizer.completed',
        actor: 'system',
        payload: { index: pending.index, type: pending.spec.type, attempts: pending.attempts + 1, error },
      });
      if (retry) {
        pending.attempts++;
        execution.pendingFinalizers = execution.pendingFinalizers.map((p) => (p.index === pending.index ? pending : p));
      } else {
        execution.pendingFinalizers = execution.pendingFinalizers.filter((p) => p.index !== pending.index);
      }
      await this.save(execution);
    }
    if (execution.pendingFinalizers.length === 0 && !execution.finalized) {
      execution.finalized = true;
      await this.save(execution);
    }
  }

  private async runFinalizer(
    execution: PipelineExecution,
    definition: PipelineDefinition,
    pending: PendingFinalizer,
  ): Promise<{ error?: string; retry: boolean }> {
    const event = TERMINAL_EVENTS[execution.status];
    const urgent = execution.status === ExecutionStatus.TerminatedNeedsManualIntervention;
    const text = execution.error?.message;
    const spec = pending.spec;

    if (spec.type === 'notify') {
      const settings =
        pending.index === TERMINAL_NOTICE ? definition.notifications : { channel: spec.channel };
      const delivered = await this.deps.notifier.notify(settings, event, execution, { text, urgent });
      return delivered ? { retry: false } : { error: `Notification to ${spec.channel} was not delivered`, retry: true };
    }

    try {
      const stageResults: Record<string, StageResult> = {};
      for (const stage of Object.values(execution.stages)) {
        if (stage.result) stageResults[stage.stageId] = stage.result;
      }
      const group = await this.deps.handlers.resolve(spec.target, 'finalizer', {
        service: execution.service,
        stageResults,
      });
      await this.deps.cutover.destroy(group.id, this.cutoverContext(execution, 'system'));
      return { retry: false };
    } catch (err) {
      const failure = toTypedError(err, 'STAGE.CLEANUP_FAILED');
      this.log.warn('Cleanup finalizer failed', { executionId: execution.id, code: failure.code, error: failure.message });
      // Engine refusals (ACTIVE target, unresolved reference) are final; infrastructure errors are retried.
      return { error: failure.message, retry: !(err instanceof EngineError) || failure.retryable };
    }
  }

  // --- Termination requests ---

  private async requestTermination(
    executionId: string,
    actor: string,
    reason: string | undefined,
    rollback: boolean,
  ): Promise<PipelineExecution> {
    const execution = await this.load(executionId);
    if (isTerminalExecutionStatus(execution.status)) {
      throw new EngineError(
        createTypedError({
          code: 'EXECUTION.ALREADY_TERMINAL',
          message: `Execution ${executionId} is already ${execution.status}`,
          executionId,
          details: { status: execution.status },
        }),
      );
    }

    const request = { by: actor, reason, at: isoNow(this.clock), rollback };
    await this.deps.ledger.append({
      executionId,
      service: execution.service,
      event: rollback ? 'execution.rollback-requested' : 'execution.terminate-requested',
      actor,
      payload: { reason },
    });

    const active = this.active.get(executionId);
    if (active) {
      this.terminations.set(executionId, request);
      active.controller.abort();
      return active.done;
    }

    execution.terminateRequested = request;
    await this.save(execution);
    return this.run(executionId);
  }

  // --- Persistence ---

  private async transitionExecution(
    execution: PipelineExecution,
    target: ExecutionStatus,
    actor = 'system',
    payload: Record<string, unknown> = {},
  ): Promise<void> {
    const result = transitionExecutionStatus(execution.status, target);
    if (!result.success) {
      throw new EngineError(
        result.error ?? createTypedError({ code: 'EXECUTION.INVALID_TRANSITION', message: `${execution.status} -> ${target}` }),
      );
    }
    await this.deps.ledger.append({
      executionId: execution.id,
      service: execution.service,
      event: 'execution.status',
      actor,
      payload: { from: execution.status, to: target, ...payload },
    });
    execution.status = target;
    if (isTerminalExecutionStatus(target)) execution.completedAt = isoNow(this.clock);
    await this.save(execution);
  }

  private async transitionStage(
    execution: PipelineExecution,
    record: StageExecution,
    target: StageStatus,
    payload: Record<string, unknown> = {},
    actor = 'system',
  ): Promise<void> {
    const result = transitionStageStatus(record.status, target);
    if (!result.success) {
      throw new EngineError(
        result.error ?? createTypedError({ code: 'STAGE.INVALID_TRANSITION', message: `${record.status} -> ${target}` }),
      );
    }
    await this.deps.ledger.append({
      executionId: execution.id,
      service: execution.service,
      stageId: record.stageId,
      event: target === StageStatus.Running ? 'stage.started' : 'stage.status',
      actor,
      payload: { from: record.status, to: target, type: record.type, ...payload },
    });
    record.status = target;
    if (isTerminalStageStatus(target)) record.completedAt = isoNow(this.clock);
    await this.save(execution);
  }

  /** Persist a snapshot; writes for one execution land in call order. */
  private save(execution: PipelineExecution): Promise<void> {
    execution.updatedAt = isoNow(this.clock);
    const snapshot = structuredClone(execution);
    const write = async () => {
      await this.deps.store.executions.update(snapshot.id, snapshot);
    };
    const previous = this.saves.get(execution.id) ?? Promise.resolve();
    const next = previous.then(write, write);
    this.saves.set(execution.id, next);
    const cleanup = () => {
      if (this.saves.get(execution.id) === next) this.saves.delete(execution.id);
    };
    next.then(cleanup, cleanup);
    return next;
  }

  private async load(executionId: string): Promise<PipelineExecution> {
    const execution = await this.deps.store.executions.getById(executionId);
    if (!execution) throw new EngineError(notFoundError('Execution', executionId));
    return execution;
  }

  private async definitionFor(execution: PipelineExecution): Promise<PipelineDefinition> {
    const definition = await this.deps.store.pipelines.getVersion(execution.service, execution.pipelineVersion);
    if (!definition) {
      throw new EngineError(notFoundError('Pipeline definition', `${execution.service}@v${execution.pipelineVersion}`));
    }
    return definition;
  }

  private cutoverContext(execution: PipelineExecution, actor: string): CutoverContext {
    return { executionId: execution.id, actor, rollbackTarget: execution.rollbackTarget };
  }
}

