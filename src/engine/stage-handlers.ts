/**
 * Stage handlers.
 *
 * One handler per stage type. A handler either completes with a typed
 * StageResult, suspends on a judgment gate, or throws an EngineError that
 * the stage runner records on the stage. Handlers that wait (Wait,
 * HealthCheck, CanaryAnalysis, Cleanup, a canary-ramp Cutover) persist a
 * checkpoint first so a restarted executor resumes them instead of
 * starting over.
 */

import { v4 as uuid } from 'uuid';
import { InfraController, VerificationRunner } from '../adapters/interfaces';
import { CanaryAnalysisEngine } from '../canary/canary-analysis';
import { Clock, isoNow } from '../clock';
import { AuditEvent } from '../domain/audit';
import { Artifact } from '../domain/artifact';
import { CanaryResult } from '../domain/canary';
import {
  EngineError,
  canaryFailError,
  canaryInsufficientDataError,
  canaryMarginalError,
  createTypedError,
  deployError,
  healthTimeoutError,
  judgmentRejectedError,
  judgmentTimeoutError,
  toTypedError,
  verificationFailureError,
} from '../domain/errors';
import { StageCheckpoint, StageResult } from '../domain/execution';
import { JudgmentRequest, JudgmentState } from '../domain/judgment';
import {
  CanaryAnalysisStageSpec,
  CleanupStageSpec,
  CutoverStageSpec,
  DeployStageSpec,
  HealthCheckStageSpec,
  JudgmentGateSpec,
  ManualJudgmentStageSpec,
  ServerGroupRef,
  StageSpec,
  StageType,
  VerificationJobStageSpec,
  WaitStageSpec,
} from '../domain/pipeline';
import { ServerGroup, ServerGroupHandle, TrafficSnapshot } from '../domain/server-group';
import { CutoverContext, CutoverController } from '../cutover/cutover-controller';
import { Logger } from '../logger';
import { Store } from '../storage/store';
import { JudgmentService } from './judgment-service';

/** Deadline for a HealthCheck stage that declares no timeoutMs. */
export const DEFAULT_HEALTH_TIMEOUT_MS = 10 * 60_000;

/** What a stage handler sees of its execution. */
export interface StageContext {
  readonly executionId: string;
  readonly service: string;
  readonly artifact: Readonly<Artifact>;
  readonly rollbackTarget: Readonly<TrafficSnapshot>;
  /** Results of stages that have already completed. */
  readonly stageResults: Readonly<Record<string, StageResult>>;
  readonly checkpoint?: StageCheckpoint;
  readonly signal: AbortSignal;
  readonly log: Logger;
  saveCheckpoint(checkpoint: StageCheckpoint): Promise<void>;
  /** Flag the execution as having started to shift traffic. */
  markCutoverReached(): Promise<void>;
  record(event: AuditEvent, payload: Record<string, unknown>): Promise<void>;
}

export type StageOutcome =
  | { kind: 'completed'; result: StageResult }
  | { kind: 'suspended'; judgment: JudgmentRequest };

export interface StageHandlerDeps {
  store: Store;
  infra: InfraController;
  cutover: CutoverController;
  canary: CanaryAnalysisEngine;
  verification: VerificationRunner;
  judgments: JudgmentService;
  clock: Clock;
}

function unresolvedRef(stageId: string, ref: ServerGroupRef, reason: string): EngineError {
  return new EngineError(
    createTypedError({
      code: 'STAGE.UNRESOLVED_REF',
      message: `Cannot resolve server group reference: ${reason}`,
      stageId,
      retryable: false,
      details: { ref },
    }),
  );
}

export class StageHandlers {
  constructor(private deps: StageHandlerDeps) {}

  execute(spec: StageSpec, ctx: StageContext): Promise<StageOutcome> {
    switch (spec.type) {
      case StageType.Deploy:
        return this.deploy(spec, ctx);
      case StageType.Wait:
        return this.wait(spec, ctx);
      case StageType.HealthCheck:
        return this.healthCheck(spec, ctx);
      case StageType.VerificationJob:
        return this.verificationJob(spec, ctx);
      case StageType.CanaryAnalysis:
        return this.canaryAnalysis(spec, ctx);
      case StageType.ManualJudgment:
        return this.manualJudgment(spec, ctx);
      case StageType.Cutover:
        return this.cutover(spec, ctx);
      case StageType.Cleanup:
        return this.cleanup(spec, ctx);
    }
  }

  /** Resolve a reference to the live server group it names. */
  async resolve(ref: ServerGroupRef, stageId: string, ctx: Pick<StageContext, 'service' | 'stageResults'>): Promise<ServerGroup> {
    if ('fromStage' in ref) {
      const result = ctx.stageResults[ref.fromStage];
      if (!result || result.kind !== 'deploy') {
        throw unresolvedRef(stageId, ref, `stage "${ref.fromStage}" has not deployed a server group`);
      }
      const group = await this.deps.store.serverGroups.getById(result.serverGroupId);
      if (!group) throw unresolvedRef(stageId, ref, `server group ${result.serverGroupId} is unknown`);
      return group;
    }
    const groups = await this.deps.store.serverGroups.findByRole(ctx.service, ref.role);
    const newest = groups.sort((a, b) => b.createdAt.localeCompare(a.createdAt))[0];
    if (!newest) throw unresolvedRef(stageId, ref, `no live ${ref.role} group for "${ctx.service}"`);
    return newest;
  }

  private cutoverContext(ctx: StageContext, stageId: string): CutoverContext {
    return {
      executionId: ctx.executionId,
      stageId,
      actor: 'system',
      rollbackTarget: ctx.rollbackTarget,
    };
  }

  private async deploy(spec: DeployStageSpec, ctx: StageContext): Promise<StageOutcome> {
    let handle: ServerGroupHandle;
    try {
      handle = await this.deps.infra.apply({
        service: ctx.service,
        environment: spec.environment,
        artifactId: ctx.artifact.id,
        replicas: spec.replicas ?? 1,
        labels: { execution: ctx.executionId, stage: spec.id, role: spec.role },
      });
    } catch (err) {
      throw new EngineError(deployError(spec.id, err instanceof Error ? err.message : String(err), 0));
    }

    const now = isoNow(this.deps.clock);
    const group = await this.deps.cutover.registerServerGroup(
      {
        id: `sg_${uuid()}`,
        service: ctx.service,
        artifactId: ctx.artifact.id,
        executionId: ctx.executionId,
        environment: spec.environment,
        role: spec.role,
        handle,
        createdAt: now,
        updatedAt: now,
      },
      this.cutoverContext(ctx, spec.id),
    );
    return { kind: 'completed', result: { kind: 'deploy', serverGroupId: group.id, endpoint: handle.endpoint } };
  }

  private async wait(spec: WaitStageSpec, ctx: StageContext): Promise<StageOutcome> {
    const resumeAt = await this.resumeAt(ctx, spec.durationMs);
    await this.deps.clock.sleep(Math.max(0, resumeAt - this.deps.clock.now()), ctx.signal);
    return { kind: 'completed', result: { kind: 'wait', waitedMs: spec.durationMs } };
  }

  private async healthCheck(spec: HealthCheckStageSpec, ctx: StageContext): Promise<StageOutcome> {
    const { clock, infra } = this.deps;
    const group = await this.resolve(spec.target, spec.id, ctx);
    const timeoutMs = spec.timeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS;

    let startedAt = ctx.checkpoint?.healthStartedAt;
    if (!startedAt) {
      startedAt = isoNow(clock);
      await ctx.saveCheckpoint({ healthStartedAt: startedAt });
    }
    const deadline = Date.parse(startedAt) + timeoutMs;
    const needed = spec.consecutiveSuccesses ?? 1;

    let streak = 0;
    let polls = 0;
    let detail: string | undefined;
    for (;;) {
      polls++;
      try {
        const report = await infra.health(group.handle);
        detail = report.detail;
        streak = report.ready ? streak + 1 : 0;
      } catch (err) {
        detail = err instanceof Error ? err.message : String(err);
        streak = 0;
      }
      if (streak >= needed) {
        return { kind: 'completed', result: { kind: 'health', ready: true, detail, polls } };
      }

      const remaining = deadline - clock.now();
      if (remaining <= 0) {
        throw new EngineError(healthTimeoutError(spec.id, group.id, timeoutMs, detail));
      }
      await clock.sleep(Math.min(spec.intervalMs, remaining), ctx.signal);
    }
  }

  private async verificationJob(spec: VerificationJobStageSpec, ctx: StageContext): Promise<StageOutcome> {
    const group = await this.resolve(spec.target, spec.id, ctx);
    const outcome = await this.deps.verification.run(spec.test, group.handle.endpoint, ctx.signal);
    if (!outcome.success) {
      throw new EngineError(verificationFailureError(spec.id, outcome.report));
    }
    return { kind: 'completed', result: { kind: 'verification', success: true, report: outcome.report } };
  }

  private async canaryAnalysis(spec: CanaryAnalysisStageSpec, ctx: StageContext): Promise<StageOutcome> {
    const checkpoint = ctx.checkpoint;
    if (checkpoint?.pendingCanary && checkpoint.judgmentId) {
      const pending = checkpoint.pendingCanary;
      const gate = await this.awaitGate(checkpoint.judgmentId, spec.id, spec.judgment?.judgmentTimeoutMs);
      if (gate.kind === 'suspended') return gate;
      return { kind: 'completed', result: { kind: 'canary', canary: pending, judgment: 'approve' } };
    }

    const baseline = await this.resolve(spec.baseline, spec.id, ctx);
    const canary = await this.resolve(spec.canary, spec.id, ctx);
    const result = await this.deps.canary.analyze(
      {
        service: ctx.service,
        baselineServerGroupId: baseline.id,
        canaryServerGroupId: canary.id,
        config: spec.analysis,
      },
      {
        signal: ctx.signal,
        checkpoint: checkpoint?.canary,
        onProgress: (progress) => ctx.saveCheckpoint({ canary: progress }),
      },
    );
    await ctx.record('canary.verdict', { score: result.score, verdict: result.verdict, reason: result.reason });

    switch (result.verdict) {
      case 'PASS':
        return { kind: 'completed', result: { kind: 'canary', canary: result } };
      case 'MARGINAL':
        if (spec.onMarginal === 'judgment' && spec.judgment) {
          return this.openGate(spec.id, spec.judgment, spec.judgment.judgmentTimeoutMs, ctx, result);
        }
        await this.deps.cutover.collapseCanary(ctx.service, canary.id, this.cutoverContext(ctx, spec.id));
        throw new EngineError(canaryMarginalError(spec.id, result.score));
      case 'FAIL':
        await this.deps.cutover.collapseCanary(ctx.service, canary.id, this.cutoverContext(ctx, spec.id));
        if (result.reason === 'insufficient-data') {
          const missing = result.metrics.filter((m) => m.insufficientData).map((m) => m.name);
          throw new EngineError(canaryInsufficientDataError(spec.id, missing));
        }
        throw new EngineError(canaryFailError(spec.id, result.score));
    }
  }

  private async manualJudgment(spec: ManualJudgmentStageSpec, ctx: StageContext): Promise<StageOutcome> {
    const timeoutMs = spec.judgmentTimeoutMs ?? spec.timeoutMs;
    const judgmentId = ctx.checkpoint?.judgmentId;
    if (!judgmentId) {
      return this.openGate(spec.id, spec, timeoutMs, ctx);
    }
    const gate = await this.awaitGate(judgmentId, spec.id, timeoutMs);
    if (gate.kind === 'suspended') return gate;
    return {
      kind: 'completed',
      result: { kind: 'judgment', decision: 'approve', decidedBy: gate.decidedBy, timedOut: false },
    };
  }

  private async cutover(spec: CutoverStageSpec, ctx: StageContext): Promise<StageOutcome> {
    const target = await this.resolve(spec.target, spec.id, ctx);
    const cutoverCtx = this.cutoverContext(ctx, spec.id);
    await ctx.markCutoverReached();

    if (spec.strategy === 'blue-green') {
      const outcome = await this.deps.cutover.blueGreen(ctx.service, target.id, cutoverCtx);
      return { kind: 'completed', result: { kind: 'cutover', ...outcome } };
    }

    const baseline = await this.resolve(spec.baseline, spec.id, ctx);
    const resumed = ctx.checkpoint;
    const outcome = await this.deps.cutover.canaryRamp(
      ctx.service,
      target.id,
      spec.steps,
      (nextWeight, step) => {
        ctx.log.info('Evaluating canary before ramp step', { stageId: spec.id, nextWeight });
        return this.deps.canary.analyze(
          {
            service: ctx.service,
            baselineServerGroupId: baseline.id,
            canaryServerGroupId: target.id,
            config: spec.analysis,
          },
          {
            signal: ctx.signal,
            checkpoint: resumed?.rampStep === step - 1 ? resumed.canary : undefined,
            onProgress: (progress) => ctx.saveCheckpoint({ rampStep: step - 1, canary: progress }),
          },
        );
      },
      cutoverCtx,
      {
        resumeAfter: resumed?.rampStep,
        onStepApplied: (step) => ctx.saveCheckpoint({ rampStep: step }),
      },
    );
    return { kind: 'completed', result: { kind: 'cutover', ...outcome } };
  }

  /** Cleanup failures are logged and recorded, never fatal to the pipeline. */
  private async cleanup(spec: CleanupStageSpec, ctx: StageContext): Promise<StageOutcome> {
    const resumeAt = await this.resumeAt(ctx, spec.gracePeriodMs);
    await this.deps.clock.sleep(Math.max(0, resumeAt - this.deps.clock.now()), ctx.signal);

    let serverGroupId = '';
    try {
      const group = await this.resolve(spec.target, spec.id, ctx);
      serverGroupId = group.id;
      await this.deps.cutover.destroy(group.id, this.cutoverContext(ctx, spec.id));
      return { kind: 'completed', result: { kind: 'cleanup', serverGroupId, destroyed: true } };
    } catch (err) {
      const failure = toTypedError(err, 'STAGE.CLEANUP_FAILED');
      ctx.log.warn('Cleanup failed', { stageId: spec.id, serverGroupId, code: failure.code, error: failure.message });
      return {
        kind: 'completed',
        result: { kind: 'cleanup', serverGroupId, destroyed: false, error: failure.message },
      };
    }
  }

  private async resumeAt(ctx: StageContext, durationMs: number): Promise<number> {
    if (ctx.checkpoint?.resumeAt) return Date.parse(ctx.checkpoint.resumeAt);
    const resumeAt = this.deps.clock.now() + durationMs;
    await ctx.saveCheckpoint({ resumeAt: new Date(resumeAt).toISOString() });
    return resumeAt;
  }

  private async openGate(
    stageId: string,
    gate: JudgmentGateSpec,
    timeoutMs: number | undefined,
    ctx: StageContext,
    pendingCanary?: CanaryResult,
  ): Promise<StageOutcome> {
    const judgment = await this.deps.judgments.open({
      executionId: ctx.executionId,
      stageId,
      service: ctx.service,
      gate,
      timeoutMs,
    });
    await ctx.saveCheckpoint({ judgmentId: judgment.id, pendingCanary });
    return { kind: 'suspended', judgment };
  }

  /** Suspend again while pending; throw on rejection or expiry. */
  private async awaitGate(
    judgmentId: string,
    stageId: string,
    timeoutMs: number | undefined,
  ): Promise<{ kind: 'suspended'; judgment: JudgmentRequest } | { kind: 'approved'; decidedBy: string }> {
    const judgment = await this.deps.judgments.get(judgmentId);
    switch (judgment.state) {
      case JudgmentState.Pending:
        return { kind: 'suspended', judgment };
      case JudgmentState.Approved:
        return { kind: 'approved', decidedBy: judgment.decidedBy ?? 'unknown' };
      case JudgmentState.Rejected:
        if (judgment.timedOut) throw new EngineError(judgmentTimeoutError(stageId, timeoutMs ?? 0));
        throw new EngineError(judgmentRejectedError(stageId, judgment.decidedBy ?? 'unknown'));
    }
  }
}
