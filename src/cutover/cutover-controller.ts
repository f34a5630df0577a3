/**
 * Traffic/Cutover Controller.
 *
 * Owns the single piece of mutable shared state per service: which server
 * group receives production traffic and at what weight. Every mutating
 * operation holds the service's lock, every weight write is verified
 * against what the infrastructure reports back, and every role change is
 * applied as one registry step that cannot leave two ACTIVE groups.
 */

import { InfraController } from '../adapters/interfaces';
import { AuditLedger } from '../audit/audit-ledger';
import { Clock, isoNow, systemClock } from '../clock';
import { CutoverLockPolicy } from '../config';
import { CanaryResult } from '../domain/canary';
import {
  EngineError,
  canaryFailError,
  createTypedError,
  cutoverFailureError,
  cutoverLockedError,
  rollbackFailureError,
  toTypedError,
} from '../domain/errors';
import {
  RoleChange,
  ServerGroup,
  ServerGroupRole,
  TrafficSnapshot,
  TrafficWeights,
  weightsEqual,
} from '../domain/server-group';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { KeyedMutex, Release } from './keyed-mutex';

/** Who is asking, and where to roll back to if the operation fails. */
export interface CutoverContext {
  executionId: string;
  stageId?: string;
  actor: string;
  /** Traffic state recorded when the execution began. */
  rollbackTarget: TrafficSnapshot;
}

export interface CutoverOutcome {
  previousActive: string | null;
  newActive: string;
  weights: TrafficWeights;
}

/** Runs the canary analysis that gates the increase to `steps[step]`. */
export type RampGate = (nextWeight: number, step: number) => Promise<CanaryResult>;

export interface RampOptions {
  /** Index of the last step already applied by an earlier run. */
  resumeAfter?: number;
  /** Called once a step's weights are applied and verified. */
  onStepApplied?: (step: number) => Promise<void>;
}

export interface CutoverControllerOptions {
  lockPolicy: CutoverLockPolicy;
  clock?: Clock;
}

export class CutoverController {
  private locks = new KeyedMutex();
  private clock: Clock;
  private log: Logger;

  constructor(
    private infra: InfraController,
    private store: Store,
    private ledger: AuditLedger,
    private options: CutoverControllerOptions,
    log: Logger = rootLogger,
  ) {
    this.clock = options.clock ?? systemClock;
    this.log = log.child({ component: 'cutover' });
  }

  /** Current ACTIVE group and weights, as recorded at execution start. */
  async captureSnapshot(service: string): Promise<TrafficSnapshot> {
    const active = await this.store.serverGroups.findByRole(service, ServerGroupRole.Active);
    const weights = await this.infra.getTrafficWeights(service);
    return { activeServerGroupId: active[0]?.id ?? null, weights };
  }

  /**
   * Record a freshly applied server group. A group deployed straight into
   * ACTIVE is only accepted for a service's first deploy; it then receives
   * all traffic.
   */
  async registerServerGroup(group: ServerGroup, ctx: CutoverContext): Promise<ServerGroup> {
    return this.withLock(group.service, async () => {
      const existingActive = await this.store.serverGroups.findByRole(group.service, ServerGroupRole.Active);
      if (group.role === ServerGroupRole.Active && existingActive.length > 0) {
        throw new EngineError(
          createTypedError({
            code: 'DEPLOY.ACTIVE_EXISTS',
            message: `Service "${group.service}" already has an ACTIVE group; promote through a Cutover stage`,
            stageId: ctx.stageId,
            retryable: false,
            details: { activeServerGroupId: existingActive[0].id },
          }),
        );
      }

      const created = await this.store.serverGroups.create(group);
      await this.ledger.append({
        executionId: ctx.executionId,
        service: group.service,
        stageId: ctx.stageId,
        event: 'server-group.created',
        actor: ctx.actor,
        payload: { serverGroupId: created.id, role: created.role, artifactId: created.artifactId },
      });

      if (created.role === ServerGroupRole.Active) {
        await this.applyWeights(group.service, { [created.id]: 100 }, ctx);
      }
      await this.recordRoles(group.service, ctx);
      return created;
    });
  }

  /**
   * Blue/green cutover: one weight reassignment from the current ACTIVE
   * group to the target. The old group becomes DISABLED and stays up so a
   * rollback is another single reassignment.
   */
  async blueGreen(service: string, targetId: string, ctx: CutoverContext): Promise<CutoverOutcome> {
    return this.withLock(service, () => this.promoteLocked(service, targetId, ctx));
  }

  /**
   * Canary ramp: move traffic to the canary in steps, running the gate
   * before every increase after the first. A non-PASS verdict, or a gate
   * that throws, collapses the canary to 0% before the error is raised;
   * the final 100% step promotes the canary as a blue/green cutover would.
   */
  async canaryRamp(
    service: string,
    canaryId: string,
    steps: number[],
    gate: RampGate,
    ctx: CutoverContext,
    options: RampOptions = {},
  ): Promise<CutoverOutcome> {
    return this.withLock(service, async () => {
      const activeId = await this.requireActive(service, ctx);
      const first = (options.resumeAfter ?? -1) + 1;
      if (first > 0) {
        this.log.info('Resuming canary ramp', { service, canaryId, weight: steps[first - 1] });
      }
      for (let i = first; i < steps.length; i++) {
        const weight = steps[i];
        if (i > 0) {
          let result: CanaryResult;
          try {
            result = await gate(weight, i);
          } catch (err) {
            this.log.warn('Ramp gate did not complete, collapsing canary', {
              service,
              canaryId,
              nextWeight: weight,
              error: err instanceof Error ? err.message : String(err),
            });
            await this.collapseLocked(service, canaryId, ctx);
            throw err;
          }
          await this.ledger.append({
            executionId: ctx.executionId,
            service,
            stageId: ctx.stageId,
            event: 'canary.verdict',
            actor: ctx.actor,
            payload: { nextWeight: weight, score: result.score, verdict: result.verdict, reason: result.reason },
          });
          if (result.verdict !== 'PASS') {
            await this.collapseLocked(service, canaryId, ctx);
            throw new EngineError({ ...canaryFailError(ctx.stageId ?? 'cutover', result.score), details: { verdict: result.verdict, nextWeight: weight } });
          }
        }

        if (weight >= 100) {
          return this.promoteLocked(service, canaryId, ctx);
        }
        await this.applyOrRollback(service, { [activeId]: 100 - weight, [canaryId]: weight }, ctx);
        if (options.onStepApplied) await options.onStepApplied(i);
      }
      throw new EngineError(
        createTypedError({
          code: 'CUTOVER.RAMP_INCOMPLETE',
          message: 'Canary ramp steps must end at 100',
          stageId: ctx.stageId,
          retryable: false,
          details: { steps },
        }),
      );
    });
  }

  /** Drop a failing canary to 0% and disable it. */
  async collapseCanary(service: string, canaryId: string, ctx: CutoverContext): Promise<void> {
    return this.withLock(service, () => this.collapseLocked(service, canaryId, ctx));
  }

  /**
   * Restore the execution-start traffic state exactly: the weight map is
   * reapplied and the group that was ACTIVE becomes ACTIVE again. Raises
   * ROLLBACK.FAILED when the infrastructure will not take it.
   */
  async rollback(service: string, ctx: CutoverContext): Promise<void> {
    return this.withLock(service, () => this.rollbackLocked(service, ctx));
  }

  /** Destroy a non-ACTIVE group. */
  async destroy(serverGroupId: string, ctx: CutoverContext): Promise<ServerGroup> {
    const group = await this.store.serverGroups.getById(serverGroupId);
    if (!group) {
      throw new EngineError(
        createTypedError({ code: 'VALIDATION.NOT_FOUND', message: `Server group not found: ${serverGroupId}`, retryable: false }),
      );
    }
    return this.withLock(group.service, async () => {
      const current = await this.store.serverGroups.getById(serverGroupId);
      if (!current || current.destroyedAt) return current ?? group;
      if (current.role === ServerGroupRole.Active) {
        throw new EngineError(
          createTypedError({
            code: 'CUTOVER.DESTROY_ACTIVE',
            message: `Refusing to destroy ACTIVE group ${serverGroupId}`,
            stageId: ctx.stageId,
            retryable: false,
          }),
        );
      }
      await this.infra.destroy(current.handle);
      const updated = await this.store.serverGroups.update(serverGroupId, {
        role: ServerGroupRole.Disabled,
        destroyedAt: isoNow(this.clock),
        updatedAt: isoNow(this.clock),
      });
      await this.ledger.append({
        executionId: ctx.executionId,
        service: current.service,
        stageId: ctx.stageId,
        event: 'server-group.destroyed',
        actor: ctx.actor,
        payload: { serverGroupId },
      });
      return updated ?? current;
    });
  }

  private async withLock<T>(service: string, fn: () => Promise<T>): Promise<T> {
    let release: Release | null;
    if (this.options.lockPolicy === 'fail-fast') {
      release = await this.locks.tryAcquire(service);
      if (!release) throw new EngineError(cutoverLockedError(service));
    } else {
      release = await this.locks.acquire(service);
    }
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private async requireActive(service: string, ctx: CutoverContext): Promise<string> {
    const active = await this.store.serverGroups.findByRole(service, ServerGroupRole.Active);
    if (active.length === 0) {
      throw new EngineError(
        createTypedError({
          code: 'CUTOVER.NO_ACTIVE',
          message: `Service "${service}" has no ACTIVE group to shift traffic from`,
          stageId: ctx.stageId,
          retryable: false,
        }),
      );
    }
    return active[0].id;
  }

  private async promoteLocked(service: string, targetId: string, ctx: CutoverContext): Promise<CutoverOutcome> {
    const target = await this.store.serverGroups.getById(targetId);
    if (!target || target.service !== service || target.destroyedAt) {
      throw new EngineError(
        createTypedError({
          code: 'CUTOVER.UNKNOWN_TARGET',
          message: `Server group ${targetId} is not a live group of "${service}"`,
          stageId: ctx.stageId,
          retryable: false,
        }),
      );
    }

    const before = await this.captureSnapshot(service);
    await this.ledger.append({
      executionId: ctx.executionId,
      service,
      stageId: ctx.stageId,
      event: 'cutover.started',
      actor: ctx.actor,
      payload: { from: before.activeServerGroupId, to: targetId, weights: before.weights },
    });

    const intended: TrafficWeights = {};
    for (const id of Object.keys(before.weights)) intended[id] = 0;
    intended[targetId] = 100;
    await this.applyOrRollback(service, intended, ctx);

    const changes: RoleChange[] = [];
    const actives = await this.store.serverGroups.findByRole(service, ServerGroupRole.Active);
    for (const group of actives) {
      if (group.id !== targetId) changes.push({ serverGroupId: group.id, role: ServerGroupRole.Disabled });
    }
    changes.push({ serverGroupId: targetId, role: ServerGroupRole.Active });
    try {
      await this.reassign(service, changes, ctx);
    } catch (err) {
      this.log.warn('Role reassignment failed after weights moved, rolling back', { service, to: targetId });
      await this.rollbackLocked(service, ctx);
      throw err;
    }

    await this.ledger.append({
      executionId: ctx.executionId,
      service,
      stageId: ctx.stageId,
      event: 'cutover.completed',
      actor: ctx.actor,
      payload: { from: before.activeServerGroupId, to: targetId, weights: intended },
    });
    this.log.info('Cutover complete', { service, from: before.activeServerGroupId, to: targetId });
    return { previousActive: before.activeServerGroupId, newActive: targetId, weights: intended };
  }

  /** Apply a weight map; on CutoverFailure roll back, then rethrow. */
  private async applyOrRollback(service: string, intended: TrafficWeights, ctx: CutoverContext): Promise<void> {
    try {
      await this.applyWeights(service, intended, ctx);
    } catch (err) {
      const failure = toTypedError(err, 'CUTOVER.APPLY_FAILED');
      await this.ledger.append({
        executionId: ctx.executionId,
        service,
        stageId: ctx.stageId,
        event: 'cutover.failed',
        actor: ctx.actor,
        payload: { code: failure.code, details: failure.details },
      });
      this.log.warn('Cutover failed, rolling back', { service, code: failure.code });
      await this.rollbackLocked(service, ctx);
      throw new EngineError({ ...failure, stageId: ctx.stageId });
    }
  }

  /** One weight request, then verify the applied state matches. */
  private async applyWeights(service: string, intended: TrafficWeights, ctx: CutoverContext): Promise<void> {
    await this.ledger.append({
      executionId: ctx.executionId,
      service,
      stageId: ctx.stageId,
      event: 'traffic.weights',
      actor: ctx.actor,
      payload: { weights: intended },
    });
    try {
      await this.infra.setTrafficWeights(service, intended);
    } catch (err) {
      const observed = await this.infra.getTrafficWeights(service).catch(() => ({}));
      throw new EngineError({
        ...cutoverFailureError(service, intended, observed),
        message: `Traffic weight request for "${service}" failed: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
    const observed = await this.infra.getTrafficWeights(service);
    if (!weightsEqual(intended, observed)) {
      throw new EngineError(cutoverFailureError(service, intended, observed));
    }
  }

  private async collapseLocked(service: string, canaryId: string, ctx: CutoverContext): Promise<void> {
    const active = await this.store.serverGroups.findByRole(service, ServerGroupRole.Active);
    if (active.some((g) => g.id === canaryId)) {
      this.log.warn('Not collapsing the ACTIVE group', { service, canaryId });
      return;
    }
    const current = await this.infra.getTrafficWeights(service);
    const intended: TrafficWeights = { ...current, [canaryId]: 0 };
    if (active[0] && active[0].id !== canaryId) {
      intended[active[0].id] = (current[active[0].id] ?? 0) + (current[canaryId] ?? 0);
    }
    try {
      await this.applyWeights(service, intended, ctx);
      await this.reassign(service, [{ serverGroupId: canaryId, role: ServerGroupRole.Disabled }], ctx);
    } catch (err) {
      const failure = toTypedError(err);
      await this.ledger.append({
        executionId: ctx.executionId,
        service,
        stageId: ctx.stageId,
        event: 'rollback.failed',
        actor: ctx.actor,
        payload: { canaryId, code: failure.code },
      });
      throw new EngineError({ ...rollbackFailureError(service, failure.message), stageId: ctx.stageId });
    }
    this.log.warn('Canary collapsed to 0%', { service, canaryId });
  }

  private async rollbackLocked(service: string, ctx: CutoverContext): Promise<void> {
    const target = ctx.rollbackTarget;
    await this.ledger.append({
      executionId: ctx.executionId,
      service,
      stageId: ctx.stageId,
      event: 'rollback.started',
      actor: ctx.actor,
      payload: { target },
    });

    try {
      const current = await this.infra.getTrafficWeights(service);
      const intended: TrafficWeights = {};
      for (const id of Object.keys(current)) intended[id] = 0;
      Object.assign(intended, target.weights);
      await this.applyWeights(service, intended, ctx);

      const changes: RoleChange[] = [];
      const actives = await this.store.serverGroups.findByRole(service, ServerGroupRole.Active);
      for (const group of actives) {
        if (group.id !== target.activeServerGroupId) {
          changes.push({ serverGroupId: group.id, role: ServerGroupRole.Disabled });
        }
      }
      if (target.activeServerGroupId) {
        changes.push({ serverGroupId: target.activeServerGroupId, role: ServerGroupRole.Active });
      }
      await this.reassign(service, changes, ctx);
    } catch (err) {
      const failure = toTypedError(err);
      await this.ledger.append({
        executionId: ctx.executionId,
        service,
        stageId: ctx.stageId,
        event: 'rollback.failed',
        actor: ctx.actor,
        payload: { code: failure.code, message: failure.message },
      });
      this.log.error('Rollback failed', { service, executionId: ctx.executionId, error: failure.message });
      throw new EngineError({ ...rollbackFailureError(service, failure.message), stageId: ctx.stageId });
    }

    await this.ledger.append({
      executionId: ctx.executionId,
      service,
      stageId: ctx.stageId,
      event: 'rollback.completed',
      actor: ctx.actor,
      payload: { activeServerGroupId: target.activeServerGroupId, weights: target.weights },
    });
    this.log.info('Rollback complete', { service, activeServerGroupId: target.activeServerGroupId });
  }

  private async reassign(service: string, changes: RoleChange[], ctx: CutoverContext): Promise<void> {
    if (changes.length === 0) return;
    const result = await this.store.serverGroups.reassignRoles(service, changes);
    if (!result.ok) {
      throw new EngineError(
        createTypedError({
          code: 'CUTOVER.ROLE_INVARIANT',
          message: result.reason,
          stageId: ctx.stageId,
          retryable: false,
        }),
      );
    }
    await this.recordRoles(service, ctx);
  }

  /** Ledger the full role map of the service's live groups. */
  private async recordRoles(service: string, ctx: CutoverContext): Promise<void> {
    const groups = await this.store.serverGroups.listByService(service);
    const roles: Record<string, ServerGroupRole> = {};
    for (const group of groups) {
      if (!group.destroyedAt) roles[group.id] = group.role;
    }
    await this.ledger.append({
      executionId: ctx.executionId,
      service,
      stageId: ctx.stageId,
      event: 'server-group.roles',
      actor: ctx.actor,
      payload: { roles },
    });
  }
}
