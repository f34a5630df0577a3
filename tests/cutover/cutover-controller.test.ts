import { MemoryInfraController } from '../../src/adapters/memory-infra';
import { AuditLedger } from '../../src/audit/audit-ledger';
import { ManualClock } from '../../src/clock';
import { CutoverContext, CutoverController } from '../../src/cutover/cutover-controller';
import { CanaryResult, CanaryVerdict } from '../../src/domain/canary';
import { EngineError } from '../../src/domain/errors';
import { ServerGroup, ServerGroupRole } from '../../src/domain/server-group';
import { resetLogHandler, setLogHandler } from '../../src/logger';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';

const SERVICE = 'checkout';

function makeGroup(id: string, role: ServerGroupRole, createdAt = '2026-01-01T00:00:00.000Z'): ServerGroup {
  return {
    id,
    service: SERVICE,
    artifactId: `art-${id}`,
    executionId: 'exe_1',
    environment: 'production',
    role,
    handle: { id: `h-${id}`, endpoint: `http://${id}.internal` },
    createdAt,
    updatedAt: createdAt,
  };
}

function verdict(v: CanaryVerdict, score: number): CanaryResult {
  return {
    baselineServerGroupId: 'A',
    canaryServerGroupId: 'C',
    metrics: [],
    score,
    verdict: v,
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: '2026-01-01T00:10:00.000Z',
  };
}

async function codeOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof EngineError) return err.typedError.code;
    throw err;
  }
  throw new Error('expected rejection');
}

describe('CutoverController', () => {
  let store: Store;
  let infra: MemoryInfraController;
  let ledger: AuditLedger;
  let controller: CutoverController;
  let ctx: CutoverContext;

  async function roles(): Promise<Record<string, ServerGroupRole>> {
    const out: Record<string, ServerGroupRole> = {};
    for (const g of await store.serverGroups.listByService(SERVICE)) out[g.id] = g.role;
    return out;
  }

  beforeEach(async () => {
    setLogHandler(() => {});
    store = createMemoryStore();
    infra = new MemoryInfraController();
    const clock = new ManualClock();
    ledger = new AuditLedger(store, clock);
    controller = new CutoverController(infra, store, ledger, { lockPolicy: 'wait', clock });

    await store.serverGroups.create(makeGroup('A', ServerGroupRole.Active));
    infra.seedWeights(SERVICE, { A: 100 });
    ctx = {
      executionId: 'exe_1',
      stageId: 'cutover',
      actor: 'system',
      rollbackTarget: await controller.captureSnapshot(SERVICE),
    };
  });

  afterEach(() => {
    resetLogHandler();
  });

  test('captureSnapshot records the ACTIVE group and applied weights', () => {
    expect(ctx.rollbackTarget).toEqual({ activeServerGroupId: 'A', weights: { A: 100 } });
  });

  describe('registerServerGroup', () => {
    test('a first ACTIVE deploy receives all traffic', async () => {
      const fresh = createMemoryStore();
      const c = new CutoverController(infra, fresh, new AuditLedger(fresh), { lockPolicy: 'wait' });
      await c.registerServerGroup({ ...makeGroup('X', ServerGroupRole.Active), service: 'payments' }, ctx);
      expect(await infra.getTrafficWeights('payments')).toEqual({ X: 100 });
    });

    test('a second ACTIVE deploy is refused', async () => {
      const code = await codeOf(controller.registerServerGroup(makeGroup('B', ServerGroupRole.Active), ctx));
      expect(code).toBe('DEPLOY.ACTIVE_EXISTS');
      expect(await store.serverGroups.getById('B')).toBeNull();
    });

    test('a CANDIDATE deploy receives no traffic', async () => {
      await controller.registerServerGroup(makeGroup('B', ServerGroupRole.Candidate), ctx);
      expect(await infra.getTrafficWeights(SERVICE)).toEqual({ A: 100 });
      expect(await roles()).toEqual({ A: ServerGroupRole.Active, B: ServerGroupRole.Candidate });
    });
  });

  describe('blueGreen', () => {
    beforeEach(async () => {
      await store.serverGroups.create(makeGroup('B', ServerGroupRole.Candidate, '2026-01-01T00:01:00.000Z'));
    });

    test('moves all traffic and swaps roles', async () => {
      const outcome = await controller.blueGreen(SERVICE, 'B', ctx);
      expect(outcome).toEqual({ previousActive: 'A', newActive: 'B', weights: { A: 0, B: 100 } });
      expect(await infra.getTrafficWeights(SERVICE)).toEqual({ A: 0, B: 100 });
      expect(await roles()).toEqual({ A: ServerGroupRole.Disabled, B: ServerGroupRole.Active });
      expect(infra.weightWrites).toHaveLength(1);
    });

    test('ledgers the cutover in order', async () => {
      await controller.blueGreen(SERVICE, 'B', ctx);
      const events = (await ledger.history('exe_1')).map((r) => r.event);
      expect(events).toEqual(['cutover.started', 'traffic.weights', 'server-group.roles', 'cutover.completed']);
    });

    test('a partially applied write is rolled back to the start state', async () => {
      infra.partiallyApplyNextWrites(1);
      const code = await codeOf(controller.blueGreen(SERVICE, 'B', ctx));
      expect(code).toBe('CUTOVER.PARTIAL_APPLY');
      expect(await infra.getTrafficWeights(SERVICE)).toEqual({ A: 100 });
      expect(await roles()).toEqual({ A: ServerGroupRole.Active, B: ServerGroupRole.Candidate });
      const events = (await ledger.history('exe_1')).map((r) => r.event);
      expect(events).toContain('cutover.failed');
      expect(events[events.length - 1]).toBe('rollback.completed');
    });

    test('a rollback the infrastructure refuses is ROLLBACK.FAILED', async () => {
      infra.rejectNextWeightWrites(2);
      const code = await codeOf(controller.blueGreen(SERVICE, 'B', ctx));
      expect(code).toBe('ROLLBACK.FAILED');
      const events = (await ledger.history('exe_1')).map((r) => r.event);
      expect(events[events.length - 1]).toBe('rollback.failed');
    });

    test('an unknown target is refused before any write', async () => {
      const code = await codeOf(controller.blueGreen(SERVICE, 'missing', ctx));
      expect(code).toBe('CUTOVER.UNKNOWN_TARGET');
      expect(infra.weightWrites).toHaveLength(0);
    });
  });

  describe('canaryRamp', () => {
    beforeEach(async () => {
      await store.serverGroups.create(makeGroup('C', ServerGroupRole.Canary, '2026-01-01T00:01:00.000Z'));
    });

    test('steps traffic up, gating every increase after the first', async () => {
      const gated: number[] = [];
      const outcome = await controller.canaryRamp(
        SERVICE,
        'C',
        [10, 50, 100],
        async (next) => {
          gated.push(next);
          return verdict('PASS', 97);
        },
        ctx,
      );
      expect(gated).toEqual([50, 100]);
      expect(infra.weightWrites.map((w) => w.weights)).toEqual([
        { A: 90, C: 10 },
        { A: 50, C: 50 },
        { A: 0, C: 100 },
      ]);
      expect(outcome.newActive).toBe('C');
      expect(await roles()).toEqual({ A: ServerGroupRole.Disabled, C: ServerGroupRole.Active });
    });

    test('a non-PASS gate collapses the canary to 0% before failing', async () => {
      const code = await codeOf(
        controller.canaryRamp(SERVICE, 'C', [10, 50, 100], async () => verdict('MARGINAL', 80), ctx),
      );
      expect(code).toBe('CANARY.FAIL');
      expect(await infra.getTrafficWeights(SERVICE)).toEqual({ A: 100, C: 0 });
      expect(await roles()).toEqual({ A: ServerGroupRole.Active, C: ServerGroupRole.Disabled });
    });

    test('a gate that throws collapses the canary and rethrows', async () => {
      const ramp = controller.canaryRamp(
        SERVICE,
        'C',
        [10, 50, 100],
        async () => {
          throw new Error('metrics backend unreachable');
        },
        ctx,
      );
      await expect(ramp).rejects.toThrow('metrics backend unreachable');
      expect(infra.weightWrites.map((w) => w.weights)).toEqual([
        { A: 90, C: 10 },
        { A: 100, C: 0 },
      ]);
      expect(await roles()).toEqual({ A: ServerGroupRole.Active, C: ServerGroupRole.Disabled });
    });

    test('resumes after the last applied step', async () => {
      infra.seedWeights(SERVICE, { A: 90, C: 10 });
      const gated: Array<[number, number]> = [];
      const applied: number[] = [];
      const outcome = await controller.canaryRamp(
        SERVICE,
        'C',
        [10, 50, 100],
        async (next, step) => {
          gated.push([next, step]);
          return verdict('PASS', 97);
        },
        ctx,
        {
          resumeAfter: 0,
          onStepApplied: async (step) => {
            applied.push(step);
          },
        },
      );
      expect(gated).toEqual([
        [50, 1],
        [100, 2],
      ]);
      expect(applied).toEqual([1]);
      expect(infra.weightWrites.map((w) => w.weights)).toEqual([
        { A: 50, C: 50 },
        { A: 0, C: 100 },
      ]);
      expect(outcome.newActive).toBe('C');
    });
  });

  test('collapseCanary never touches the ACTIVE group', async () => {
    await controller.collapseCanary(SERVICE, 'A', ctx);
    expect(infra.weightWrites).toHaveLength(0);
    expect(await roles()).toEqual({ A: ServerGroupRole.Active });
  });

  test('rollback restores the execution-start state exactly', async () => {
    await store.serverGroups.create(makeGroup('B', ServerGroupRole.Candidate, '2026-01-01T00:01:00.000Z'));
    await controller.blueGreen(SERVICE, 'B', ctx);
    await controller.rollback(SERVICE, ctx);
    expect(await infra.getTrafficWeights(SERVICE)).toEqual({ A: 100, B: 0 });
    expect(await roles()).toEqual({ A: ServerGroupRole.Active, B: ServerGroupRole.Disabled });
  });

  describe('destroy', () => {
    test('refuses the ACTIVE group', async () => {
      const code = await codeOf(controller.destroy('A', ctx));
      expect(code).toBe('CUTOVER.DESTROY_ACTIVE');
      expect(infra.destroyed).toEqual([]);
    });

    test('destroys a non-ACTIVE group once', async () => {
      await store.serverGroups.create(makeGroup('B', ServerGroupRole.Disabled));
      const destroyed = await controller.destroy('B', ctx);
      await controller.destroy('B', ctx);
      expect(destroyed.destroyedAt).toBeDefined();
      expect(infra.destroyed).toEqual(['h-B']);
    });
  });

  describe('locking', () => {
    test('fail-fast refuses a second cutover while one is in flight', async () => {
      const failFast = new CutoverController(infra, store, ledger, { lockPolicy: 'fail-fast' });
      await store.serverGroups.create(makeGroup('B', ServerGroupRole.Candidate, '2026-01-01T00:01:00.000Z'));

      let unblock: () => void = () => undefined;
      const blocked = new Promise<void>((resolve) => {
        unblock = resolve;
      });
      let entered: () => void = () => undefined;
      const writing = new Promise<void>((resolve) => {
        entered = resolve;
      });
      infra.onWeightWrite(async () => {
        entered();
        await blocked;
      });

      const first = failFast.blueGreen(SERVICE, 'B', ctx);
      await writing;
      expect(await codeOf(failFast.blueGreen(SERVICE, 'B', ctx))).toBe('CUTOVER.LOCKED');
      unblock();
      await first;
    });

    test('concurrent cutovers under wait never leave two ACTIVE groups', async () => {
      await store.serverGroups.create(makeGroup('B', ServerGroupRole.Candidate, '2026-01-01T00:01:00.000Z'));
      await store.serverGroups.create(makeGroup('C', ServerGroupRole.Candidate, '2026-01-01T00:02:00.000Z'));

      await Promise.all([controller.blueGreen(SERVICE, 'B', ctx), controller.blueGreen(SERVICE, 'C', ctx)]);

      const active = await store.serverGroups.findByRole(SERVICE, ServerGroupRole.Active);
      expect(active.map((g) => g.id)).toEqual(['C']);
      expect(await infra.getTrafficWeights(SERVICE)).toEqual({ A: 0, B: 0, C: 100 });
    });
  });
});
