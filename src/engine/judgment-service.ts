/**
 * Judgment service.
 *
 * Persists judgment gates and applies decisions. A decision is a separate,
 * idempotent call: repeating the same decision by the same actor returns
 * the recorded request unchanged. Gate deadlines are applied by expire(),
 * which treats an expired gate as a rejection. Decisions, expiry and
 * closing are serialised per execution, so a gate is decided exactly once.
 */

import { v4 as uuid } from 'uuid';
import { AuditLedger } from '../audit/audit-ledger';
import { Clock, isoNow, systemClock } from '../clock';
import { KeyedMutex } from '../cutover/keyed-mutex';
import { EngineError, createTypedError, notFoundError } from '../domain/errors';
import { ExecutionStatus } from '../domain/execution';
import { JudgmentDecision, JudgmentRequest, JudgmentState } from '../domain/judgment';
import { JudgmentGateSpec } from '../domain/pipeline';
import { Store } from '../storage/store';

/** Actor recorded on decisions made by a gate's deadline. */
export const TIMEOUT_ACTOR = 'system:timeout';

function judgmentError(code: 'UNAUTHORIZED' | 'ALREADY_DECIDED' | 'NOT_PENDING' | 'INVALID_DECISION', message: string, details?: Record<string, unknown>): EngineError {
  return new EngineError(
    createTypedError({ code: `JUDGMENT.${code}`, message, retryable: false, details }),
  );
}

export class JudgmentService {
  private locks = new KeyedMutex();

  constructor(
    private store: Store,
    private ledger: AuditLedger,
    private clock: Clock = systemClock,
  ) {}

  async open(params: {
    executionId: string;
    stageId: string;
    service: string;
    gate: JudgmentGateSpec;
    timeoutMs?: number;
  }): Promise<JudgmentRequest> {
    const now = this.clock.now();
    const request: JudgmentRequest = {
      id: `jdg_${uuid()}`,
      executionId: params.executionId,
      stageId: params.stageId,
      service: params.service,
      prompt: params.gate.prompt,
      allowedDecisions: ['approve', 'reject'],
      authorizedActors: [...params.gate.authorizedActors],
      state: JudgmentState.Pending,
      createdAt: new Date(now).toISOString(),
      expiresAt: params.timeoutMs !== undefined ? new Date(now + params.timeoutMs).toISOString() : undefined,
    };
    await this.ledger.append({
      executionId: params.executionId,
      service: params.service,
      stageId: params.stageId,
      event: 'judgment.opened',
      actor: 'system',
      payload: { judgmentId: request.id, prompt: request.prompt, authorizedActors: request.authorizedActors, expiresAt: request.expiresAt },
    });
    return this.store.judgments.create(request);
  }

  async get(id: string): Promise<JudgmentRequest> {
    const request = await this.store.judgments.getById(id);
    if (!request) throw new EngineError(notFoundError('Judgment', id));
    return request;
  }

  listPending(): Promise<JudgmentRequest[]> {
    return this.store.judgments.listPending();
  }

  /** Record an authorized actor's decision on an execution's open gate. */
  decide(executionId: string, actor: string, decision: JudgmentDecision): Promise<JudgmentRequest> {
    return this.withExecution(executionId, () => this.decideLocked(executionId, actor, decision));
  }

  /** Reject every pending gate whose deadline has passed. */
  async expire(): Promise<JudgmentRequest[]> {
    const now = this.clock.now();
    const expired: JudgmentRequest[] = [];
    for (const request of await this.store.judgments.listPending()) {
      if (!request.expiresAt || Date.parse(request.expiresAt) > now) continue;
      const decided = await this.withExecution(request.executionId, async () => {
        const current = await this.store.judgments.getById(request.id);
        if (!current || current.state !== JudgmentState.Pending) return null;
        return this.record(current, TIMEOUT_ACTOR, 'reject', true);
      });
      if (decided) expired.push(decided);
    }
    return expired;
  }

  /** Close any open gate of an execution being terminated. */
  closeForExecution(executionId: string, actor: string): Promise<void> {
    return this.withExecution(executionId, async () => {
      for (const request of await this.store.judgments.findByExecution(executionId)) {
        if (request.state === JudgmentState.Pending) {
          await this.record(request, actor, 'reject', false);
        }
      }
    });
  }

  private async withExecution<T>(executionId: string, fn: () => Promise<T>): Promise<T> {
    const release = await this.locks.acquire(executionId);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private async decideLocked(executionId: string, actor: string, decision: JudgmentDecision): Promise<JudgmentRequest> {
    const execution = await this.store.executions.getById(executionId);
    if (!execution) throw new EngineError(notFoundError('Execution', executionId));

    const requests = (await this.store.judgments.findByExecution(executionId)).sort((a, b) =>
      a.createdAt.localeCompare(b.createdAt),
    );
    const latest = requests[requests.length - 1];
    if (!latest) {
      throw judgmentError('NOT_PENDING', `Execution ${executionId} has no judgment gate`, { executionId });
    }

    if (!latest.allowedDecisions.includes(decision)) {
      throw judgmentError('INVALID_DECISION', `Decision "${decision}" is not allowed`, { allowed: latest.allowedDecisions });
    }
    if (!latest.authorizedActors.includes(actor) && !latest.authorizedActors.includes('*')) {
      throw judgmentError('UNAUTHORIZED', `Actor "${actor}" may not decide this judgment`, { actor });
    }

    if (latest.state !== JudgmentState.Pending) {
      const expected = decision === 'approve' ? JudgmentState.Approved : JudgmentState.Rejected;
      if (latest.decidedBy === actor && latest.state === expected) return latest;
      throw judgmentError('ALREADY_DECIDED', `Judgment ${latest.id} was already ${latest.state}`, {
        decidedBy: latest.decidedBy,
        state: latest.state,
      });
    }
    if (execution.status !== ExecutionStatus.AwaitingJudgment) {
      throw judgmentError('NOT_PENDING', `Execution ${executionId} is ${execution.status}, not awaiting judgment`, {
        status: execution.status,
      });
    }

    return this.record(latest, actor, decision, false);
  }

  private async record(
    request: JudgmentRequest,
    actor: string,
    decision: JudgmentDecision,
    timedOut: boolean,
  ): Promise<JudgmentRequest> {
    const decided: JudgmentRequest = {
      ...request,
      state: decision === 'approve' ? JudgmentState.Approved : JudgmentState.Rejected,
      decidedBy: actor,
      decidedAt: isoNow(this.clock),
      timedOut,
    };
    await this.ledger.append({
      executionId: request.executionId,
      service: request.service,
      stageId: request.stageId,
      event: 'judgment.decided',
      actor,
      payload: { judgmentId: request.id, decision, timedOut },
    });
    const updated = await this.store.judgments.update(request.id, decided);
    return updated ?? decided;
  }
}
