/**
 * Audit Ledger.
 *
 * Append-only record of every state transition and decision. Appends for
 * one execution are serialized so sequence numbers stay gap-free and
 * monotonic even when parallel stages write concurrently. Callers await
 * the append before advancing, so the record is part of the transition.
 */

import { v4 as uuid } from 'uuid';
import { AuditEvent, AuditRecord } from '../domain/audit';
import { Clock, isoNow, systemClock } from '../clock';
import { Store } from '../storage/store';

/** Input for appending an audit record. */
export interface AuditInput {
  executionId: string;
  service: string;
  stageId?: string;
  event: AuditEvent;
  actor: string;
  payload?: Record<string, unknown>;
}

export class AuditLedger {
  /** Per-execution tail of the append chain. */
  private tails = new Map<string, Promise<unknown>>();

  constructor(
    private store: Store,
    private clock: Clock = systemClock,
  ) {}

  /** Append a record and return it once it is durable. */
  append(input: AuditInput): Promise<AuditRecord> {
    const previous = this.tails.get(input.executionId) ?? Promise.resolve();
    const next = previous.then(
      () => this.write(input),
      () => this.write(input),
    );
    this.tails.set(input.executionId, next);
    const cleanup = () => {
      if (this.tails.get(input.executionId) === next) this.tails.delete(input.executionId);
    };
    next.then(cleanup, cleanup);
    return next;
  }

  private async write(input: AuditInput): Promise<AuditRecord> {
    const sequence = (await this.store.audit.lastSequence(input.executionId)) + 1;
    const record: AuditRecord = Object.freeze({
      id: `aud_${uuid()}`,
      executionId: input.executionId,
      service: input.service,
      sequence,
      stageId: input.stageId,
      event: input.event,
      actor: input.actor,
      timestamp: isoNow(this.clock),
      payload: input.payload ?? {},
    });
    return this.store.audit.append(record);
  }

  /** Full ordered history of one execution. */
  history(executionId: string): Promise<AuditRecord[]> {
    return this.store.audit.listByExecution(executionId);
  }

  /** Every record written for a service, in append order. */
  historyForService(service: string): Promise<AuditRecord[]> {
    return this.store.audit.listByService(service);
  }

  /** Execution already created for this artifact, if any. */
  findExecutionFor(service: string, artifactId: string): Promise<string | null> {
    return this.store.audit.findExecutionForArtifact(service, artifactId);
  }

  /** Stable reference to an execution's ledger entries, used in notifications. */
  reference(executionId: string): string {
    return `/api/v1/executions/${executionId}/audit`;
  }
}
