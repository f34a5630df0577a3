/**
 * Audit ledger domain model.
 *
 * Immutable, append-only records of every state transition and decision,
 * sequenced per execution.
 */

/** Ledger event names. */
export type AuditEvent =
  | 'execution.created'
  | 'execution.started'
  | 'execution.status'
  | 'execution.terminate-requested'
  | 'execution.rollback-requested'
  | 'stage.started'
  | 'stage.status'
  | 'stage.retry'
  | 'judgment.opened'
  | 'judgment.decided'
  | 'server-group.created'
  | 'server-group.roles'
  | 'server-group.destroyed'
  | 'traffic.weights'
  | 'cutover.started'
  | 'cutover.completed'
  | 'cutover.failed'
  | 'rollback.started'
  | 'rollback.completed'
  | 'rollback.failed'
  | 'canary.sample'
  | 'canary.verdict'
  | 'finalizer.completed'
  | 'finalizer.failed';

/** An immutable audit record. */
export interface AuditRecord {
  id: string;
  executionId: string;
  service: string;
  /** Monotonic, 1-based, gap-free per execution. */
  sequence: number;
  stageId?: string;
  event: AuditEvent;
  actor: string;
  timestamp: string;
  payload: Record<string, unknown>;
}
