/**
 * Judgment gate domain model.
 *
 * A JudgmentRequest is the persisted form of a human gate: the execution
 * that opened it sits in AWAITING_JUDGMENT until an authorized actor decides.
 */

export type JudgmentDecision = 'approve' | 'reject';

export enum JudgmentState {
  Pending = 'pending',
  Approved = 'approved',
  Rejected = 'rejected',
}

export interface JudgmentRequest {
  id: string;
  executionId: string;
  stageId: string;
  service: string;
  prompt: string;
  allowedDecisions: JudgmentDecision[];
  authorizedActors: string[];
  state: JudgmentState;
  decidedBy?: string;
  decidedAt?: string;
  /** Set when the decision came from the gate's deadline rather than a person. */
  timedOut?: boolean;
  createdAt: string;
  expiresAt?: string;
}
