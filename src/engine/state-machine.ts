/**
 * Execution and stage state machines.
 *
 * Enforces valid state transitions for executions and stages,
 * producing typed errors on invalid transitions.
 */

import {
  ExecutionStatus,
  StageStatus,
  VALID_EXECUTION_TRANSITIONS,
  VALID_STAGE_TRANSITIONS,
} from '../domain/execution';
import { TypedError, invalidTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt an execution state transition. */
export function transitionExecutionStatus(
  current: ExecutionStatus,
  target: ExecutionStatus,
): TransitionResult<ExecutionStatus> {
  const validTargets = VALID_EXECUTION_TRANSITIONS[current];
  if (!validTargets || !validTargets.includes(target)) {
    return { success: false, error: invalidTransitionError('EXECUTION', current, target) };
  }
  return { success: true, newStatus: target };
}

/** Attempt a stage state transition. */
export function transitionStageStatus(
  current: StageStatus,
  target: StageStatus,
): TransitionResult<StageStatus> {
  const validTargets = VALID_STAGE_TRANSITIONS[current];
  if (!validTargets || !validTargets.includes(target)) {
    return { success: false, error: invalidTransitionError('STAGE', current, target) };
  }
  return { success: true, newStatus: target };
}
