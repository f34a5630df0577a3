/**
 * Typed error model for machine-actionable error handling.
 *
 * Stage-local failures are carried as typed values on stage and execution
 * records; errors that cross a component boundary are thrown as
 * `EngineError`, which wraps the same `TypedError` payload.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'TRIGGER'
  | 'DEPLOY'
  | 'HEALTH'
  | 'VERIFICATION'
  | 'CANARY'
  | 'JUDGMENT'
  | 'CUTOVER'
  | 'ROLLBACK'
  | 'STAGE'
  | 'EXECUTION'
  | 'PIPELINE'
  | 'VALIDATION'
  | 'AUTH'
  | 'SYSTEM';

/** Typed suggested fix an operator or agent can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and records. */
export interface TypedError {
  /** Namespaced error code (e.g., "CUTOVER.PARTIAL_APPLY"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated stage if applicable. */
  stageId?: string;
  /** Associated execution if applicable. */
  executionId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stageId?: string;
  executionId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stageId: params.stageId,
    executionId: params.executionId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error thrown across component boundaries; carries a TypedError. */
export class EngineError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'EngineError';
  }
}

/** Narrow an unknown thrown value to its TypedError, wrapping plain errors. */
export function toTypedError(err: unknown, fallbackCode: string = 'SYSTEM.INTERNAL'): TypedError {
  if (err instanceof EngineError) return err.typedError;
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  });
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function triggerError(service: string, cause: string): TypedError {
  return createTypedError({
    code: 'TRIGGER.REGISTRY_UNREACHABLE',
    message: `Artifact registry poll failed for "${service}": ${cause}`,
    retryable: true,
    details: { service },
  });
}

export function deployError(stageId: string, cause: string, attempt: number): TypedError {
  return createTypedError({
    code: 'DEPLOY.APPLY_REJECTED',
    message: `Deploy spec rejected by infrastructure: ${cause}`,
    stageId,
    retryable: true,
    details: { attempt },
    suggestedFixes: [{ type: 'INSPECT_DEPLOY_SPEC', params: { stageId } }],
  });
}

export function stageTimeoutError(stageId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'STAGE.TIMEOUT',
    message: `Stage exceeded its deadline of ${timeoutMs}ms`,
    stageId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
  });
}

export function healthTimeoutError(stageId: string, serverGroupId: string, timeoutMs: number, detail?: string): TypedError {
  return createTypedError({
    code: 'HEALTH.TIMEOUT',
    message: `Server group ${serverGroupId} did not become ready within ${timeoutMs}ms`,
    stageId,
    retryable: true,
    details: { serverGroupId, timeoutMs, lastDetail: detail },
  });
}

export function verificationFailureError(stageId: string, report: string): TypedError {
  return createTypedError({
    code: 'VERIFICATION.FAILED',
    message: `Verification job failed: ${report}`,
    stageId,
    retryable: false,
    details: { report },
  });
}

export function canaryFailError(stageId: string, score: number): TypedError {
  return createTypedError({
    code: 'CANARY.FAIL',
    message: `Canary analysis failed with score ${score}`,
    stageId,
    retryable: false,
    details: { score },
  });
}

export function canaryMarginalError(stageId: string, score: number): TypedError {
  return createTypedError({
    code: 'CANARY.MARGINAL',
    message: `Canary analysis was marginal with score ${score}`,
    stageId,
    retryable: false,
    details: { score },
  });
}

export function canaryInsufficientDataError(stageId: string, metrics: string[]): TypedError {
  return createTypedError({
    code: 'CANARY.INSUFFICIENT_DATA',
    message: `Canary analysis had insufficient data for: ${metrics.join(', ')}`,
    stageId,
    retryable: true,
    details: { metrics },
  });
}

export function judgmentRejectedError(stageId: string, actor: string): TypedError {
  return createTypedError({
    code: 'JUDGMENT.REJECTED',
    message: `Judgment rejected by ${actor}`,
    stageId,
    retryable: false,
    details: { actor },
  });
}

export function judgmentTimeoutError(stageId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'JUDGMENT.TIMEOUT',
    message: `No judgment decision within ${timeoutMs}ms`,
    stageId,
    retryable: false,
    details: { timeoutMs },
  });
}

export function cutoverFailureError(service: string, intended: Record<string, number>, observed: Record<string, number>): TypedError {
  return createTypedError({
    code: 'CUTOVER.PARTIAL_APPLY',
    message: `Traffic weights for "${service}" do not match the intended state`,
    retryable: false,
    details: { service, intended, observed },
  });
}

export function cutoverLockedError(service: string): TypedError {
  return createTypedError({
    code: 'CUTOVER.LOCKED',
    message: `Another cutover is in flight for "${service}"`,
    retryable: true,
    details: { service },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { service } }],
  });
}

export function rollbackFailureError(service: string, cause: string): TypedError {
  return createTypedError({
    code: 'ROLLBACK.FAILED',
    message: `Rollback for "${service}" could not be applied: ${cause}`,
    retryable: false,
    details: { service },
    suggestedFixes: [
      { type: 'MANUAL_INTERVENTION', params: { service }, description: 'Restore traffic weights by hand' },
    ],
  });
}

export function invalidTransitionError(kind: 'EXECUTION' | 'STAGE', from: string, to: string): TypedError {
  return createTypedError({
    code: `${kind}.INVALID_TRANSITION`,
    message: `Invalid ${kind.toLowerCase()} state transition: ${from} -> ${to}`,
    retryable: false,
    details: { from, to },
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
