/**
 * Stage runner: executes one stage with its retry and deadline policy.
 *
 * Deploy stages retry retryable failures with fixed or exponential backoff.
 * Stages with a declared deadline run under it (Wait, HealthCheck and
 * ManualJudgment enforce their own). A Deploy or VerificationJob handler
 * past its deadline is abandoned; stages that touch traffic are signalled
 * and awaited. Cancellation of the execution is not
 * a stage outcome: the AbortError propagates to the executor.
 */

import { AbortError, Clock } from '../clock';
import { TypedError, stageTimeoutError, toTypedError } from '../domain/errors';
import { StageStatus, StageResult } from '../domain/execution';
import { JudgmentRequest } from '../domain/judgment';
import { RetryPolicy, StageSpec, StageType } from '../domain/pipeline';
import { StageContext, StageHandlers, StageOutcome } from './stage-handlers';

export interface StageRunResult {
  /** SUCCEEDED, FAILED or TIMED_OUT; RUNNING when suspended on a gate. */
  status: StageStatus;
  result?: StageResult;
  error?: TypedError;
  attempts: number;
  suspended?: JudgmentRequest;
}

export interface StageRunnerOptions {
  clock: Clock;
  /** Applied to Deploy stages that declare no retry policy. */
  defaultRetry: RetryPolicy;
}

/** Error codes recorded as TIMED_OUT rather than FAILED. */
const TIMEOUT_CODES = new Set(['STAGE.TIMEOUT', 'HEALTH.TIMEOUT']);

/** Stage types that enforce their own deadline. */
const SELF_TIMED = new Set<StageType>([StageType.Wait, StageType.HealthCheck, StageType.ManualJudgment]);

/**
 * Stage types that may be part-way through a traffic or role change. At
 * the deadline their signal aborts, but the handler is awaited so it can
 * collapse or finish its write before the stage is recorded TIMED_OUT.
 */
const AWAITED_ON_DEADLINE = new Set<StageType>([StageType.CanaryAnalysis, StageType.Cutover, StageType.Cleanup]);

class DeadlineError extends Error {
  constructor(public timeoutMs: number) {
    super(`Stage exceeded its deadline of ${timeoutMs}ms`);
    this.name = 'DeadlineError';
  }
}

export class StageRunner {
  constructor(
    private handlers: Pick<StageHandlers, 'execute'>,
    private options: StageRunnerOptions,
  ) {}

  /**
   * Run a stage to completion, suspension or failure.
   * @param startedAt when the stage entered RUNNING; the first deadline counts from it
   * @param previousAttempts attempts already recorded before a restart
   */
  async run(spec: StageSpec, ctx: StageContext, startedAt: number, previousAttempts = 0): Promise<StageRunResult> {
    const policy = spec.type === StageType.Deploy ? spec.retry ?? this.options.defaultRetry : undefined;
    const maxAttempts = Math.max(policy?.maxAttempts ?? 1, previousAttempts + 1);

    let attempt = previousAttempts;
    let attemptStartedAt = startedAt;
    for (;;) {
      attempt++;
      try {
        const outcome = await this.withDeadline(spec, ctx, attemptStartedAt);
        if (outcome.kind === 'suspended') {
          return { status: StageStatus.Running, attempts: attempt, suspended: outcome.judgment };
        }
        return { status: StageStatus.Succeeded, result: outcome.result, attempts: attempt };
      } catch (err) {
        if (ctx.signal.aborted) {
          throw err instanceof AbortError ? err : new AbortError();
        }

        const error =
          err instanceof DeadlineError
            ? stageTimeoutError(spec.id, err.timeoutMs)
            : { ...toTypedError(err, 'STAGE.EXECUTION_ERROR'), stageId: spec.id };
        const withAttempt: TypedError = { ...error, details: { ...error.details, attempt } };

        if (policy && error.retryable && attempt < maxAttempts) {
          const delay = computeBackoff(policy.backoffStrategy, policy.backoffBaseMs, attempt);
          ctx.log.warn('Stage attempt failed, retrying', {
            stageId: spec.id,
            attempt,
            maxAttempts,
            delayMs: delay,
            code: error.code,
          });
          await ctx.record('stage.retry', { attempt, code: error.code, message: error.message, delayMs: delay });
          await this.options.clock.sleep(delay, ctx.signal);
          attemptStartedAt = this.options.clock.now();
          continue;
        }

        return {
          status: TIMEOUT_CODES.has(error.code) ? StageStatus.TimedOut : StageStatus.Failed,
          error: withAttempt,
          attempts: attempt,
        };
      }
    }
  }

  private async withDeadline(spec: StageSpec, ctx: StageContext, startedAt: number): Promise<StageOutcome> {
    if (spec.timeoutMs === undefined || SELF_TIMED.has(spec.type)) {
      return this.handlers.execute(spec, ctx);
    }

    const timeoutMs = spec.timeoutMs;
    const remaining = Math.max(0, startedAt + timeoutMs - this.options.clock.now());
    const controller = new AbortController();
    const onParentAbort = () => controller.abort();
    if (ctx.signal.aborted) controller.abort();
    ctx.signal.addEventListener('abort', onParentAbort, { once: true });

    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      controller.abort();
    }, remaining);

    const running = this.handlers.execute(spec, { ...ctx, signal: controller.signal });
    try {
      if (!AWAITED_ON_DEADLINE.has(spec.type)) {
        const deadline = new Promise<never>((_, reject) => {
          controller.signal.addEventListener(
            'abort',
            () => {
              if (expired) reject(new DeadlineError(timeoutMs));
            },
            { once: true },
          );
        });
        return await Promise.race([running, deadline]);
      }
      return await running;
    } catch (err) {
      // A handler that rejects on the deadline's abort still timed out.
      if (expired && !ctx.signal.aborted) throw new DeadlineError(timeoutMs);
      throw err;
    } finally {
      clearTimeout(timer);
      ctx.signal.removeEventListener('abort', onParentAbort);
    }
  }
}

/** Compute backoff delay based on strategy. */
export function computeBackoff(strategy: 'fixed' | 'exponential', baseMs: number, attempt: number): number {
  if (strategy === 'fixed') return baseMs;
  return baseMs * Math.pow(2, attempt - 1);
}
