/**
 * Trigger Dispatcher — turns newly published artifacts into executions.
 *
 * Polls the artifact registry for every registered service and hands each
 * new artifact to the executor's single instantiation entry point, which
 * makes repeated polls of the same artifact a no-op. Manual triggers go
 * through the same entry point.
 */

import { ArtifactRegistry } from '../adapters/interfaces';
import { Artifact, ArtifactSelector } from '../domain/artifact';
import { TypedError, toTypedError, triggerError } from '../domain/errors';
import { Actor } from '../domain/execution';
import { InstantiateResult, PipelineExecutor } from '../engine/executor';
import { Logger, logger as rootLogger } from '../logger';

export interface DispatcherOptions {
  /** Interval between registry polls. */
  pollIntervalMs: number;
}

/** Per-service result of one poll. */
export interface PollResult {
  service: string;
  artifactId?: string;
  executionId?: string;
  created: boolean;
  error?: TypedError;
}

const TRIGGER_ACTOR: Actor = { kind: 'system', id: 'trigger' };

export class TriggerDispatcher {
  private selectors = new Map<string, ArtifactSelector>();
  private timer?: NodeJS.Timeout;
  private polling?: Promise<PollResult[]>;
  private log: Logger;

  constructor(
    private registry: ArtifactRegistry,
    private executor: PipelineExecutor,
    private options: DispatcherOptions,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'trigger' });
  }

  /** Watch a service's artifacts; a later call replaces its selector. */
  register(service: string, selector: Omit<ArtifactSelector, 'service'> = {}): void {
    this.selectors.set(service, { ...selector, service });
    this.log.info('Service registered for polling', { service, channel: selector.channel });
  }

  unregister(service: string): boolean {
    return this.selectors.delete(service);
  }

  registeredServices(): string[] {
    return [...this.selectors.keys()];
  }

  /**
   * Poll every registered service once, then sweep expired judgment gates.
   * A failing service does not stop the others; it is polled again next time.
   */
  async pollOnce(): Promise<PollResult[]> {
    const results: PollResult[] = [];
    for (const selector of this.selectors.values()) {
      results.push(await this.pollService(selector));
    }
    try {
      await this.executor.expireJudgments();
    } catch (err) {
      const error = toTypedError(err);
      this.log.error('Judgment expiry sweep failed', { code: error.code, error: error.message });
    }
    return results;
  }

  /** Instantiate and start an execution for an explicitly chosen artifact. */
  async trigger(service: string, artifact: Artifact, actor: Actor): Promise<InstantiateResult> {
    const result = await this.executor.instantiate(service, artifact, actor);
    if (result.created) {
      this.executor.launch(result.execution.id);
    }
    this.log.info('Manual trigger', {
      service,
      artifactId: artifact.id,
      executionId: result.execution.id,
      created: result.created,
      actor: actor.id,
    });
    return result;
  }

  /** Poll on the configured interval until stop(). */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.options.pollIntervalMs);
    this.log.info('Trigger dispatcher started', { pollIntervalMs: this.options.pollIntervalMs });
  }

  /** Stop polling and wait for a poll already under way. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.log.info('Trigger dispatcher stopped');
    }
    if (this.polling) await this.polling;
  }

  private tick(): void {
    // Skip a tick while the previous poll is still running.
    if (this.polling) return;
    this.polling = this.pollOnce()
      .catch((err) => {
        this.log.error('Poll failed', { error: err instanceof Error ? err.message : String(err) });
        return [];
      })
      .finally(() => {
        this.polling = undefined;
      });
  }

  private async pollService(selector: ArtifactSelector): Promise<PollResult> {
    const service = selector.service;

    let artifact: Artifact | null;
    try {
      artifact = await this.registry.latest(selector);
    } catch (err) {
      const error = triggerError(service, err instanceof Error ? err.message : String(err));
      this.log.warn('Registry poll failed, retrying next poll', { service, code: error.code, error: error.message });
      return { service, created: false, error };
    }
    if (!artifact) return { service, created: false };

    try {
      const { execution, created } = await this.executor.instantiate(service, artifact, TRIGGER_ACTOR);
      if (created) {
        this.log.info('New artifact detected', { service, artifactId: artifact.id, executionId: execution.id });
        this.executor.launch(execution.id);
      }
      return { service, artifactId: artifact.id, executionId: execution.id, created };
    } catch (err) {
      const error = toTypedError(err, 'TRIGGER.INSTANTIATE_FAILED');
      this.log.error('Could not instantiate execution', {
        service,
        artifactId: artifact.id,
        code: error.code,
        error: error.message,
      });
      return { service, artifactId: artifact.id, created: false, error };
    }
  }
}
