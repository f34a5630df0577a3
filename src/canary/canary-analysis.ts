/**
 * Canary Analysis Engine.
 *
 * Samples baseline and canary populations over the same window every
 * interval until the configured duration elapses, then scores the
 * comparison. A failed query is a missing sample, never a hard error.
 * The window always runs to its end; there is no early verdict. Aborting
 * the signal abandons an in-flight query. Progress is reported after every
 * tick so a long window can resume from its checkpoint after a restart.
 */

import { MetricsProvider, TimeWindow } from '../adapters/interfaces';
import { Clock, abortable, isoNow, systemClock } from '../clock';
import { CanaryConfig, CanaryProgress, CanaryResult, MetricSamples } from '../domain/canary';
import { Logger, logger as rootLogger } from '../logger';
import { evaluateCanary, mean } from './scoring';

export interface CanaryAnalysisRequest {
  service: string;
  baselineServerGroupId: string;
  canaryServerGroupId: string;
  config: CanaryConfig;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
  /** Resume from a persisted checkpoint instead of starting over. */
  checkpoint?: CanaryProgress;
  /** Called after every completed tick with the updated progress. */
  onProgress?: (progress: CanaryProgress) => Promise<void>;
}

export class CanaryAnalysisEngine {
  private log: Logger;

  constructor(
    private metrics: MetricsProvider,
    private clock: Clock = systemClock,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'canary-analysis' });
  }

  async analyze(request: CanaryAnalysisRequest, options: AnalyzeOptions = {}): Promise<CanaryResult> {
    const { config } = request;
    const totalTicks = Math.max(1, Math.floor(config.durationMs / config.intervalMs));
    const progress: CanaryProgress = options.checkpoint
      ? structuredClone(options.checkpoint)
      : { startedAt: isoNow(this.clock), ticksCompleted: 0, samples: {} };

    for (const metric of config.metrics) {
      progress.samples[metric.name] ??= { baseline: [], canary: [] };
    }

    while (progress.ticksCompleted < totalTicks) {
      await this.clock.sleep(config.intervalMs, options.signal);
      const end = this.clock.now();
      const window: TimeWindow = { start: end - config.intervalMs, end };

      const tick = await abortable(
        Promise.all(
          config.metrics.map(async (metric) => {
            const [baseline, canary] = await Promise.all([
              this.sample(metric.query, request.service, request.baselineServerGroupId, window),
              this.sample(metric.query, request.service, request.canaryServerGroupId, window),
            ]);
            return { name: metric.name, baseline, canary };
          }),
        ),
        options.signal,
      );
      for (const { name, baseline, canary } of tick) {
        const samples: MetricSamples = progress.samples[name];
        samples.baseline.push(baseline);
        samples.canary.push(canary);
      }

      progress.ticksCompleted++;
      if (options.onProgress) await options.onProgress(progress);
    }

    const result = evaluateCanary(
      config,
      progress,
      {
        baselineServerGroupId: request.baselineServerGroupId,
        canaryServerGroupId: request.canaryServerGroupId,
      },
      isoNow(this.clock),
    );
    this.log.info('Canary analysis complete', {
      service: request.service,
      canary: request.canaryServerGroupId,
      score: result.score,
      verdict: result.verdict,
      reason: result.reason,
    });
    return result;
  }

  private async sample(
    query: string,
    service: string,
    serverGroupId: string,
    window: TimeWindow,
  ): Promise<number | null> {
    try {
      const series = await this.metrics.query(query, { service, serverGroupId }, window);
      return mean(series) ?? null;
    } catch (err) {
      this.log.warn('Metric sample missing', {
        service,
        serverGroupId,
        query,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }
}
