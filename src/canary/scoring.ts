/**
 * Canary scoring.
 *
 * Each metric's canary mean is compared with its baseline mean as a
 * relative deviation, oriented so that a positive value means the canary
 * is worse. Deviations inside the tolerance band score 100, deviations at
 * or past maxDeviation score 0, and the band between is linear. The
 * aggregate is the weight-averaged sub-score of metrics with enough data.
 */

import {
  CanaryConfig,
  CanaryMetricSpec,
  CanaryProgress,
  CanaryResult,
  CanaryVerdict,
  DEFAULT_MAX_MISSING_FRACTION,
  DEFAULT_METRIC_MAX_DEVIATION,
  DEFAULT_METRIC_TOLERANCE,
  MetricDirection,
  MetricSamples,
  MetricScore,
} from '../domain/canary';

const EPSILON = 1e-9;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function mean(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Relative deviation of canary from baseline; positive means worse. */
export function relativeDeviation(baseline: number, canary: number, direction: MetricDirection): number {
  const raw = (canary - baseline) / Math.max(Math.abs(baseline), EPSILON);
  return direction === 'lower-is-better' ? raw : -raw;
}

/** Map a deviation onto 0–100. */
export function subScore(deviation: number, tolerance: number, maxDeviation: number): number {
  if (deviation <= tolerance) return 100;
  if (deviation >= maxDeviation) return 0;
  return round2((100 * (maxDeviation - deviation)) / (maxDeviation - tolerance));
}

export function classify(score: number, passThreshold: number, marginalThreshold: number): CanaryVerdict {
  if (score >= passThreshold) return 'PASS';
  if (score >= marginalThreshold) return 'MARGINAL';
  return 'FAIL';
}

/** Score one metric from its collected per-interval samples. */
export function scoreMetric(spec: CanaryMetricSpec, samples: MetricSamples, maxMissingFraction: number): MetricScore {
  const ticks = Math.max(samples.baseline.length, samples.canary.length);
  const baseline: number[] = [];
  const canary: number[] = [];
  for (let i = 0; i < ticks; i++) {
    const b = samples.baseline[i];
    const c = samples.canary[i];
    if (b !== null && b !== undefined && c !== null && c !== undefined) {
      baseline.push(b);
      canary.push(c);
    }
  }

  const missing = ticks - baseline.length;
  const required = spec.required ?? true;
  const insufficientData = baseline.length === 0 || missing / ticks > maxMissingFraction;
  const base = { name: spec.name, weight: spec.weight, required, samples: baseline.length, missing };

  if (insufficientData) {
    return { ...base, insufficientData: true };
  }

  const baselineMean = mean(baseline) ?? 0;
  const canaryMean = mean(canary) ?? 0;
  const deviation = relativeDeviation(baselineMean, canaryMean, spec.direction);
  return {
    ...base,
    insufficientData: false,
    baselineMean: round2(baselineMean),
    canaryMean: round2(canaryMean),
    deviation: round2(deviation),
    score: subScore(
      deviation,
      spec.tolerance ?? DEFAULT_METRIC_TOLERANCE,
      spec.maxDeviation ?? DEFAULT_METRIC_MAX_DEVIATION,
    ),
  };
}

/** Weighted aggregate and verdict over metric scores. */
export function aggregateScores(
  config: CanaryConfig,
  scores: MetricScore[],
): { score: number; verdict: CanaryVerdict; reason?: 'insufficient-data' } {
  let weighted = 0;
  let totalWeight = 0;
  for (const metric of scores) {
    if (metric.score === undefined) continue;
    weighted += metric.score * metric.weight;
    totalWeight += metric.weight;
  }
  const score = totalWeight > 0 ? round2(weighted / totalWeight) : 0;

  const requiredMissing = scores.some((m) => m.required && m.insufficientData);
  if (requiredMissing || totalWeight === 0) {
    return { score, verdict: 'FAIL', reason: 'insufficient-data' };
  }
  return { score, verdict: classify(score, config.passThreshold, config.marginalThreshold) };
}

/** Build the final result from the samples collected over the window. */
export function evaluateCanary(
  config: CanaryConfig,
  progress: CanaryProgress,
  populations: { baselineServerGroupId: string; canaryServerGroupId: string },
  completedAt: string,
): CanaryResult {
  const maxMissing = config.maxMissingFraction ?? DEFAULT_MAX_MISSING_FRACTION;
  const metrics = config.metrics.map((spec) =>
    scoreMetric(spec, progress.samples[spec.name] ?? { baseline: [], canary: [] }, maxMissing),
  );
  const { score, verdict, reason } = aggregateScores(config, metrics);
  return {
    ...populations,
    metrics,
    score,
    verdict,
    ...(reason ? { reason } : {}),
    startedAt: progress.startedAt,
    completedAt,
  };
}
