/**
 * Canary analysis domain model.
 *
 * A CanaryConfig names the metrics to compare between a baseline and a
 * canary population; a CanaryResult carries the per-metric scores, the
 * weighted aggregate, and the three-way verdict.
 */

/** Which way a metric should move for the canary to look healthy. */
export type MetricDirection = 'lower-is-better' | 'higher-is-better';

/** A single metric compared during canary analysis. */
export interface CanaryMetricSpec {
  name: string;
  /** Query template handed to the metrics provider. */
  query: string;
  direction: MetricDirection;
  weight: number;
  /** Relative deviation tolerated before the sub-score drops. Default 0.1. */
  tolerance?: number;
  /** Relative deviation at which the sub-score reaches 0. Default 0.5. */
  maxDeviation?: number;
  /** Whether insufficient data for this metric fails the analysis. Default true. */
  required?: boolean;
}

/** Canary analysis configuration. */
export interface CanaryConfig {
  metrics: CanaryMetricSpec[];
  intervalMs: number;
  durationMs: number;
  passThreshold: number;
  marginalThreshold: number;
  /** Fraction of intervals a metric may miss before it has insufficient data. Default 0.25. */
  maxMissingFraction?: number;
}

export type CanaryVerdict = 'PASS' | 'MARGINAL' | 'FAIL';

/** Per-metric comparison outcome. */
export interface MetricScore {
  name: string;
  weight: number;
  required: boolean;
  /** 0–100; absent when the metric had insufficient data. */
  score?: number;
  baselineMean?: number;
  canaryMean?: number;
  /** Relative deviation, positive meaning the canary is worse. */
  deviation?: number;
  samples: number;
  missing: number;
  insufficientData: boolean;
}

/** Outcome of a canary analysis. */
export interface CanaryResult {
  baselineServerGroupId: string;
  canaryServerGroupId: string;
  metrics: MetricScore[];
  /** Weighted aggregate 0–100. */
  score: number;
  verdict: CanaryVerdict;
  reason?: 'insufficient-data';
  startedAt: string;
  completedAt: string;
}

/** Paired samples collected for one metric. */
export interface MetricSamples {
  baseline: Array<number | null>;
  canary: Array<number | null>;
}

/** Resume checkpoint for a long canary window. */
export interface CanaryProgress {
  startedAt: string;
  ticksCompleted: number;
  samples: Record<string, MetricSamples>;
}

export const DEFAULT_METRIC_TOLERANCE = 0.1;
export const DEFAULT_METRIC_MAX_DEVIATION = 0.5;
export const DEFAULT_MAX_MISSING_FRACTION = 0.25;
