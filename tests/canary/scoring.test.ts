import {
  aggregateScores,
  classify,
  evaluateCanary,
  mean,
  relativeDeviation,
  scoreMetric,
  subScore,
} from '../../src/canary/scoring';
import { CanaryConfig, CanaryMetricSpec, MetricScore } from '../../src/domain/canary';

const ERRORS: CanaryMetricSpec = { name: 'errors', query: 'errors', direction: 'lower-is-better', weight: 1 };

function config(metrics: CanaryMetricSpec[]): CanaryConfig {
  return { metrics, intervalMs: 60_000, durationMs: 240_000, passThreshold: 90, marginalThreshold: 75 };
}

function scored(name: string, score: number | undefined, weight: number, required = true): MetricScore {
  return {
    name,
    weight,
    required,
    score,
    samples: score === undefined ? 0 : 4,
    missing: score === undefined ? 4 : 0,
    insufficientData: score === undefined,
  };
}

describe('mean', () => {
  test('averages values', () => {
    expect(mean([1, 2, 3, 6])).toBe(3);
  });

  test('undefined for no values', () => {
    expect(mean([])).toBeUndefined();
  });
});

describe('relativeDeviation', () => {
  test('lower-is-better: a higher canary is worse', () => {
    expect(relativeDeviation(100, 110, 'lower-is-better')).toBeCloseTo(0.1);
  });

  test('higher-is-better: a lower canary is worse', () => {
    expect(relativeDeviation(100, 80, 'higher-is-better')).toBeCloseTo(0.2);
  });

  test('improvement is negative', () => {
    expect(relativeDeviation(100, 90, 'lower-is-better')).toBeCloseTo(-0.1);
  });

  test('zero baseline does not divide by zero', () => {
    expect(Number.isFinite(relativeDeviation(0, 1, 'lower-is-better'))).toBe(true);
  });
});

describe('subScore', () => {
  test('inside the tolerance band scores 100', () => {
    expect(subScore(0.1, 0.1, 0.5)).toBe(100);
    expect(subScore(-0.4, 0.1, 0.5)).toBe(100);
  });

  test('at or past maxDeviation scores 0', () => {
    expect(subScore(0.5, 0.1, 0.5)).toBe(0);
    expect(subScore(2, 0.1, 0.5)).toBe(0);
  });

  test('linear in between', () => {
    expect(subScore(0.3, 0.1, 0.5)).toBe(50);
    expect(subScore(0.18, 0.1, 0.5)).toBe(80);
  });
});

describe('classify', () => {
  test('thresholds are inclusive', () => {
    expect(classify(90, 90, 75)).toBe('PASS');
    expect(classify(89.99, 90, 75)).toBe('MARGINAL');
    expect(classify(75, 90, 75)).toBe('MARGINAL');
    expect(classify(74.99, 90, 75)).toBe('FAIL');
  });
});

describe('scoreMetric', () => {
  test('scores paired samples', () => {
    const score = scoreMetric(ERRORS, { baseline: [100, 100, 100, 100], canary: [130, 130, 130, 130] }, 0.25);
    expect(score).toEqual({
      name: 'errors',
      weight: 1,
      required: true,
      samples: 4,
      missing: 0,
      insufficientData: false,
      baselineMean: 100,
      canaryMean: 130,
      deviation: 0.3,
      score: 50,
    });
  });

  test('a tick missing on either side is unpaired', () => {
    const score = scoreMetric(ERRORS, { baseline: [1, 1, 1, null], canary: [1, 1, 1, 1] }, 0.25);
    expect(score.samples).toBe(3);
    expect(score.missing).toBe(1);
    expect(score.insufficientData).toBe(false);
    expect(score.score).toBe(100);
  });

  test('too many missing ticks is insufficient data', () => {
    const score = scoreMetric(ERRORS, { baseline: [1, 1, null, 1], canary: [1, 1, 1, null] }, 0.25);
    expect(score.missing).toBe(2);
    expect(score.insufficientData).toBe(true);
    expect(score.score).toBeUndefined();
  });

  test('no samples at all is insufficient data', () => {
    expect(scoreMetric(ERRORS, { baseline: [], canary: [] }, 0.25).insufficientData).toBe(true);
  });

  test('per-metric tolerance overrides the default', () => {
    const lenient = { ...ERRORS, tolerance: 0.3 };
    const score = scoreMetric(lenient, { baseline: [100], canary: [125] }, 0.25);
    expect(score.score).toBe(100);
  });
});

describe('aggregateScores', () => {
  test('weighted average of scored metrics', () => {
    const result = aggregateScores(config([ERRORS]), [scored('errors', 100, 3), scored('latency', 50, 1)]);
    expect(result).toEqual({ score: 87.5, verdict: 'MARGINAL' });
  });

  test('a required metric without data fails the analysis', () => {
    const result = aggregateScores(config([ERRORS]), [scored('errors', 100, 1), scored('latency', undefined, 1)]);
    expect(result.verdict).toBe('FAIL');
    expect(result.reason).toBe('insufficient-data');
    expect(result.score).toBe(100);
  });

  test('an optional metric without data is left out', () => {
    const result = aggregateScores(config([ERRORS]), [scored('errors', 95, 1), scored('throughput', undefined, 5, false)]);
    expect(result).toEqual({ score: 95, verdict: 'PASS' });
  });

  test('no scored metric at all fails', () => {
    const result = aggregateScores(config([ERRORS]), [scored('throughput', undefined, 1, false)]);
    expect(result).toEqual({ score: 0, verdict: 'FAIL', reason: 'insufficient-data' });
  });
});

describe('evaluateCanary', () => {
  test('builds the result from collected progress', () => {
    const result = evaluateCanary(
      config([ERRORS]),
      { startedAt: '2026-01-01T00:00:00.000Z', ticksCompleted: 2, samples: { errors: { baseline: [100, 100], canary: [118, 118] } } },
      { baselineServerGroupId: 'sg-base', canaryServerGroupId: 'sg-canary' },
      '2026-01-01T00:02:00.000Z',
    );
    expect(result.score).toBe(80);
    expect(result.verdict).toBe('MARGINAL');
    expect(result.reason).toBeUndefined();
    expect(result.baselineServerGroupId).toBe('sg-base');
    expect(result.canaryServerGroupId).toBe('sg-canary');
    expect(result.completedAt).toBe('2026-01-01T00:02:00.000Z');
  });

  test('a metric with no progress entry has insufficient data', () => {
    const result = evaluateCanary(
      config([ERRORS]),
      { startedAt: '2026-01-01T00:00:00.000Z', ticksCompleted: 0, samples: {} },
      { baselineServerGroupId: 'a', canaryServerGroupId: 'b' },
      '2026-01-01T00:00:00.000Z',
    );
    expect(result.verdict).toBe('FAIL');
    expect(result.reason).toBe('insufficient-data');
  });
});
