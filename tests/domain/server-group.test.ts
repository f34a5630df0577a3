import { weightsEqual } from '../../src/domain/server-group';
import { flattenStages, isParallelGroup, PipelineEntry, StageType } from '../../src/domain/pipeline';

describe('weightsEqual', () => {
  test('equal maps', () => {
    expect(weightsEqual({ a: 90, b: 10 }, { b: 10, a: 90 })).toBe(true);
  });

  test('absent and zero entries are alike', () => {
    expect(weightsEqual({ a: 100, b: 0 }, { a: 100 })).toBe(true);
    expect(weightsEqual({ a: 100 }, { a: 100, c: 0 })).toBe(true);
  });

  test('different weights', () => {
    expect(weightsEqual({ a: 50, b: 50 }, { a: 100, b: 0 })).toBe(false);
  });

  test('non-zero entry missing on one side', () => {
    expect(weightsEqual({ a: 90, b: 10 }, { a: 90 })).toBe(false);
  });
});

describe('pipeline entries', () => {
  test('flattenStages keeps definition order across parallel groups', () => {
    const list: PipelineEntry[] = [
      { id: 'wait-1', type: StageType.Wait, durationMs: 10, onFailure: 'ABORT' },
      {
        type: 'parallel',
        id: 'checks',
        stages: [
          { id: 'wait-2', type: StageType.Wait, durationMs: 10, onFailure: 'ABORT' },
          { id: 'wait-3', type: StageType.Wait, durationMs: 10, onFailure: 'CONTINUE' },
        ],
      },
      { id: 'wait-4', type: StageType.Wait, durationMs: 10, onFailure: 'ABORT' },
    ];
    expect(flattenStages(list).map((s) => s.id)).toEqual(['wait-1', 'wait-2', 'wait-3', 'wait-4']);
    expect(list.map(isParallelGroup)).toEqual([false, true, false]);
  });
});
