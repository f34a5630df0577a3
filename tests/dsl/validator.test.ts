import { validatePipelineDefinition } from '../../src/dsl/validator';
import { StageType } from '../../src/domain/pipeline';

const ANALYSIS = {
  metrics: [{ name: 'errors', query: 'error_rate', direction: 'lower-is-better' }],
  intervalMs: 60000,
  durationMs: 300000,
  passThreshold: 90,
  marginalThreshold: 75,
};

function validDoc(): Record<string, unknown> {
  return {
    service: 'checkout',
    version: 3,
    stages: [
      { id: 'deploy', type: 'deploy', environment: 'production', role: 'CANDIDATE' },
      {
        type: 'parallel',
        id: 'checks',
        stages: [
          { id: 'health', type: 'health-check', target: { fromStage: 'deploy' }, intervalMs: 1000 },
          { id: 'smoke', type: 'verification-job', target: { fromStage: 'deploy' }, test: { suite: 'smoke' } },
        ],
      },
      { id: 'cutover', type: 'cutover', strategy: 'blue-green', target: { fromStage: 'deploy' } },
    ],
    notifications: { channel: '#deploys' },
  };
}

function codes(raw: unknown): string[] {
  return validatePipelineDefinition(raw, { now: '2026-01-01T00:00:00.000Z' }).errors.map((e) => e.code);
}

describe('validatePipelineDefinition', () => {
  test('accepts a well-formed definition and fills defaults', () => {
    const result = validatePipelineDefinition(validDoc(), { now: '2026-01-01T00:00:00.000Z' });
    expect(result.errors).toEqual([]);
    expect(result.valid).toBe(true);
    expect(result.definition?.createdAt).toBe('2026-01-01T00:00:00.000Z');
    expect(result.definition?.finalizers).toEqual([]);
    expect(result.definition?.stages[0]).toEqual({
      id: 'deploy',
      type: StageType.Deploy,
      environment: 'production',
      role: 'CANDIDATE',
      onFailure: 'ABORT',
    });
  });

  test('rejects a non-object document', () => {
    expect(codes([])).toEqual(['VALIDATION.INVALID_TYPE']);
  });

  test('reports every missing required field', () => {
    expect(codes({})).toEqual([
      'VALIDATION.REQUIRED_FIELD',
      'VALIDATION.REQUIRED_FIELD',
      'VALIDATION.REQUIRED_FIELD',
      'VALIDATION.REQUIRED_FIELD',
    ]);
  });

  test('rejects unknown fields with a removal suggestion', () => {
    const result = validatePipelineDefinition({ ...validDoc(), owner: 'team-a' });
    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe('VALIDATION.UNKNOWN_FIELD');
    expect(result.errors[0].message).toBe('$.owner: is not a recognized field');
    expect(result.errors[0].suggestedFixes[0].type).toBe('REMOVE_FIELD');
  });

  test('rejects an unsupported schema version', () => {
    expect(codes({ ...validDoc(), schemaVersion: '2.0.0' })).toEqual(['VALIDATION.UNSUPPORTED_VERSION']);
    expect(codes({ ...validDoc(), schemaVersion: '1.0.0' })).toEqual([]);
  });

  test('rejects a service name that is not a DNS label', () => {
    expect(codes({ ...validDoc(), service: 'Checkout_API' })).toEqual(['VALIDATION.INVALID_VALUE']);
  });

  test('rejects an empty stage list', () => {
    expect(codes({ ...validDoc(), stages: [] })).toEqual(['VALIDATION.EMPTY_STAGES']);
  });

  test('rejects duplicate stage IDs', () => {
    const doc = validDoc();
    doc.stages = [
      { id: 'pause', type: 'wait', durationMs: 1000 },
      { id: 'pause', type: 'wait', durationMs: 2000 },
    ];
    expect(codes(doc)).toEqual(['VALIDATION.DUPLICATE_STAGE_ID']);
  });

  test('a reference must name an earlier Deploy stage', () => {
    const doc = validDoc();
    doc.stages = [
      { id: 'health', type: 'health-check', target: { fromStage: 'deploy' }, intervalMs: 1000 },
      { id: 'deploy', type: 'deploy', environment: 'production', role: 'CANDIDATE' },
    ];
    const result = validatePipelineDefinition(doc);
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.INVALID_REFERENCE']);
    expect(result.errors[0].stageId).toBe('health');
  });

  test('a reference cannot point at a Deploy in the same parallel group', () => {
    const doc = validDoc();
    doc.stages = [
      {
        type: 'parallel',
        id: 'both',
        stages: [
          { id: 'deploy', type: 'deploy', environment: 'production', role: 'CANDIDATE' },
          { id: 'health', type: 'health-check', target: { fromStage: 'deploy' }, intervalMs: 1000 },
        ],
      },
    ];
    expect(codes(doc)).toEqual(['VALIDATION.INVALID_REFERENCE']);
  });

  test('role references are accepted without a Deploy stage', () => {
    const doc = validDoc();
    doc.stages = [{ id: 'retire', type: 'cleanup', target: { role: 'DISABLED' } }];
    expect(codes(doc)).toEqual([]);
  });

  test('a reference must be exactly one of fromStage or role', () => {
    const doc = validDoc();
    doc.stages = [{ id: 'retire', type: 'cleanup', target: { role: 'DISABLED', fromStage: 'x' } }];
    expect(codes(doc)).toEqual(['VALIDATION.INVALID_REFERENCE']);
  });

  test('judgment and cutover stages cannot run in parallel', () => {
    const doc = validDoc();
    doc.stages = [
      {
        type: 'parallel',
        id: 'gates',
        stages: [
          { id: 'approve', type: 'manual-judgment', prompt: 'Ship?', authorizedActors: ['alice'] },
          { id: 'pause', type: 'wait', durationMs: 1000 },
        ],
      },
    ];
    expect(codes(doc)).toEqual(['VALIDATION.PARALLEL_STAGE_TYPE']);
  });

  test('parallel groups cannot be nested', () => {
    const doc = validDoc();
    doc.stages = [{ type: 'parallel', id: 'outer', stages: [{ type: 'parallel', id: 'inner', stages: [] }] }];
    expect(codes(doc)).toEqual(['VALIDATION.NESTED_PARALLEL']);
  });

  test('canary analysis must use ABORT', () => {
    const doc = validDoc();
    doc.stages = [
      { id: 'deploy', type: 'deploy', environment: 'production', role: 'CANARY' },
      {
        id: 'analysis',
        type: 'canary-analysis',
        baseline: { role: 'ACTIVE' },
        canary: { fromStage: 'deploy' },
        analysis: ANALYSIS,
        onFailure: 'CONTINUE',
      },
    ];
    expect(codes(doc)).toEqual(['VALIDATION.INVALID_POLICY']);
  });

  test('onMarginal judgment needs a judgment gate', () => {
    const doc = validDoc();
    doc.stages = [
      { id: 'deploy', type: 'deploy', environment: 'production', role: 'CANARY' },
      {
        id: 'analysis',
        type: 'canary-analysis',
        baseline: { role: 'ACTIVE' },
        canary: { fromStage: 'deploy' },
        analysis: ANALYSIS,
        onMarginal: 'judgment',
      },
    ];
    expect(codes(doc)).toEqual(['VALIDATION.REQUIRED_FIELD']);
  });

  test('canary analysis thresholds must be ordered', () => {
    const doc = validDoc();
    doc.stages = [
      { id: 'deploy', type: 'deploy', environment: 'production', role: 'CANARY' },
      {
        id: 'analysis',
        type: 'canary-analysis',
        baseline: { role: 'ACTIVE' },
        canary: { fromStage: 'deploy' },
        analysis: { ...ANALYSIS, passThreshold: 70 },
      },
    ];
    const result = validatePipelineDefinition(doc);
    expect(result.errors.map((e) => e.message)).toEqual([
      '$.stages[1].analysis.marginalThreshold: must not exceed passThreshold',
    ]);
  });

  test('duplicate metric names are rejected', () => {
    const doc = validDoc();
    doc.stages = [
      { id: 'deploy', type: 'deploy', environment: 'production', role: 'CANARY' },
      {
        id: 'analysis',
        type: 'canary-analysis',
        baseline: { role: 'ACTIVE' },
        canary: { fromStage: 'deploy' },
        analysis: { ...ANALYSIS, metrics: [...ANALYSIS.metrics, ...ANALYSIS.metrics] },
      },
    ];
    expect(codes(doc)).toEqual(['VALIDATION.DUPLICATE_METRIC']);
  });

  describe('canary-ramp steps', () => {
    function ramp(steps: unknown): Record<string, unknown> {
      const doc = validDoc();
      doc.stages = [
        { id: 'deploy', type: 'deploy', environment: 'production', role: 'CANARY' },
        {
          id: 'ramp',
          type: 'cutover',
          strategy: 'canary-ramp',
          target: { fromStage: 'deploy' },
          baseline: { role: 'ACTIVE' },
          steps,
          analysis: ANALYSIS,
        },
      ];
      return doc;
    }

    test('ascending steps ending at 100 are accepted', () => {
      expect(codes(ramp([10, 50, 100]))).toEqual([]);
    });

    test('steps must end at 100', () => {
      const result = validatePipelineDefinition(ramp([10, 50]));
      expect(result.errors.map((e) => e.message)).toEqual(['$.stages[1].steps: must end at 100']);
      expect(result.errors[0].suggestedFixes).toEqual([{ type: 'APPEND_STEP', params: { weight: 100 } }]);
    });

    test('steps must be strictly ascending', () => {
      expect(validatePipelineDefinition(ramp([50, 10, 100])).errors.map((e) => e.message)).toEqual([
        '$.stages[1].steps: must be strictly ascending',
      ]);
    });

    test('steps must be percentages', () => {
      expect(codes(ramp([0, 100]))).toEqual(['VALIDATION.INVALID_VALUE']);
    });
  });

  test('blue-green rejects canary-ramp fields', () => {
    const doc = validDoc();
    doc.stages = [
      { id: 'deploy', type: 'deploy', environment: 'production', role: 'CANDIDATE' },
      { id: 'cutover', type: 'cutover', strategy: 'blue-green', target: { fromStage: 'deploy' }, steps: [100] },
    ];
    expect(codes(doc)).toEqual(['VALIDATION.UNKNOWN_FIELD']);
  });

  test('deploy retry defaults its backoff', () => {
    const doc = validDoc();
    doc.stages = [{ id: 'deploy', type: 'deploy', environment: 'production', role: 'CANDIDATE', retry: { maxAttempts: 3 } }];
    const result = validatePipelineDefinition(doc);
    expect(result.definition?.stages[0]).toMatchObject({
      retry: { maxAttempts: 3, backoffStrategy: 'exponential', backoffBaseMs: 1000 },
    });
  });

  test('notification events must be known', () => {
    expect(codes({ ...validDoc(), notifications: { channel: '#deploys', events: ['execution.exploded'] } })).toEqual([
      'VALIDATION.INVALID_VALUE',
    ]);
  });

  test('cleanup finalizers must reference a Deploy stage', () => {
    expect(codes({ ...validDoc(), finalizers: [{ type: 'cleanup', target: { fromStage: 'nope' } }] })).toEqual([
      'VALIDATION.INVALID_REFERENCE',
    ]);
    expect(
      codes({
        ...validDoc(),
        finalizers: [
          { type: 'cleanup', target: { fromStage: 'deploy' } },
          { type: 'notify', channel: '#release-log' },
        ],
      }),
    ).toEqual([]);
  });
});
