import {
  EngineError,
  apiError,
  createTypedError,
  cutoverFailureError,
  deployError,
  rollbackFailureError,
  stageTimeoutError,
  toTypedError,
  triggerError,
} from '../../src/domain/errors';

describe('createTypedError', () => {
  test('fills defaults', () => {
    const error = createTypedError({ code: 'STAGE.FAILED', message: 'boom' });
    expect(error).toEqual({
      code: 'STAGE.FAILED',
      message: 'boom',
      stageId: undefined,
      executionId: undefined,
      retryable: false,
      details: undefined,
      suggestedFixes: [],
    });
  });
});

describe('toTypedError', () => {
  test('unwraps an EngineError', () => {
    const typed = triggerError('checkout', 'connection refused');
    expect(toTypedError(new EngineError(typed))).toBe(typed);
  });

  test('wraps a plain Error under the fallback code', () => {
    const error = toTypedError(new Error('socket hang up'), 'DEPLOY.APPLY_REJECTED');
    expect(error.code).toBe('DEPLOY.APPLY_REJECTED');
    expect(error.message).toBe('socket hang up');
    expect(error.retryable).toBe(false);
  });

  test('wraps a non-error value', () => {
    const error = toTypedError('nope');
    expect(error.code).toBe('SYSTEM.INTERNAL');
    expect(error.message).toBe('nope');
  });
});

describe('error factories', () => {
  test('triggerError is retryable and names the service', () => {
    const error = triggerError('checkout', 'timeout');
    expect(error.code).toBe('TRIGGER.REGISTRY_UNREACHABLE');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ service: 'checkout' });
  });

  test('deployError suggests inspecting the deploy spec', () => {
    const error = deployError('deploy-canary', 'quota exceeded', 2);
    expect(error.code).toBe('DEPLOY.APPLY_REJECTED');
    expect(error.stageId).toBe('deploy-canary');
    expect(error.message).toBe('Deploy spec rejected by infrastructure: quota exceeded');
    expect(error.suggestedFixes).toEqual([{ type: 'INSPECT_DEPLOY_SPEC', params: { stageId: 'deploy-canary' } }]);
  });

  test('stageTimeoutError suggests doubling the deadline', () => {
    const error = stageTimeoutError('smoke', 30_000);
    expect(error.code).toBe('STAGE.TIMEOUT');
    expect(error.suggestedFixes[0]).toEqual({ type: 'INCREASE_TIMEOUT', params: { timeoutMs: 60_000 } });
  });

  test('cutoverFailureError carries intended and observed weights', () => {
    const error = cutoverFailureError('checkout', { a: 0, b: 100 }, { a: 50, b: 50 });
    expect(error.code).toBe('CUTOVER.PARTIAL_APPLY');
    expect(error.details).toEqual({ service: 'checkout', intended: { a: 0, b: 100 }, observed: { a: 50, b: 50 } });
  });

  test('rollbackFailureError asks for manual intervention', () => {
    const error = rollbackFailureError('checkout', 'lb offline');
    expect(error.code).toBe('ROLLBACK.FAILED');
    expect(error.suggestedFixes[0].type).toBe('MANUAL_INTERVENTION');
  });

  test('apiError wraps the typed error', () => {
    const error = triggerError('checkout', 'x');
    expect(apiError(error)).toEqual({ error });
  });
});
