import { LogEntry, LogLevel, createLogger, parseLogLevel, resetLogHandler, setLogHandler, setLogLevel } from '../src/logger';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    setLogLevel(LogLevel.Info);
    resetLogHandler();
  });

  test('child loggers carry the context of their parents', () => {
    const log = createLogger({ app: 'rollout-engine' }).child({ component: 'executor' }).child({ executionId: 'exe_1' });
    log.warn('Stage failed, continuing', { stageId: 'smoke' });

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe(LogLevel.Warn);
    expect(entries[0].message).toBe('Stage failed, continuing');
    expect(entries[0].context).toEqual({
      app: 'rollout-engine',
      component: 'executor',
      executionId: 'exe_1',
      stageId: 'smoke',
    });
  });

  test('lines below the minimum level are dropped', () => {
    setLogLevel(LogLevel.Warn);
    const log = createLogger();
    log.debug('polling');
    log.info('started');
    log.error('rollback failed');

    expect(entries.map((e) => e.message)).toEqual(['rollback failed']);
  });

  test('the default handler writes one JSON object per line', () => {
    resetLogHandler();
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      createLogger({ app: 'rollout-engine' }).info('Recovery complete', { resumed: 2 });
      expect(spy).toHaveBeenCalledTimes(1);
      const line: unknown = JSON.parse(String(spy.mock.calls[0][0]));
      expect(line).toMatchObject({ level: 'info', msg: 'Recovery complete', app: 'rollout-engine', resumed: 2 });
    } finally {
      spy.mockRestore();
    }
  });

  test('parseLogLevel accepts any case and rejects unknown names', () => {
    expect(parseLogLevel('WARN')).toBe(LogLevel.Warn);
    expect(parseLogLevel('debug')).toBe(LogLevel.Debug);
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
