import { AuditLedger } from '../../src/audit/audit-ledger';
import { ManualClock } from '../../src/clock';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';

describe('AuditLedger', () => {
  let store: Store;
  let clock: ManualClock;
  let ledger: AuditLedger;

  beforeEach(() => {
    store = createMemoryStore();
    clock = new ManualClock();
    ledger = new AuditLedger(store, clock);
  });

  test('sequences records per execution starting at 1', async () => {
    const first = await ledger.append({ executionId: 'exe_1', service: 'checkout', event: 'execution.created', actor: 'system' });
    const second = await ledger.append({ executionId: 'exe_1', service: 'checkout', event: 'execution.started', actor: 'system' });
    const other = await ledger.append({ executionId: 'exe_2', service: 'checkout', event: 'execution.created', actor: 'system' });

    expect(first.sequence).toBe(1);
    expect(second.sequence).toBe(2);
    expect(other.sequence).toBe(1);
    expect(first.id).toMatch(/^aud_/);
  });

  test('stamps records with the clock and defaults the payload', async () => {
    const record = await ledger.append({ executionId: 'exe_1', service: 'checkout', event: 'execution.created', actor: 'alice' });
    expect(record.timestamp).toBe('2026-01-01T00:00:00.000Z');
    expect(record.payload).toEqual({});
    expect(record.actor).toBe('alice');
  });

  test('concurrent appends stay gap-free and ordered by call', async () => {
    const events = ['stage.started', 'stage.status', 'stage.retry', 'canary.sample', 'canary.verdict'] as const;
    await Promise.all(
      events.map((event, i) =>
        ledger.append({ executionId: 'exe_1', service: 'checkout', stageId: `s${i}`, event, actor: 'system' }),
      ),
    );
    const history = await ledger.history('exe_1');
    expect(history.map((r) => r.sequence)).toEqual([1, 2, 3, 4, 5]);
    expect(history.map((r) => r.event)).toEqual([...events]);
  });

  test('a failed append does not block the next one', async () => {
    const original = store.audit.append.bind(store.audit);
    let failures = 1;
    store.audit.append = async (record) => {
      if (failures > 0) {
        failures--;
        throw new Error('disk full');
      }
      return original(record);
    };

    await expect(
      ledger.append({ executionId: 'exe_1', service: 'checkout', event: 'execution.created', actor: 'system' }),
    ).rejects.toThrow('disk full');
    const record = await ledger.append({ executionId: 'exe_1', service: 'checkout', event: 'execution.started', actor: 'system' });
    expect(record.sequence).toBe(1);
  });

  test('historyForService spans executions', async () => {
    await ledger.append({ executionId: 'exe_1', service: 'checkout', event: 'execution.created', actor: 'system' });
    await ledger.append({ executionId: 'exe_2', service: 'payments', event: 'execution.created', actor: 'system' });
    await ledger.append({ executionId: 'exe_3', service: 'checkout', event: 'execution.created', actor: 'system' });
    const records = await ledger.historyForService('checkout');
    expect(records.map((r) => r.executionId)).toEqual(['exe_1', 'exe_3']);
  });

  test('findExecutionFor matches the artifact of execution.created', async () => {
    await ledger.append({
      executionId: 'exe_1',
      service: 'checkout',
      event: 'execution.created',
      actor: 'trigger',
      payload: { artifactId: 'checkout:1.4.0' },
    });
    expect(await ledger.findExecutionFor('checkout', 'checkout:1.4.0')).toBe('exe_1');
    expect(await ledger.findExecutionFor('checkout', 'checkout:1.5.0')).toBeNull();
    expect(await ledger.findExecutionFor('payments', 'checkout:1.4.0')).toBeNull();
  });

  test('reference points at the execution audit route', () => {
    expect(ledger.reference('exe_1')).toBe('/api/v1/executions/exe_1/audit');
  });
});
