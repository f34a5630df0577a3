import { KeyedMutex } from '../../src/cutover/keyed-mutex';

describe('KeyedMutex', () => {
  test('serializes holders of the same key', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    const first = await mutex.acquire('checkout');
    const second = mutex.acquire('checkout').then((release) => {
      order.push('second acquired');
      release();
    });
    await new Promise((resolve) => setImmediate(resolve));
    order.push('first releasing');
    first();
    await second;

    expect(order).toEqual(['first releasing', 'second acquired']);
    expect(mutex.isLocked('checkout')).toBe(false);
  });

  test('different keys do not contend', async () => {
    const mutex = new KeyedMutex();
    const a = await mutex.acquire('checkout');
    const b = await mutex.acquire('payments');
    expect(mutex.isLocked('checkout')).toBe(true);
    expect(mutex.isLocked('payments')).toBe(true);
    a();
    b();
    expect(mutex.isLocked('checkout')).toBe(false);
  });

  test('tryAcquire returns null while the key is held', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('checkout');
    expect(await mutex.tryAcquire('checkout')).toBeNull();
    release();
    const again = await mutex.tryAcquire('checkout');
    expect(again).not.toBeNull();
    again?.();
  });

  test('releasing twice is harmless', async () => {
    const mutex = new KeyedMutex();
    const release = await mutex.acquire('checkout');
    release();
    release();
    const next = await mutex.acquire('checkout');
    expect(mutex.isLocked('checkout')).toBe(true);
    next();
  });
});
