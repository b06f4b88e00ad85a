import { describe, it, expect } from 'vitest';
import { InProcessLocationLock } from '../src/capacity/locationLock.js';
import { LockTimeoutError } from '../src/errors/domain.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('InProcessLocationLock', () => {
  it('runs critical sections for one location one at a time, in arrival order', async () => {
    const lock = new InProcessLocationLock(1000);
    const order: string[] = [];
    let active = 0;
    let maxActive = 0;

    const section = (name: string) => async () => {
      active++;
      maxActive = Math.max(maxActive, active);
      order.push(`${name}:start`);
      await tick();
      await tick();
      order.push(`${name}:end`);
      active--;
      return name;
    };

    const results = await Promise.all([
      lock.executeWithLocationLock('room-a', section('first')),
      lock.executeWithLocationLock('room-a', section('second')),
      lock.executeWithLocationLock('room-a', section('third')),
    ]);

    expect(results).toEqual(['first', 'second', 'third']);
    expect(maxActive).toBe(1);
    expect(order).toEqual([
      'first:start',
      'first:end',
      'second:start',
      'second:end',
      'third:start',
      'third:end',
    ]);
  });

  it('lets different locations proceed concurrently', async () => {
    const lock = new InProcessLocationLock(1000);
    const held = deferred();
    let otherRan = false;

    const first = lock.executeWithLocationLock('room-a', async () => {
      await held.promise;
      return otherRan;
    });
    await lock.executeWithLocationLock('room-b', async () => {
      otherRan = true;
    });
    held.resolve();

    await expect(first).resolves.toBe(true);
  });

  it('releases the lock when the critical section throws', async () => {
    const lock = new InProcessLocationLock(1000);

    await expect(
      lock.executeWithLocationLock('room-a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.executeWithLocationLock('room-a', async () => 'next')).resolves.toBe('next');
    await tick();
    expect(lock.activeKeys).toBe(0);
  });

  it('throws LockTimeoutError when the lock is not acquired in time', async () => {
    const lock = new InProcessLocationLock(1000);
    const held = deferred();
    const holder = lock.executeWithLocationLock('room-a', () => held.promise);

    const waiter = lock.executeWithLocationLock('room-a', async () => 'never', { timeoutMs: 20 });
    await expect(waiter).rejects.toBeInstanceOf(LockTimeoutError);
    await expect(waiter).rejects.toMatchObject({ statusCode: 503, code: 'LOCATION_BUSY', locationId: 'room-a' });

    held.resolve();
    await holder;
  });

  it('queues later callers behind the holder, not behind a waiter that gave up', async () => {
    const lock = new InProcessLocationLock(1000);
    const held = deferred();
    let holderDone = false;
    const holder = lock.executeWithLocationLock('room-a', async () => {
      await held.promise;
      holderDone = true;
    });

    await expect(
      lock.executeWithLocationLock('room-a', async () => undefined, { timeoutMs: 10 })
    ).rejects.toBeInstanceOf(LockTimeoutError);

    const late = lock.executeWithLocationLock('room-a', async () => holderDone);
    held.resolve();

    await holder;
    await expect(late).resolves.toBe(true);
  });

  it('stops waiting when the caller aborts', async () => {
    const lock = new InProcessLocationLock(1000);
    const held = deferred();
    const holder = lock.executeWithLocationLock('room-a', () => held.promise);

    const controller = new AbortController();
    let entered = false;
    const waiter = lock.executeWithLocationLock(
      'room-a',
      async () => {
        entered = true;
      },
      { signal: controller.signal }
    );
    controller.abort();

    await expect(waiter).rejects.toHaveProperty('name', 'AbortError');
    held.resolve();
    await holder;
    expect(entered).toBe(false);
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const lock = new InProcessLocationLock(1000);
    const controller = new AbortController();
    controller.abort();

    await expect(
      lock.executeWithLocationLock('room-a', async () => 'ran', { signal: controller.signal })
    ).rejects.toHaveProperty('name', 'AbortError');
    expect(lock.activeKeys).toBe(0);
  });

  it('forgets a location once no one holds or waits for it', async () => {
    const lock = new InProcessLocationLock(1000);
    await lock.executeWithLocationLock('room-a', async () => undefined);
    await tick();
    expect(lock.activeKeys).toBe(0);
  });
});
