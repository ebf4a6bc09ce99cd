import { StateGuard } from './StateGuard';
import { flushAsync } from '../../testing/fakes';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('StateGuard', () => {
  let guard: StateGuard;

  beforeEach(() => {
    guard = new StateGuard();
  });

  it('should return the task result', async () => {
    await expect(guard.runExclusive(() => 42)).resolves.toBe(42);
  });

  it('should not start a task until the previous one has settled', async () => {
    const events: string[] = [];
    const gate = deferred();

    const first = guard.runExclusive(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = guard.runExclusive(() => {
      events.push('second');
    });

    await flushAsync();
    expect(events).toEqual(['first:start']);
    expect(guard.isHeld).toBe(true);
    expect(guard.pending).toBe(1);

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(guard.isHeld).toBe(false);
    expect(guard.pending).toBe(0);
  });

  it('should run tasks in acquisition order', async () => {
    const order: number[] = [];

    await Promise.all([1, 2, 3, 4].map((n) => guard.runExclusive(async () => {
      await flushAsync();
      order.push(n);
    })));

    expect(order).toEqual([1, 2, 3, 4]);
  });

  it('should release the lock when a task fails', async () => {
    const failing = guard.runExclusive(() => {
      throw new Error('boom');
    });
    const next = guard.runExclusive(() => 'still runs');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('still runs');
    expect(guard.isHeld).toBe(false);
  });

  it('should report being held only inside a task', async () => {
    expect(guard.isHeld).toBe(false);

    const inside = await guard.runExclusive(() => guard.isHeld);

    expect(inside).toBe(true);
    expect(guard.isHeld).toBe(false);
  });
});
