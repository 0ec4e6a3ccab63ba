import { ConcurrencyLimiter } from './concurrency-limiter.util';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('ConcurrencyLimiter', () => {
  it('should reject a non-positive limit', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(RangeError);
  });

  it('should never run more tasks than the limit', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const gates = [deferred<number>(), deferred<number>(), deferred<number>()];
    const started: number[] = [];

    const runs = gates.map((gate, index) =>
      limiter.run(() => {
        started.push(index);
        return gate.promise;
      }),
    );
    await flush();

    expect(started).toEqual([0, 1]);
    expect(limiter.activeCount).toBe(2);
    expect(limiter.pendingCount).toBe(1);

    gates[0].resolve(0);
    await runs[0];
    await flush();

    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve(1);
    gates[2].resolve(2);

    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2]);
    expect(limiter.activeCount).toBe(0);
  });

  it('should free the slot when a task fails', async () => {
    const limiter = new ConcurrencyLimiter(1);

    await expect(
      limiter.run(() => Promise.reject(new Error('boom'))),
    ).rejects.toThrow('boom');
    await expect(limiter.run(() => Promise.resolve('next'))).resolves.toBe(
      'next',
    );
    expect(limiter.activeCount).toBe(0);
  });
});
