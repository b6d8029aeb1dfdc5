import { runBounded } from '../../../src/application/services/ProbePool';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('runBounded', () => {
  it('should keep results in input order', async () => {
    const delays = [30, 5, 15, 0];

    const results = await runBounded(delays, 2, async (ms, i) => {
      await new Promise(r => setTimeout(r, ms));
      return `item-${i}`;
    });

    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
  });

  it('should never exceed the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await runBounded(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(r => setTimeout(r, 2));
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it('should start the next item as soon as a slot frees up', async () => {
    const slow = deferred<void>();
    const started: number[] = [];

    const run = runBounded([0, 1, 2], 2, async i => {
      started.push(i);
      if (i === 0) await slow.promise;
    });

    await new Promise(r => setTimeout(r, 10));
    expect(started).toEqual([0, 1, 2]);

    slow.resolve();
    await run;
  });

  it('should handle an empty list', async () => {
    await expect(runBounded([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('should reject with the first worker error', async () => {
    await expect(
      runBounded([1, 2, 3], 1, async n => {
        if (n === 2) throw new Error('boom');
        return n;
      })
    ).rejects.toThrow('boom');
  });
});
