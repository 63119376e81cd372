import { runWithConcurrency } from './concurrency';

describe('runWithConcurrency', () => {
  it('should return results in input order', async () => {
    const delays = [30, 0, 10];
    const results = await runWithConcurrency(delays, 3, async (ms, index) => {
      await new Promise(resolve => setTimeout(resolve, ms));
      return index * 10;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 0 },
      { status: 'fulfilled', value: 10 },
      { status: 'fulfilled', value: 20 },
    ]);
  });

  it('should keep going after a worker rejects', async () => {
    const failure = new Error('boom');
    const results = await runWithConcurrency(['a', 'b', 'c'], 1, async item => {
      if (item === 'b') throw failure;
      return item.toUpperCase();
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 'A' },
      { status: 'rejected', reason: failure },
      { status: 'fulfilled', value: 'C' },
    ]);
  });

  it('should never exceed the limit', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const worker = jest.fn(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise(resolve => setImmediate(resolve));
      inFlight--;
    });

    await runWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, worker);

    expect(worker).toHaveBeenCalledTimes(7);
    expect(maxInFlight).toBe(3);
  });

  it('should run sequentially when the limit is below one', async () => {
    const order: string[] = [];
    await runWithConcurrency(['x', 'y'], 0, async item => {
      order.push(`start ${item}`);
      await new Promise(resolve => setImmediate(resolve));
      order.push(`end ${item}`);
    });

    expect(order).toEqual(['start x', 'end x', 'start y', 'end y']);
  });

  it('should resolve to an empty array for no items', async () => {
    const worker = jest.fn(async () => 1);

    await expect(runWithConcurrency([], 4, worker)).resolves.toEqual([]);
    expect(worker).not.toHaveBeenCalled();
  });
});
