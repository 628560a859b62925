import { mapConcurrent } from './concurrency.js';

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('mapConcurrent', () => {
  it('keeps input order in the results', async () => {
    const results = await mapConcurrent([30, 10, 20], 3, async (ms) => {
      await new Promise((r) => {
        setTimeout(r, ms);
      });
      return ms * 2;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 60 },
      { status: 'fulfilled', value: 20 },
      { status: 'fulfilled', value: 40 },
    ]);
  });

  it('never runs more than the limit at once', async () => {
    const gates = [deferred(), deferred(), deferred(), deferred()];
    let active = 0;
    let peak = 0;

    const run = mapConcurrent(gates, 2, async (gate) => {
      active += 1;
      peak = Math.max(peak, active);
      await gate.promise;
      active -= 1;
    });
    gates.forEach((g) => g.resolve());
    await run;

    expect(peak).toBe(2);
  });

  it('settles rejections without stopping the rest', async () => {
    const results = await mapConcurrent(['a', 'b'], 1, async (item) => {
      if (item === 'a') throw new Error('boom');
      return item;
    });

    expect(results[0]).toMatchObject({ status: 'rejected', reason: new Error('boom') });
    expect(results[1]).toEqual({ status: 'fulfilled', value: 'b' });
  });

  it('handles an empty list', async () => {
    await expect(mapConcurrent([], 4, async () => 1)).resolves.toEqual([]);
  });
});
