import { ConcurrencyGate, runWorkerPool } from '../concurrency.js';
import { delay } from './helpers.js';

describe('ConcurrencyGate', () => {
  it('rejects a non-positive limit', () => {
    expect(() => new ConcurrencyGate(0)).toThrow('Concurrency limit must be a positive integer, got: 0');
  });

  it('never runs more tasks than its limit', async () => {
    const gate = new ConcurrencyGate(2);
    let running = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map(value =>
        gate.run(async () => {
          running += 1;
          peak = Math.max(peak, running);
          await delay(5);
          running -= 1;
          return value * 10;
        }),
      ),
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
    expect(gate.getActiveCount()).toBe(0);
    expect(gate.getQueuedCount()).toBe(0);
  });

  it('releases its slot when a task throws', async () => {
    const gate = new ConcurrencyGate(1);

    await expect(gate.run(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(await gate.run(async () => 'next')).toBe('next');
  });
});

describe('runWorkerPool', () => {
  it('keys results by item index whatever the completion order', async () => {
    const outcome = await runWorkerPool(
      [30, 0, 10],
      async (ms, index) => {
        await delay(ms);
        return `item ${index}`;
      },
      { concurrency: 3 },
    );

    expect([...outcome.completed.entries()].sort(([a], [b]) => a - b)).toEqual([
      [0, 'item 0'],
      [1, 'item 1'],
      [2, 'item 2'],
    ]);
    expect(outcome.skipped).toEqual([]);
  });

  it('skips the remaining items once shouldStart turns false', async () => {
    const started: number[] = [];

    const outcome = await runWorkerPool(
      ['a', 'b', 'c', 'd'],
      async (_item, index) => {
        started.push(index);
        return index;
      },
      { concurrency: 1, shouldStart: () => started.length < 2 },
    );

    expect(started).toEqual([0, 1]);
    expect(outcome.skipped).toEqual([2, 3]);
  });

  it('handles an empty list', async () => {
    const outcome = await runWorkerPool([], async () => 1, { concurrency: 4 });

    expect(outcome.completed.size).toBe(0);
    expect(outcome.skipped).toEqual([]);
  });
});
