import { describe, it, expect } from 'vitest';

import { partitionRange, runWithConcurrency } from '../../../src/utils/concurrency.js';

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('runWithConcurrency', () => {
  it('returns results in input order regardless of completion order', async () => {
    const delays = [30, 5, 20, 1, 10];
    const results = await runWithConcurrency(delays, 3, async (ms, index) => {
      await sleep(ms);
      return index * 10;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 0 },
      { status: 'fulfilled', value: 10 },
      { status: 'fulfilled', value: 20 },
      { status: 'fulfilled', value: 30 },
      { status: 'fulfilled', value: 40 },
    ]);
  });

  it('never exceeds the in-flight cap', async () => {
    let inFlight = 0;
    let peak = 0;
    const items = Array.from({ length: 12 }, (_, i) => i);

    await runWithConcurrency(items, 4, async item => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(item % 3 === 0 ? 8 : 2);
      inFlight--;
    });

    expect(peak).toBe(4);
  });

  it('admits a new unit as soon as one finishes', async () => {
    const started: number[] = [];
    await runWithConcurrency([40, 5, 5, 5], 2, async (ms, index) => {
      started.push(index);
      await sleep(ms);
    });

    // Units 2 and 3 start while unit 0 is still running
    expect(started).toEqual([0, 1, 2, 3]);
  });

  it('captures failures in their own slot', async () => {
    const results = await runWithConcurrency([1, 2, 3], 2, async item => {
      if (item === 2) throw new Error('boom');
      return item;
    });

    expect(results[0]).toEqual({ status: 'fulfilled', value: 1 });
    expect(results[1].status).toBe('rejected');
    expect(results[2]).toEqual({ status: 'fulfilled', value: 3 });
  });

  it('handles an empty input', async () => {
    expect(await runWithConcurrency([], 5, async () => 1)).toEqual([]);
  });

  it('rejects a non-positive limit', async () => {
    await expect(runWithConcurrency([1], 0, async () => 1)).rejects.toThrow('Concurrency limit must be a positive integer');
  });
});

describe('partitionRange', () => {
  it('splits an inclusive range into consecutive batches', () => {
    expect(partitionRange(1, 25, 10)).toEqual([
      { start: 1, end: 10 },
      { start: 11, end: 20 },
      { start: 21, end: 25 },
    ]);
  });

  it('returns one batch for a single block', () => {
    expect(partitionRange(7, 7, 10)).toEqual([{ start: 7, end: 7 }]);
  });
});
