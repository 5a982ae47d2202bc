import { describe, it, expect } from 'vitest';
import { parallel, parallelMap } from '../../src/utils/parallel.js';
import { ValidationError } from '../../src/core/errors.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('parallel', () => {
  it('returns results in input order', async () => {
    const results = await parallel([
      async () => {
        await delay(10);
        return 'slow';
      },
      async () => 'fast',
    ]);

    expect(results).toEqual([
      { index: 0, success: true, value: 'slow' },
      { index: 1, success: true, value: 'fast' },
    ]);
  });

  it('records failures without stopping the rest', async () => {
    const results = await parallel<number>([
      async () => 1,
      async () => {
        throw new Error('boom');
      },
      async () => 3,
    ]);

    expect(results.map((r) => r.success)).toEqual([true, false, true]);
    const failed = results[1];
    expect(failed && !failed.success ? failed.error.message : undefined).toBe('boom');
  });

  it('wraps non-Error rejections', async () => {
    const [result] = await parallel([() => Promise.reject('plain')]);
    expect(result && !result.success ? result.error.message : undefined).toBe('plain');
  });

  it('respects the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const op = async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    };

    await parallel(Array.from({ length: 7 }, () => op), { concurrency: 3 });

    expect(peak).toBe(3);
  });

  it('rejects a concurrency below one', async () => {
    await expect(parallel([async () => 1], { concurrency: 0 })).rejects.toThrow(ValidationError);
  });

  it('handles an empty list', async () => {
    expect(await parallel([])).toEqual([]);
  });
});

describe('parallelMap', () => {
  it('maps items with their index', async () => {
    const results = await parallelMap(['a', 'b'], async (item, index) => `${item}${index}`, { concurrency: 1 });
    expect(results.map((r) => (r.success ? r.value : null))).toEqual(['a0', 'b1']);
  });
});
