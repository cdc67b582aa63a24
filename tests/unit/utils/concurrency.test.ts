import { describe, it, expect } from 'vitest';
import { runPool } from '../../../src/utils/concurrency.js';

const tick = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('runPool', () => {
  it('should keep results in input order', async () => {
    const results = await runPool([30, 10, 20], 3, async (ms, index) => {
      await tick(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('should never exceed the limit', async () => {
    let active = 0;
    let peak = 0;

    await runPool([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await tick(2);
      active--;
    });

    expect(peak).toBe(3);
  });

  it('should handle an empty list', async () => {
    await expect(runPool([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('should run sequentially with a limit of one', async () => {
    const order: string[] = [];

    await runPool(['a', 'b'], 1, async (item) => {
      order.push(`start ${item}`);
      await tick(1);
      order.push(`end ${item}`);
    });

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b']);
  });
});
