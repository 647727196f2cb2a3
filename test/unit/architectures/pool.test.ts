import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../src/core/logger.js', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { TaskGroup } from '../../../src/architectures/pool.js';

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

describe('TaskGroup', () => {
  it('returns entries in completion order', async () => {
    const group = new TaskGroup();
    const settled = await group.run([
      { id: 'slow', run: async () => { await sleep(20); return 'slow'; } },
      { id: 'fast', run: async () => 'fast' },
    ]);

    expect(settled.map(s => s.id)).toEqual(['fast', 'slow']);
    expect(settled.map(s => s.index)).toEqual([1, 0]);
    expect(settled.map(s => s.order)).toEqual([0, 1]);
  });

  it('reports rejected units without rejecting the run', async () => {
    const group = new TaskGroup({ maxConcurrency: 1 });
    const settled = await group.run<string>([
      { id: 'bad', run: async () => { throw new Error('broken'); } },
      { id: 'good', run: async () => 'fine' },
    ]);

    const [first, second] = settled;
    expect(first.status).toBe('rejected');
    if (first.status === 'rejected') expect(first.error.message).toBe('broken');
    expect(second.status).toBe('fulfilled');
    if (second.status === 'fulfilled') expect(second.value).toBe('fine');
    expect(group.getStats()).toEqual({ runs: 1, completedUnits: 1, failedUnits: 1 });
  });

  it('caps the number of running units', async () => {
    const group = new TaskGroup({ maxConcurrency: 2 });
    let active = 0;
    let peak = 0;
    const unit = (id: string) => ({
      id,
      run: async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
        return id;
      },
    });
    const settled = await group.run([unit('a'), unit('b'), unit('c'), unit('d'), unit('e')]);

    expect(settled).toHaveLength(5);
    expect(peak).toBe(2);
  });

  it('resolves an empty run immediately', async () => {
    const group = new TaskGroup();

    expect(await group.run([])).toEqual([]);
    expect(group.getStats().runs).toBe(1);
  });

  it('rejects an invalid concurrency cap', () => {
    expect(() => new TaskGroup({ maxConcurrency: 0 })).toThrow('maxConcurrency must be a positive integer, got 0');
    expect(() => new TaskGroup({ maxConcurrency: 1.5 })).toThrow(RangeError);
  });

  it('resets stats', async () => {
    const group = new TaskGroup();
    await group.run([{ id: 'a', run: async () => 'a' }]);
    group.resetStats();

    expect(group.getStats()).toEqual({ runs: 0, completedUnits: 0, failedUnits: 0 });
  });
});
