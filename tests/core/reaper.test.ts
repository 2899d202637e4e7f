import { describe, expect, it, vi } from 'vitest';

import { reapProcessTree, terminatePids } from '../../src/core/reaper.js';
import { fakeProcessTable } from '../helpers/fakes.js';

describe('terminatePids', () => {
  it('sends SIGTERM once per live pid and nothing more when they exit', async () => {
    const { table, kills } = fakeProcessTable({ 1: [10, 11] });
    const sleep = vi.fn().mockResolvedValue(undefined);

    const result = await terminatePids([10, 11, 10], { table, graceMs: 300, sleep });

    expect(result).toEqual({ terminated: [10, 11], killed: [] });
    expect(kills).toEqual([
      [10, 'SIGTERM'],
      [11, 'SIGTERM'],
    ]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('skips pids that are already gone', async () => {
    const { table, kills } = fakeProcessTable({ 1: [10] });

    const result = await terminatePids([10, 99], { table, graceMs: 0 });

    expect(result).toEqual({ terminated: [10], killed: [] });
    expect(kills).toEqual([[10, 'SIGTERM']]);
  });

  it('polls through the grace period, then SIGKILLs survivors', async () => {
    const { table, kills, alive } = fakeProcessTable({ 1: [10, 11] }, [11]);
    const sleep = vi.fn().mockResolvedValue(undefined);

    const result = await terminatePids([10, 11], { table, graceMs: 300, pollMs: 100, sleep });

    expect(result).toEqual({ terminated: [10, 11], killed: [11] });
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(kills.at(-1)).toEqual([11, 'SIGKILL']);
    expect(alive.has(11)).toBe(false);
  });

  it('is a no-op for an empty list', async () => {
    const { table, kills } = fakeProcessTable({});
    await expect(terminatePids([], { table })).resolves.toEqual({ terminated: [], killed: [] });
    expect(kills).toEqual([]);
  });
});

describe('reapProcessTree', () => {
  it('terminates the descendants and leaves the root alone by default', async () => {
    const { table, alive } = fakeProcessTable({ 1: [10, 11] });

    const result = await reapProcessTree(1, { table, graceMs: 0 });

    expect(result.terminated).toEqual([10, 11]);
    expect(alive.has(1)).toBe(true);
  });

  it('includes the root when asked to', async () => {
    const { table, alive } = fakeProcessTable({ 1: [10] });

    const result = await reapProcessTree(1, { table, graceMs: 0, includeRoot: true });

    expect(result.terminated).toEqual([10, 1]);
    expect(alive.size).toBe(0);
  });
});
