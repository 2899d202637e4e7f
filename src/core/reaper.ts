import { setTimeout as delay } from 'node:timers/promises';

import pidtree from 'pidtree';

import { TIMEOUTS } from '../config/defaults.js';

// ── Process table ────────────────────────────────────────────

export interface ProcessTable {
  descendants(pid: number): Promise<number[]>;
  isAlive(pid: number): boolean;
  kill(pid: number, signal: NodeJS.Signals): void;
}

export const systemProcessTable: ProcessTable = {
  async descendants(pid: number): Promise<number[]> {
    try {
      return await pidtree(pid);
    } catch (err) {
      // pidtree rejects when the root itself is already gone.
      if (err instanceof Error && /no matching pid/i.test(err.message)) {
        return [];
      }
      throw err;
    }
  },

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (err) {
      return errnoCode(err) === 'EPERM';
    }
  },

  kill(pid: number, signal: NodeJS.Signals): void {
    try {
      process.kill(pid, signal);
    } catch (err) {
      if (errnoCode(err) !== 'ESRCH') throw err;
    }
  },
};

// ── Reaping ──────────────────────────────────────────────────

export interface ReapOptions {
  table?: ProcessTable;
  graceMs?: number;
  pollMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ReapResult {
  /** Processes that were alive and got SIGTERM. */
  terminated: number[];
  /** Processes still alive after the grace period, sent SIGKILL. */
  killed: number[];
}

/**
 * SIGTERM every live pid, poll until they are gone or the grace
 * period ends, then SIGKILL whatever is left. Dead or empty input
 * is a no-op.
 */
export async function terminatePids(
  pids: readonly number[],
  options: ReapOptions = {},
): Promise<ReapResult> {
  const table = options.table ?? systemProcessTable;
  const graceMs = options.graceMs ?? TIMEOUTS.REAP_GRACE;
  const pollMs = options.pollMs ?? 100;
  const sleep = options.sleep ?? defaultSleep;

  const terminated = [...new Set(pids)].filter((pid) => table.isAlive(pid));
  for (const pid of terminated) {
    table.kill(pid, 'SIGTERM');
  }

  let remaining = terminated.filter((pid) => table.isAlive(pid));
  for (let waited = 0; remaining.length > 0 && waited < graceMs; waited += pollMs) {
    await sleep(pollMs);
    remaining = remaining.filter((pid) => table.isAlive(pid));
  }

  for (const pid of remaining) {
    table.kill(pid, 'SIGKILL');
  }

  return { terminated, killed: remaining };
}

export async function reapProcessTree(
  rootPid: number,
  options: ReapOptions & { includeRoot?: boolean } = {},
): Promise<ReapResult> {
  const table = options.table ?? systemProcessTable;
  const pids = await table.descendants(rootPid);
  return terminatePids(options.includeRoot === true ? [...pids, rootPid] : pids, options);
}

/** Reap every descendant of the current process. */
export async function reapDescendants(options: ReapOptions = {}): Promise<ReapResult> {
  return reapProcessTree(process.pid, options);
}

// ── Helpers ──────────────────────────────────────────────────

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function defaultSleep(ms: number): Promise<void> {
  return delay(ms);
}
