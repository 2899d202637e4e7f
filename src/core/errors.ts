import type { WorkItem } from '../schema/index.js';

// ── Item-level ───────────────────────────────────────────────

/** A bounded wait ran out. Turned into a `timeout` outcome. */
export class WaitTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(what: string, timeoutMs: number) {
    super(`Timed out after ${String(timeoutMs)}ms waiting for ${what}`);
    this.name = 'WaitTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// ── Worker-level ─────────────────────────────────────────────

/** The driver died under a step; the worker must be replaced. */
export class DriverCrashedError extends Error {
  readonly item: WorkItem;

  constructor(item: WorkItem, cause: unknown) {
    super(
      `Browser died while processing ${item.collectionId}/${item.stepName}: ${errorMessage(cause)}`,
      { cause },
    );
    this.name = 'DriverCrashedError';
    this.item = item;
  }
}

// ── Run-level ────────────────────────────────────────────────

/** The whole run must stop. Never retried. */
export class FatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FatalError';
  }
}

export class RetryBudgetExceededError extends Error {
  readonly item: WorkItem;
  readonly attempts: number;

  constructor(item: WorkItem, attempts: number) {
    super(
      `Giving up on ${item.collectionId}/${item.stepName}: worker crashed on all ${String(attempts)} attempts`,
    );
    this.name = 'RetryBudgetExceededError';
    this.item = item;
    this.attempts = attempts;
  }
}

export class WorkerInterruptedError extends Error {
  readonly signal: string | null;
  readonly code: number | null;

  constructor(signal: string | null, code: number | null) {
    super(`Worker was interrupted (${signal ?? `exit code ${String(code)}`})`);
    this.name = 'WorkerInterruptedError';
    this.signal = signal;
    this.code = code;
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
