import { setTimeout as delay } from 'node:timers/promises';

import type { Outcome, WorkItem, WorkerConfig, WorkerRequest, WorkerResponse } from '../schema/index.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { Logger } from '../utils/logger.js';
import {
  FatalError,
  RetryBudgetExceededError,
  WorkerInterruptedError,
  errorMessage,
} from './errors.js';
import { systemProcessTable, terminatePids } from './reaper.js';
import type { ProcessTable } from './reaper.js';
import { isInterrupt } from './worker.js';
import type { WorkerFactory, WorkerProcess } from './worker.js';

// ── Public types ─────────────────────────────────────────────

/** Anything that turns a work item into exactly one outcome. */
export interface StepExecutor {
  execute(item: WorkItem): Promise<Outcome>;
}

export interface SupervisorOptions {
  config: WorkerConfig;
  factory: WorkerFactory<WorkerRequest, WorkerResponse>;
  logger: Logger;
  maxAttempts?: number;
  channelTimeoutMs?: number;
  exitTimeoutMs?: number;
  teardownPauseMs?: number;
  reapGraceMs?: number;
  processes?: ProcessTable;
  sleep?: (ms: number) => Promise<void>;
}

type SessionWorker = WorkerProcess<WorkerRequest, WorkerResponse>;

// ── Supervisor ───────────────────────────────────────────────

/**
 * Runs the browser session in an isolated worker and makes it look
 * like a reliable `execute(item)`.
 *
 * - worker died mid-step (closed channel) or went silent (channel
 *   timeout): replace it and retry the same item, up to `maxAttempts`
 * - `fatal` reply: throw {@link FatalError}, no retry
 * - worker killed by Ctrl-C: throw {@link WorkerInterruptedError}
 */
export class Supervisor implements StepExecutor {
  private worker: SessionWorker | undefined;
  private started = 0;
  private interrupted = false;

  private readonly maxAttempts: number;
  private readonly channelTimeoutMs: number;
  private readonly exitTimeoutMs: number;
  private readonly teardownPauseMs: number;
  private readonly processes: ProcessTable;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: SupervisorOptions) {
    this.maxAttempts = options.maxAttempts ?? LIMITS.MAX_ATTEMPTS;
    this.channelTimeoutMs = options.channelTimeoutMs ?? TIMEOUTS.CHANNEL;
    this.exitTimeoutMs = options.exitTimeoutMs ?? TIMEOUTS.WORKER_EXIT;
    this.teardownPauseMs = options.teardownPauseMs ?? TIMEOUTS.TEARDOWN_PAUSE;
    this.processes = options.processes ?? systemProcessTable;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /** Number of workers started so far. */
  get workersStarted(): number {
    return this.started;
  }

  get hasWorker(): boolean {
    return this.worker !== undefined;
  }

  async execute(item: WorkItem): Promise<Outcome> {
    const { logger } = this.options;
    const label = `${item.collectionId}/${item.stepName}`;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (this.interrupted) {
        throw new WorkerInterruptedError('SIGINT', null);
      }
      const worker = this.ensureWorker();
      if (attempt > 1) {
        logger.warn(`Retrying ${label} (attempt ${String(attempt)}/${String(this.maxAttempts)})`);
      }

      worker.channel.send({ kind: 'run', item });
      const reply = await worker.channel.receive(this.channelTimeoutMs);

      switch (reply.kind) {
        case 'message': {
          const response = reply.message;
          if (response.kind === 'fatal') {
            throw new FatalError(response.fatality.message);
          }
          return response.outcome;
        }

        case 'timeout':
          logger.warn(
            `No reply for ${label} within ${String(this.channelTimeoutMs)}ms; replacing the worker`,
          );
          await this.retire(worker, () => this.stopWorker(worker));
          this.discard(worker);
          break;

        case 'closed':
          logger.warn(`Worker died while processing ${label}`);
          await this.retire(worker, () => this.awaitExit(worker));
          this.discard(worker);
          break;
      }
    }

    throw new RetryBudgetExceededError(item, this.maxAttempts);
  }

  /**
   * Forward Ctrl-C to the worker. The step in flight (if any) and every
   * later `execute` end in {@link WorkerInterruptedError}.
   */
  interrupt(): void {
    this.interrupted = true;
    this.worker?.terminate('SIGINT');
  }

  /**
   * Close the channel, give the worker a moment to shut its browser
   * down, then terminate it and anything it left behind.
   */
  async close(): Promise<void> {
    const worker = this.worker;
    if (worker === undefined) return;
    this.worker = undefined;

    await this.retire(worker, async () => {
      worker.channel.close();
      await this.sleep(this.teardownPauseMs);
      await this.stopWorker(worker);
    });
  }

  // ── Worker lifecycle ───────────────────────────────────────

  private ensureWorker(): SessionWorker {
    if (this.worker !== undefined) {
      if (this.worker.isAlive()) return this.worker;
      this.options.logger.warn('Worker found dead; starting a new one');
      this.discard(this.worker);
    }

    const worker = this.options.factory();
    this.started++;
    this.options.logger.worker(`Started worker ${String(worker.pid)}`);
    worker.channel.send({ kind: 'init', config: this.options.config });
    this.worker = worker;
    return worker;
  }

  /** Drop a dead worker; an interrupted one ends the run instead. */
  private discard(worker: SessionWorker): void {
    if (this.worker === worker) {
      this.worker = undefined;
    }
    worker.channel.close();

    const exit = worker.exitReason();
    if (exit !== undefined && isInterrupt(exit)) {
      throw new WorkerInterruptedError(exit.signal, exit.code);
    }
  }

  private async awaitExit(worker: SessionWorker): Promise<void> {
    if (await worker.waitForExit(this.exitTimeoutMs)) return;
    this.options.logger.warn(`Worker ${String(worker.pid)} lingers after closing its channel; killing it`);
    worker.terminate('SIGKILL');
    await worker.waitForExit(this.exitTimeoutMs);
  }

  private async stopWorker(worker: SessionWorker): Promise<void> {
    if (!worker.isAlive()) return;
    worker.terminate('SIGTERM');
    if (await worker.waitForExit(this.exitTimeoutMs)) return;
    worker.terminate('SIGKILL');
    await worker.waitForExit(this.exitTimeoutMs);
  }

  /**
   * Stop a worker with `stop`, then reap what it started. Descendants
   * are listed while the worker still lives: once it is gone they are
   * reparented and no longer show up under any pid we know.
   */
  private async retire(worker: SessionWorker, stop: () => Promise<void>): Promise<void> {
    const leftovers = await this.snapshotDescendants(worker);
    await stop();

    const reaped = await terminatePids(leftovers, {
      table: this.processes,
      sleep: this.sleep,
      ...(this.options.reapGraceMs !== undefined ? { graceMs: this.options.reapGraceMs } : {}),
    });
    if (reaped.killed.length > 0) {
      this.options.logger.warn(`Force-killed ${String(reaped.killed.length)} leftover browser process(es)`);
    }
  }

  private async snapshotDescendants(worker: SessionWorker): Promise<number[]> {
    if (worker.pid === undefined || !worker.isAlive()) return [];
    try {
      return await this.processes.descendants(worker.pid);
    } catch (err) {
      this.options.logger.warn(`Could not list the worker's processes: ${errorMessage(err)}`);
      return [];
    }
  }
}
