import { fork } from 'node:child_process';
import type { ChildProcess, Serializable } from 'node:child_process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { ZodType, ZodTypeDef } from 'zod';

import type { WorkerRequest, WorkerResponse } from '../schema/index.js';
import { workerResponseSchema } from '../schema/index.js';
import type { Logger } from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface WorkerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type ChannelReceive<T> =
  | { kind: 'message'; message: T }
  | { kind: 'closed' }
  | { kind: 'timeout' };

/** One supervisor, one worker, one request in flight. */
export interface WorkerChannel<Req, Res> {
  readonly closed: boolean;
  send(message: Req): void;
  receive(timeoutMs: number): Promise<ChannelReceive<Res>>;
  close(): void;
}

/**
 * A started worker. Its death is always observable: the channel
 * reports `closed` and {@link WorkerProcess.exitReason} is set.
 */
export interface WorkerProcess<Req, Res> {
  readonly pid: number | undefined;
  readonly channel: WorkerChannel<Req, Res>;
  isAlive(): boolean;
  exitReason(): WorkerExit | undefined;
  waitForExit(timeoutMs: number): Promise<boolean>;
  terminate(signal?: NodeJS.Signals): void;
}

/** Starts a fresh worker each time it is called. */
export type WorkerFactory<Req, Res> = () => WorkerProcess<Req, Res>;

/** Ctrl-C, either as the raw signal or Node's conventional exit code. */
export function isInterrupt(exit: WorkerExit): boolean {
  return exit.signal === 'SIGINT' || exit.code === 130;
}

// ── Channel ──────────────────────────────────────────────────

/**
 * Inbox-backed channel. Messages delivered before the channel closed
 * are still handed out after it closed, so a last message sent right
 * before a worker exits is not lost.
 */
export class QueuedChannel<Req, Res> implements WorkerChannel<Req, Res> {
  private readonly inbox: Res[] = [];
  private waiter: ((result: ChannelReceive<Res>) => void) | undefined;
  private isClosed = false;

  constructor(
    private readonly transmit: (message: Req) => void,
    private readonly onClose: () => void = () => {},
  ) {}

  get closed(): boolean {
    return this.isClosed;
  }

  send(message: Req): void {
    if (this.isClosed) return;
    this.transmit(message);
  }

  /** Feed a message arriving from the worker. */
  deliver(message: Res): void {
    if (this.isClosed) return;
    if (this.waiter !== undefined) {
      this.waiter({ kind: 'message', message });
      return;
    }
    this.inbox.push(message);
  }

  /** The other side went away. */
  markClosed(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.waiter?.({ kind: 'closed' });
  }

  receive(timeoutMs: number): Promise<ChannelReceive<Res>> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve({ kind: 'message', message: next });
    }
    if (this.isClosed) {
      return Promise.resolve({ kind: 'closed' });
    }
    if (this.waiter !== undefined) {
      return Promise.reject(new Error('A receive is already pending on this channel'));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve({ kind: 'timeout' });
      }, timeoutMs);

      this.waiter = (result) => {
        clearTimeout(timer);
        this.waiter = undefined;
        resolve(result);
      };
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.markClosed();
    this.onClose();
  }
}

// ── Forked worker ────────────────────────────────────────────

export interface ForkOptions<Res> {
  modulePath: string;
  responseSchema: ZodType<Res, ZodTypeDef, unknown>;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}

class ForkedWorker<Req extends Serializable, Res> implements WorkerProcess<Req, Res> {
  readonly channel: QueuedChannel<Req, Res>;
  private exit: WorkerExit | undefined;
  private readonly exited: Promise<void>;

  constructor(
    private readonly child: ChildProcess,
    options: ForkOptions<Res>,
  ) {
    const { logger, responseSchema } = options;

    this.channel = new QueuedChannel<Req, Res>(
      (message) => {
        child.send(message, (err) => {
          if (err) logger.warn(`Could not send to worker ${String(child.pid)}: ${err.message}`);
        });
      },
      () => {
        if (child.connected) child.disconnect();
      },
    );

    this.exited = new Promise((resolve) => {
      child.once('exit', (code, signal) => {
        this.exit = { code, signal };
        this.channel.markClosed();
        logger.worker(
          `Worker ${String(child.pid)} exited (code=${String(code)}, signal=${String(signal)})`,
        );
        resolve();
      });
    });

    child.on('message', (raw) => {
      const parsed = responseSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn(`Ignoring malformed message from worker ${String(child.pid)}`);
        return;
      }
      this.channel.deliver(parsed.data);
    });
    child.on('disconnect', () => {
      this.channel.markClosed();
    });
    child.on('error', (err) => {
      logger.warn(`Worker ${String(child.pid)} error: ${err.message}`);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return this.exit === undefined;
  }

  exitReason(): WorkerExit | undefined {
    return this.exit;
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (this.exit !== undefined) return Promise.resolve(true);
    return new Promise((resolve) => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void this.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  terminate(signal: NodeJS.Signals = 'SIGTERM'): void {
    if (this.exit !== undefined) return;
    this.child.kill(signal);
  }
}

export function forkWorker<Req extends Serializable, Res>(
  options: ForkOptions<Res>,
): WorkerProcess<Req, Res> {
  const child = fork(options.modulePath, [], {
    stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
    serialization: 'advanced',
    env: options.env ?? process.env,
  });
  return new ForkedWorker<Req, Res>(child, options);
}

// ── Session worker ───────────────────────────────────────────

/**
 * The worker entry point sits next to this module; under a TypeScript
 * loader that is the `.ts` source, once built it is the `.js` output.
 */
export function sessionWorkerPath(): string {
  const here = fileURLToPath(import.meta.url);
  return path.join(path.dirname(here), `workerMain${path.extname(here)}`);
}

export function sessionWorkerFactory(
  logger: Logger,
): WorkerFactory<WorkerRequest, WorkerResponse> {
  return () =>
    forkWorker<WorkerRequest, WorkerResponse>({
      modulePath: sessionWorkerPath(),
      responseSchema: workerResponseSchema,
      logger,
    });
}
