import type { WorkerRequest, WorkerResponse } from '../schema/index.js';
import { workerRequestSchema } from '../schema/index.js';
import { Session } from '../browser/session.js';
import type { DriverFactory } from '../browser/driver.js';
import { createLogger, silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { FatalError, errorMessage } from './errors.js';
import { reapDescendants } from './reaper.js';
import type { ReapResult } from './reaper.js';

// ── Port ─────────────────────────────────────────────────────

/** The worker's side of the channel. */
export interface WorkerPort {
  send(message: WorkerResponse): Promise<void>;
  onMessage(handler: (raw: unknown) => void): void;
  onDisconnect(handler: () => void): void;
  exit(code: number): void;
}

export function processPort(): WorkerPort {
  return {
    send(message: WorkerResponse): Promise<void> {
      return new Promise((resolve, reject) => {
        if (process.send === undefined) {
          reject(new Error('Worker was started without an IPC channel'));
          return;
        }
        process.send(message, undefined, undefined, (err: Error | null) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
    onMessage(handler: (raw: unknown) => void): void {
      process.on('message', handler);
    },
    onDisconnect(handler: () => void): void {
      process.on('disconnect', handler);
    },
    exit(code: number): void {
      process.exit(code);
    },
  };
}

// ── Runtime ──────────────────────────────────────────────────

export interface WorkerDeps {
  launch?: DriverFactory;
  env?: NodeJS.ProcessEnv;
  reap?: () => Promise<ReapResult>;
}

export const WORKER_EXIT = {
  OK: 0,
  CRASHED: 1,
  FATAL: 3,
} as const;

/**
 * Serve session requests arriving on `port`, one at a time and in
 * order. `init` opens the session, `run` executes one step on it.
 *
 * A fatal condition is reported with a `fatal` message; anything else
 * that escapes (a dead browser, a failed launch) ends the process
 * without a reply, which the supervisor sees as a crash. Every exit
 * path closes the session and reaps the browser's processes.
 */
export function serveWorker(port: WorkerPort, deps: WorkerDeps = {}): void {
  let logger: Logger = silentLogger;
  let session: Session | undefined;
  let stopping: Promise<void> | undefined;
  let queue: Promise<void> = Promise.resolve();

  const shutdown = (code: number): Promise<void> => {
    stopping ??= (async () => {
      try {
        await session?.close();
      } catch (err) {
        logger.warn(`Closing the browser failed: ${errorMessage(err)}`);
      }
      try {
        await (deps.reap ?? reapDescendants)();
      } catch (err) {
        logger.warn(`Reaping browser processes failed: ${errorMessage(err)}`);
      }
      port.exit(code);
    })();
    return stopping;
  };

  const fail = async (err: unknown): Promise<void> => {
    if (err instanceof FatalError) {
      logger.error(err.message);
      await port.send({ kind: 'fatal', fatality: { message: err.message } });
      await shutdown(WORKER_EXIT.FATAL);
      return;
    }
    logger.error(`Worker crashed: ${errorMessage(err)}`);
    await shutdown(WORKER_EXIT.CRASHED);
  };

  const handle = async (request: WorkerRequest): Promise<void> => {
    if (stopping !== undefined) return;

    switch (request.kind) {
      case 'init': {
        logger = createLogger(request.config.logLevel);
        logger.worker(`Worker ${String(process.pid)} opening session`);
        session = await Session.open(request.config, {
          logger,
          ...(deps.launch !== undefined ? { launch: deps.launch } : {}),
          ...(deps.env !== undefined ? { env: deps.env } : {}),
        });
        return;
      }

      case 'run': {
        if (session === undefined) {
          throw new Error('Received a step before the session was opened');
        }
        const outcome = await session.runStep(request.item);
        await port.send({ kind: 'outcome', outcome });
        return;
      }
    }
  };

  port.onMessage((raw) => {
    queue = queue
      .then(() => handle(workerRequestSchema.parse(raw)))
      .catch(fail)
      .catch((err: unknown) => {
        logger.error(`Worker could not report failure: ${errorMessage(err)}`);
        return shutdown(WORKER_EXIT.CRASHED);
      });
  });

  port.onDisconnect(() => {
    queue = queue.then(() => shutdown(WORKER_EXIT.OK));
  });
}
