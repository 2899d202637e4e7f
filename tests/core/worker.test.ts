import { existsSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  QueuedChannel,
  forkWorker,
  isInterrupt,
  sessionWorkerPath,
} from '../../src/core/worker.js';
import type { WorkerProcess } from '../../src/core/worker.js';
import { workerResponseSchema } from '../../src/schema/index.js';
import type { WorkerRequest, WorkerResponse } from '../../src/schema/index.js';
import { silentLogger } from '../../src/utils/logger.js';

function channel() {
  const transmitted: string[] = [];
  const onClose = vi.fn();
  const ch = new QueuedChannel<string, number>((message) => transmitted.push(message), onClose);
  return { ch, transmitted, onClose };
}

describe('QueuedChannel', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('transmits sent messages', () => {
    const { ch, transmitted } = channel();
    ch.send('run');
    expect(transmitted).toEqual(['run']);
  });

  it('hands out a message that arrived before receive was called', async () => {
    const { ch } = channel();
    ch.deliver(7);
    await expect(ch.receive(1000)).resolves.toEqual({ kind: 'message', message: 7 });
  });

  it('resolves a pending receive when a message arrives', async () => {
    const { ch } = channel();
    const pending = ch.receive(1000);
    ch.deliver(42);
    await expect(pending).resolves.toEqual({ kind: 'message', message: 42 });
  });

  it('reports a timeout when nothing arrives in time', async () => {
    vi.useFakeTimers();
    const { ch } = channel();
    const pending = ch.receive(500);
    vi.advanceTimersByTime(500);
    await expect(pending).resolves.toEqual({ kind: 'timeout' });
  });

  it('wakes a pending receive with closed when the other side goes away', async () => {
    const { ch } = channel();
    const pending = ch.receive(1000);
    ch.markClosed();
    await expect(pending).resolves.toEqual({ kind: 'closed' });
  });

  it('still hands out messages queued before it closed', async () => {
    const { ch } = channel();
    ch.deliver(1);
    ch.markClosed();
    ch.deliver(2);

    await expect(ch.receive(1000)).resolves.toEqual({ kind: 'message', message: 1 });
    await expect(ch.receive(1000)).resolves.toEqual({ kind: 'closed' });
  });

  it('stops transmitting once closed and runs the close hook once', () => {
    const { ch, transmitted, onClose } = channel();
    ch.close();
    ch.close();
    ch.send('run');

    expect(ch.closed).toBe(true);
    expect(transmitted).toEqual([]);
    expect(onClose).toHaveBeenCalledTimes(1);
  });

  it('rejects a second concurrent receive', async () => {
    const { ch } = channel();
    const first = ch.receive(1000);

    await expect(ch.receive(1000)).rejects.toThrow('A receive is already pending on this channel');

    ch.deliver(1);
    await expect(first).resolves.toEqual({ kind: 'message', message: 1 });
  });
});

describe('isInterrupt', () => {
  it('recognises SIGINT and exit code 130', () => {
    expect(isInterrupt({ code: null, signal: 'SIGINT' })).toBe(true);
    expect(isInterrupt({ code: 130, signal: null })).toBe(true);
  });

  it('does not treat other exits as interrupts', () => {
    expect(isInterrupt({ code: 1, signal: null })).toBe(false);
    expect(isInterrupt({ code: null, signal: 'SIGKILL' })).toBe(false);
    expect(isInterrupt({ code: 0, signal: null })).toBe(false);
  });
});

describe('forkWorker', () => {
  const fixture = fileURLToPath(new URL('../fixtures/scripted-worker.mjs', import.meta.url));
  const run: WorkerRequest = { kind: 'run', item: { collectionId: '000001', stepName: 'landing' } };
  const started: Array<WorkerProcess<WorkerRequest, WorkerResponse>> = [];

  function start(mode: string): WorkerProcess<WorkerRequest, WorkerResponse> {
    const worker = forkWorker<WorkerRequest, WorkerResponse>({
      modulePath: fixture,
      responseSchema: workerResponseSchema,
      logger: silentLogger,
      env: { ...process.env, FIXTURE_MODE: mode },
    });
    started.push(worker);
    return worker;
  }

  afterEach(async () => {
    for (const worker of started.splice(0)) {
      worker.terminate('SIGKILL');
      await worker.waitForExit(2000);
    }
  });

  it('delivers a validated reply over IPC', async () => {
    const worker = start('reply');
    worker.channel.send(run);

    await expect(worker.channel.receive(5000)).resolves.toEqual({
      kind: 'message',
      message: { kind: 'outcome', outcome: { kind: 'duration', seconds: 1.5 } },
    });
    expect(worker.isAlive()).toBe(true);
    expect(worker.pid).toEqual(expect.any(Number));
  });

  it('drops malformed messages and keeps the next valid one', async () => {
    const worker = start('garbage');
    worker.channel.send(run);

    await expect(worker.channel.receive(5000)).resolves.toEqual({
      kind: 'message',
      message: { kind: 'outcome', outcome: { kind: 'timeout' } },
    });
  });

  it('reports the real exit code when the worker exits', async () => {
    const worker = start('interrupted');
    worker.channel.send(run);

    await expect(worker.channel.receive(5000)).resolves.toEqual({ kind: 'closed' });
    await expect(worker.waitForExit(5000)).resolves.toBe(true);
    expect(worker.exitReason()).toEqual({ code: 130, signal: null });
    expect(worker.isAlive()).toBe(false);
  });

  it('closes the channel on disconnect while the process lingers', async () => {
    const worker = start('disconnect');
    worker.channel.send(run);

    await expect(worker.channel.receive(5000)).resolves.toEqual({ kind: 'closed' });
    expect(worker.channel.closed).toBe(true);
    expect(worker.exitReason()).toBeUndefined();

    worker.terminate('SIGTERM');
    await expect(worker.waitForExit(5000)).resolves.toBe(true);
    expect(worker.exitReason()).toEqual({ code: null, signal: 'SIGTERM' });
  });

  it('reports a timeout from a worker that stays silent', async () => {
    const worker = start('silent');
    worker.channel.send(run);

    await expect(worker.channel.receive(200)).resolves.toEqual({ kind: 'timeout' });
    expect(worker.isAlive()).toBe(true);
  });
});

describe('sessionWorkerPath', () => {
  it('points at the worker entry point beside the worker module', () => {
    const entry = sessionWorkerPath();
    expect(path.basename(entry)).toBe('workerMain.ts');
    expect(existsSync(entry)).toBe(true);
  });
});
