import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import type { Outcome, Signals, Timeouts, WorkItem } from '../schema/index.js';
import { durationOutcome, errorOutcome, timeoutOutcome } from '../schema/index.js';
import type { BrowserDriver } from '../browser/driver.js';
import { artifactPath, pageSourcePath } from '../report/writer.js';
import type { Logger } from '../utils/logger.js';
import { DriverCrashedError, WaitTimeoutError, errorMessage } from './errors.js';
import type { StepSpec } from './steps.js';

// ── Public types ─────────────────────────────────────────────

export interface StepRunOptions {
  baseUrl: string;
  outDir: string;
  signals: Signals;
  timeouts: Timeouts;
  logger: Logger;
  /** Collection whose landing page the driver is known to show. */
  landingShown?: string | undefined;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export type StepState = 'start' | 'navigated' | 'acted' | 'signalWaited' | 'captured';

// ── Runner ───────────────────────────────────────────────────

/**
 * Execute one work item against an open driver.
 *
 *   start → navigated → acted → signalWaited → captured
 *
 * Any bounded wait running out yields `timeout`, any other failure
 * yields `error`; the driver is assumed usable afterwards. The one
 * exception that escapes is {@link DriverCrashedError}, raised when
 * the driver itself is gone and the worker has to be replaced.
 */
export async function runStep(
  driver: BrowserDriver,
  item: WorkItem,
  spec: StepSpec,
  options: StepRunOptions,
): Promise<Outcome> {
  const { logger } = options;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => performance.now());
  const target = artifactPath(options.outDir, item);
  const source = pageSourcePath(options.outDir, item);

  let state: StepState = 'start';

  try {
    // A failed step must not leave older artifacts looking current.
    await rm(target, { force: true });
    await rm(source, { force: true });
    const startedAt = now();

    await navigate(driver, item, spec, options);
    state = transition(logger, item, state, 'navigated');

    if (spec.action !== undefined) {
      await driver.click(options.signals[spec.action.target], options.timeouts.action);
    }
    state = transition(logger, item, state, 'acted');

    if (spec.readySignal !== undefined) {
      await driver.waitVisible(options.signals[spec.readySignal], options.timeouts.readyWait);
    }
    if (spec.busySignal !== undefined) {
      await waitBusyCycle(driver, spec, options);
    }
    state = transition(logger, item, state, 'signalWaited');

    const seconds = (now() - startedAt) / 1000;
    await sleep(options.timeouts.settle);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(source, await driver.pageSource(), 'utf-8');
    await driver.screenshot(target);
    transition(logger, item, state, 'captured');

    return durationOutcome(Math.max(0, seconds));
  } catch (err) {
    if (err instanceof WaitTimeoutError) {
      logger.debug(`${label(item)}: timed out in state ${state}: ${err.message}`);
      return timeoutOutcome();
    }
    if (!driver.isAlive()) {
      throw new DriverCrashedError(item, err);
    }
    logger.debug(`${label(item)}: failed in state ${state}: ${errorMessage(err)}`);
    return errorOutcome(errorMessage(err));
  }
}

// ── Phases ───────────────────────────────────────────────────

async function navigate(
  driver: BrowserDriver,
  item: WorkItem,
  spec: StepSpec,
  options: StepRunOptions,
): Promise<void> {
  const navigation = spec.navigation;
  if (navigation === undefined) return;

  switch (navigation.kind) {
    case 'goto':
      await driver.goto(
        `${options.baseUrl}/${item.collectionId}${navigation.suffix}`,
        options.timeouts.navigation,
      );
      return;

    case 'stay':
      if (options.landingShown !== item.collectionId) {
        await driver.goto(`${options.baseUrl}/${item.collectionId}`, options.timeouts.navigation);
      }
      // Let the page's initial load finish.
      if (spec.busySignal !== undefined) {
        await driver.waitHidden(options.signals[spec.busySignal], options.timeouts.busyDisappear);
      }
      return;
  }
}

/**
 * Some pages never show their busy signal (trivial content), some show
 * it late. Give it a short grace period to appear; if it does not,
 * the page is treated as loaded.
 */
async function waitBusyCycle(
  driver: BrowserDriver,
  spec: StepSpec,
  options: StepRunOptions,
): Promise<void> {
  if (spec.busySignal === undefined) return;
  const busy = options.signals[spec.busySignal];

  try {
    await driver.waitVisible(busy, options.timeouts.busyAppearGrace);
  } catch (err) {
    if (err instanceof WaitTimeoutError) {
      options.logger.debug(`Busy signal ${spec.busySignal} never appeared; treating page as loaded`);
      return;
    }
    throw err;
  }

  await driver.waitHidden(busy, options.timeouts.busyDisappear);
}

// ── Helpers ──────────────────────────────────────────────────

function transition(logger: Logger, item: WorkItem, from: StepState, to: StepState): StepState {
  logger.debug(`${label(item)}: ${from} → ${to}`);
  return to;
}

function label(item: WorkItem): string {
  return `${item.collectionId}/${item.stepName}`;
}

function defaultSleep(ms: number): Promise<void> {
  return delay(ms);
}
