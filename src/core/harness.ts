import type { CollectionReport, RunReport, StepName, StepOutcome } from '../schema/index.js';
import { describeOutcome, isSuccess } from '../schema/index.js';
import { writeCollectionInfo } from '../report/writer.js';
import type { Logger } from '../utils/logger.js';
import { STEP_NAMES } from './steps.js';
import type { StepExecutor } from './supervisor.js';

// ── Public types ─────────────────────────────────────────────

/** Receives each collection's outcomes once all its steps ran. */
export interface ArtifactSink {
  writeCollection(collectionId: string, steps: readonly StepOutcome[]): Promise<void>;
}

export interface HarnessOptions {
  instance: string;
  guiUrl: string;
  collectionIds: readonly string[];
  executor: StepExecutor;
  sink: ArtifactSink;
  logger: Logger;
  steps?: readonly StepName[];
  clock?: () => Date;
}

// ── Sinks ────────────────────────────────────────────────────

export function fileSink(outDir: string): ArtifactSink {
  return {
    async writeCollection(collectionId: string, steps: readonly StepOutcome[]): Promise<void> {
      await writeCollectionInfo(outDir, collectionId, steps);
    },
  };
}

// ── Run ──────────────────────────────────────────────────────

/**
 * Visit every step of every collection, strictly in order, one item
 * at a time. Per-item failures are recorded and the run goes on;
 * fatal, interrupt and retry-budget errors propagate, leaving the
 * collections finished so far written.
 */
export async function runWebshots(options: HarnessOptions): Promise<RunReport> {
  const { logger, executor, sink } = options;
  const clock = options.clock ?? (() => new Date());
  const steps = options.steps ?? STEP_NAMES;
  const total = options.collectionIds.length;
  const startedAt = clock().toISOString();
  const collections: CollectionReport[] = [];

  for (const [index, collectionId] of options.collectionIds.entries()) {
    logger.step(index, total, `Collection ${collectionId}`);
    const outcomes: StepOutcome[] = [];

    for (const stepName of steps) {
      const outcome = await executor.execute({ collectionId, stepName });
      outcomes.push({ stepName, outcome });
      const line = `${collectionId}/${stepName}: ${describeOutcome(outcome)}`;
      if (isSuccess(outcome)) logger.info(line);
      else logger.warn(line);
    }

    await sink.writeCollection(collectionId, outcomes);
    collections.push({ collectionId, steps: outcomes });

    const ok = outcomes.every((s) => isSuccess(s.outcome));
    logger.stepResult(index, total, ok, `Collection ${collectionId}`);
  }

  return {
    instance: options.instance,
    guiUrl: options.guiUrl,
    startedAt,
    finishedAt: clock().toISOString(),
    collections,
  };
}
