import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import type { CollectionInfo, Outcome, StepOutcome, WorkItem } from '../schema/index.js';
import { collectionInfoSchema, describeOutcome } from '../schema/index.js';

export const INFO_FILE = 'info.yaml';

// ── Paths ────────────────────────────────────────────────────

export function collectionDir(outDir: string, collectionId: string): string {
  return path.join(outDir, collectionId);
}

export function artifactPath(outDir: string, item: WorkItem): string {
  return path.join(collectionDir(outDir, item.collectionId), `${item.stepName}.png`);
}

/** The page's HTML, saved beside its screenshot. */
export function pageSourcePath(outDir: string, item: WorkItem): string {
  return path.join(collectionDir(outDir, item.collectionId), `${item.stepName}.html`);
}

// ── info.yaml ────────────────────────────────────────────────

/** Seconds rounded to the millisecond, or the failure text. */
export function infoTime(outcome: Outcome): number | string {
  if (outcome.kind === 'duration') {
    return Math.round(outcome.seconds * 1000) / 1000;
  }
  return describeOutcome(outcome);
}

export function toCollectionInfo(steps: readonly StepOutcome[]): CollectionInfo {
  const times: CollectionInfo['times'] = {};
  for (const { stepName, outcome } of steps) {
    times[stepName] = infoTime(outcome);
  }
  return { times };
}

export async function writeCollectionInfo(
  outDir: string,
  collectionId: string,
  steps: readonly StepOutcome[],
): Promise<string> {
  const dir = collectionDir(outDir, collectionId);
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, INFO_FILE);
  await writeFile(filePath, stringifyYaml(toCollectionInfo(steps)), 'utf-8');
  return filePath;
}

export async function readCollectionInfo(
  outDir: string,
  collectionId: string,
): Promise<CollectionInfo> {
  const raw = await readFile(path.join(collectionDir(outDir, collectionId), INFO_FILE), 'utf-8');
  return collectionInfoSchema.parse(parseYaml(raw));
}
