import type { Outcome, RunReport, StepName } from '../schema/index.js';
import { describeOutcome, isSuccess } from '../schema/index.js';
import { collectionsUrl } from '../config/instances.js';
import { STEP_NAMES } from '../core/steps.js';

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Statistics ───────────────────────────────────────────────

export interface StepStats {
  stepName: StepName;
  runs: number;
  successes: number;
  failures: number;
  timeouts: number;
  meanSeconds: number | null;
  minSeconds: number | null;
  maxSeconds: number | null;
}

export function computeStepStats(report: RunReport): StepStats[] {
  return stepColumns(report).map((stepName) => {
    const outcomes: Outcome[] = [];
    for (const collection of report.collections) {
      for (const step of collection.steps) {
        if (step.stepName === stepName) outcomes.push(step.outcome);
      }
    }

    const seconds = outcomes.filter(isSuccess).map((o) => o.seconds);
    const total = seconds.reduce((sum, s) => sum + s, 0);

    return {
      stepName,
      runs: outcomes.length,
      successes: seconds.length,
      failures: outcomes.length - seconds.length,
      timeouts: outcomes.filter((o) => o.kind === 'timeout').length,
      meanSeconds: seconds.length > 0 ? total / seconds.length : null,
      minSeconds: seconds.length > 0 ? Math.min(...seconds) : null,
      maxSeconds: seconds.length > 0 ? Math.max(...seconds) : null,
    };
  });
}

export function countFailures(report: RunReport): number {
  let failures = 0;
  for (const collection of report.collections) {
    for (const step of collection.steps) {
      if (!isSuccess(step.outcome)) failures++;
    }
  }
  return failures;
}

// ── JSON generator ───────────────────────────────────────────

export interface JsonOutput {
  version: typeof JSON_OUTPUT_VERSION;
  instance: string;
  guiUrl: string;
  startedAt: string;
  finishedAt: string;
  failures: number;
  collections: Array<{ collectionId: string; times: Record<string, number | string> }>;
  stats: StepStats[];
}

export function generateJSON(report: RunReport): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    instance: report.instance,
    guiUrl: report.guiUrl,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    failures: countFailures(report),
    collections: report.collections.map((c) => ({
      collectionId: c.collectionId,
      times: Object.fromEntries(
        c.steps.map((s) => [s.stepName, isSuccess(s.outcome) ? s.outcome.seconds : describeOutcome(s.outcome)]),
      ),
    })),
    stats: computeStepStats(report),
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(report: RunReport): string {
  const lines: string[] = [];
  const columns = stepColumns(report);

  lines.push(`# Webshots`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Instance** | ${report.instance} |`);
  lines.push(`| **GUI** | ${report.guiUrl} |`);
  lines.push(`| **Started** | ${report.startedAt} |`);
  lines.push(`| **Finished** | ${report.finishedAt} |`);
  lines.push(`| **Collections** | ${String(report.collections.length)} |`);
  lines.push(`| **Failures** | ${String(countFailures(report))} |`);
  lines.push('');

  // Timing statistics
  lines.push(`## Timings`);
  lines.push('');
  lines.push(`| Step | Runs | OK | Failed | Timeouts | Mean | Min | Max |`);
  lines.push(`|------|------|----|--------|----------|------|-----|-----|`);
  for (const s of computeStepStats(report)) {
    lines.push(
      `| ${s.stepName} | ${String(s.runs)} | ${String(s.successes)} | ${String(s.failures)} | ${String(s.timeouts)} | ${formatSeconds(s.meanSeconds)} | ${formatSeconds(s.minSeconds)} | ${formatSeconds(s.maxSeconds)} |`,
    );
  }
  lines.push('');

  // Per-collection table
  lines.push(`## Collections`);
  lines.push('');
  lines.push(`| Collection | ${columns.join(' | ')} |`);
  lines.push(`|------------|${columns.map(() => '---').join('|')}|`);
  const collectionsBase = collectionsUrl(report.guiUrl);
  for (const collection of report.collections) {
    const cells = columns.map((stepName) => {
      const step = collection.steps.find((s) => s.stepName === stepName);
      if (step === undefined) return '';
      return formatCell(collection.collectionId, stepName, step.outcome);
    });
    lines.push(
      `| [${collection.collectionId}](${collectionsBase}/${collection.collectionId}) | ${cells.join(' | ')} |`,
    );
  }
  lines.push('');

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function stepColumns(report: RunReport): StepName[] {
  const seen = new Set<StepName>();
  for (const collection of report.collections) {
    for (const step of collection.steps) seen.add(step.stepName);
  }
  return STEP_NAMES.filter((name) => seen.has(name));
}

function formatCell(collectionId: string, stepName: StepName, outcome: Outcome): string {
  if (isSuccess(outcome)) {
    return `[${formatSeconds(outcome.seconds)}](${collectionId}/${stepName}.png)`;
  }
  return escapeMarkdownCell(describeOutcome(outcome));
}

function formatSeconds(value: number | null): string {
  if (value === null) return '—';
  return `${value.toFixed(2)}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
