import { z } from 'zod';

import { outcomeSchema } from './outcome.js';
import { stepNameSchema } from './workItem.js';

// ── info.yaml (one per collection) ───────────────────────────
// Successful steps are stored as seconds, failures as text, so a
// plain grep for non-numeric values finds every failure.

export const infoTimeSchema = z.union([z.number().nonnegative(), z.string()]);

export const collectionInfoSchema = z.object({
  times: z.record(stepNameSchema, infoTimeSchema),
});

export type CollectionInfo = z.infer<typeof collectionInfoSchema>;

// ── Run report ───────────────────────────────────────────────

export const stepOutcomeSchema = z.object({
  stepName: stepNameSchema,
  outcome: outcomeSchema,
});

export type StepOutcome = z.infer<typeof stepOutcomeSchema>;

export const collectionReportSchema = z.object({
  collectionId: z.string().min(1),
  steps: z.array(stepOutcomeSchema),
});

export type CollectionReport = z.infer<typeof collectionReportSchema>;

export const runReportSchema = z.object({
  instance: z.string().min(1),
  guiUrl: z.string().url(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  collections: z.array(collectionReportSchema),
});

export type RunReport = z.infer<typeof runReportSchema>;
