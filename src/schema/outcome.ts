import { z } from 'zod';

// ── Outcome ──────────────────────────────────────────────────
// Exactly one per work item. Only `duration` counts as a success.

export const durationOutcomeSchema = z.object({
  kind: z.literal('duration'),
  seconds: z.number().nonnegative(),
});

export const timeoutOutcomeSchema = z.object({
  kind: z.literal('timeout'),
});

export const errorOutcomeSchema = z.object({
  kind: z.literal('error'),
  message: z.string(),
});

export const outcomeSchema = z.discriminatedUnion('kind', [
  durationOutcomeSchema,
  timeoutOutcomeSchema,
  errorOutcomeSchema,
]);

export type DurationOutcome = z.infer<typeof durationOutcomeSchema>;
export type TimeoutOutcome = z.infer<typeof timeoutOutcomeSchema>;
export type ErrorOutcome = z.infer<typeof errorOutcomeSchema>;
export type Outcome = z.infer<typeof outcomeSchema>;

// ── Fatality ─────────────────────────────────────────────────
// Not a per-item failure: the whole run has to stop.

export const fatalitySchema = z.object({
  message: z.string().min(1),
});

export type Fatality = z.infer<typeof fatalitySchema>;

// ── Constructors ─────────────────────────────────────────────

export function durationOutcome(seconds: number): DurationOutcome {
  return { kind: 'duration', seconds };
}

export function timeoutOutcome(): TimeoutOutcome {
  return { kind: 'timeout' };
}

export function errorOutcome(message: string): ErrorOutcome {
  return { kind: 'error', message };
}

export function isSuccess(outcome: Outcome): outcome is DurationOutcome {
  return outcome.kind === 'duration';
}

/** One-line rendering used by logs, info records and reports. */
export function describeOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case 'duration':
      return `${outcome.seconds.toFixed(3)}s`;
    case 'timeout':
      return 'timed out';
    case 'error':
      return `ERROR: ${outcome.message}`;
  }
}
