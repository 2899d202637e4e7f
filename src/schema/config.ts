import { z } from 'zod';

import { signalsSchema } from './workItem.js';

// ── Log level ────────────────────────────────────────────────

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof logLevelSchema>;

// ── Timeouts (milliseconds) ──────────────────────────────────

export const timeoutsSchema = z.object({
  navigation: z.number().int().positive(),
  action: z.number().int().positive(),
  readyWait: z.number().int().positive(),
  busyAppearGrace: z.number().int().positive(),
  busyDisappear: z.number().int().positive(),
  login: z.number().int().positive(),
  settle: z.number().int().nonnegative(),
});

export type Timeouts = z.infer<typeof timeoutsSchema>;

// ── Viewport ─────────────────────────────────────────────────

export const viewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export type Viewport = z.infer<typeof viewportSchema>;

// ── Archive instance ─────────────────────────────────────────

export const instanceSchema = z.object({
  guiUrl: z.string().url(),
  apiUrl: z.string().url(),
});

export type Instance = z.infer<typeof instanceSchema>;

// ── Config file (.webshots.yaml) ─────────────────────────────

export const fileConfigSchema = z.object({
  instance: z.string().min(1).optional(),
  instances: z.record(z.string().min(1), instanceSchema).optional().default({}),
  outDir: z.string().min(1).optional(),
  headless: z.boolean().optional(),
  login: z.boolean().optional(),
  logLevel: logLevelSchema.optional(),
  timeouts: timeoutsSchema.partial().optional().default({}),
  signals: signalsSchema.partial().optional().default({}),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Worker config ────────────────────────────────────────────
// Everything a worker needs to open its session, passed explicitly
// at start-up instead of read from ambient state.

export const workerConfigSchema = z.object({
  baseUrl: z.string().url(),
  headless: z.boolean(),
  login: z.boolean(),
  outDir: z.string().min(1),
  logLevel: logLevelSchema,
  viewport: viewportSchema,
  timeouts: timeoutsSchema,
  signals: signalsSchema,
});

export type WorkerConfig = z.infer<typeof workerConfigSchema>;
