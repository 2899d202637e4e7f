import { z } from 'zod';

// ── Step names ───────────────────────────────────────────────

export const stepNameSchema = z.enum(['landing', 'edit-metadata', 'view-data']);

export type StepName = z.infer<typeof stepNameSchema>;

// ── WorkItem ─────────────────────────────────────────────────

export const workItemSchema = z.object({
  collectionId: z.string().min(1),
  stepName: stepNameSchema,
});

export type WorkItem = Readonly<z.infer<typeof workItemSchema>>;

// ── Selectors ────────────────────────────────────────────────

export const selectorStrategySchema = z.enum(['class', 'css', 'id', 'xpath', 'text']);

export type SelectorStrategy = z.infer<typeof selectorStrategySchema>;

export const selectorSchema = z.object({
  strategy: selectorStrategySchema,
  value: z.string().min(1),
});

export type Selector = z.infer<typeof selectorSchema>;

// ── Named UI signals ─────────────────────────────────────────
// Step specs and the login flow refer to UI elements by name only;
// the concrete selectors come from configuration.

export const signalsSchema = z.object({
  progress: selectorSchema,
  fileListProgress: selectorSchema,
  editMetadataButton: selectorSchema,
  metadataEditor: selectorSchema,
  loginButton: selectorSchema,
  usernameField: selectorSchema,
  passwordField: selectorSchema,
  authorizeButton: selectorSchema,
  loggedIn: selectorSchema,
  rateLimit: selectorSchema,
});

export type Signals = z.infer<typeof signalsSchema>;

export type SignalName = keyof Signals;
