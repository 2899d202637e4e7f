import { z } from 'zod';

import { workerConfigSchema } from './config.js';
import { fatalitySchema, outcomeSchema } from './outcome.js';
import { workItemSchema } from './workItem.js';

// ── Supervisor → worker ──────────────────────────────────────

export const workerRequestSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('init'), config: workerConfigSchema }),
  z.object({ kind: z.literal('run'), item: workItemSchema }),
]);

export type WorkerRequest = z.infer<typeof workerRequestSchema>;

// ── Worker → supervisor ──────────────────────────────────────

export const workerResponseSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('outcome'), outcome: outcomeSchema }),
  z.object({ kind: z.literal('fatal'), fatality: fatalitySchema }),
]);

export type WorkerResponse = z.infer<typeof workerResponseSchema>;
