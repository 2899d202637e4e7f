import { z } from 'zod';

// ── Archive API: dandiset listing page ───────────────────────

export const collectionEntrySchema = z.object({
  identifier: z.string().min(1),
});

export const collectionPageSchema = z.object({
  count: z.number().int().nonnegative(),
  next: z.string().url().nullable(),
  results: z.array(collectionEntrySchema),
});

export type CollectionPage = z.infer<typeof collectionPageSchema>;
