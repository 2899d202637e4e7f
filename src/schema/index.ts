/**
 * Schema module.
 * Zod schemas + inferred TypeScript types. Every boundary (worker
 * channel, config file, archive API, info records) validates
 * through these schemas.
 */

export * from './outcome.js';
export * from './workItem.js';
export * from './config.js';
export * from './worker.js';
export * from './catalog.js';
export * from './report.js';
