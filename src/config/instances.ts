import type { Instance } from '../schema/index.js';

// ── Known archive instances ──────────────────────────────────
// `guiUrl` is the bare GUI origin, as a deploy preview is given.

export const KNOWN_INSTANCES: Readonly<Record<string, Instance>> = {
  dandi: {
    guiUrl: 'https://dandiarchive.org',
    apiUrl: 'https://api.dandiarchive.org/api',
  },
  'dandi-staging': {
    guiUrl: 'https://gui-staging.dandiarchive.org',
    apiUrl: 'https://api-staging.dandiarchive.org/api',
  },
};

export const DEFAULT_INSTANCE = 'dandi';

/** Hash route under which the GUI serves collection pages. */
export const COLLECTION_ROUTE = '#/dandiset';

/** Base URL that collection ids are appended to. */
export function collectionsUrl(guiUrl: string): string {
  return `${guiUrl}/${COLLECTION_ROUTE}`;
}

export class UnknownInstanceError extends Error {
  readonly instance: string;

  constructor(instance: string, known: readonly string[]) {
    super(`Unknown instance "${instance}" (known: ${known.join(', ')})`);
    this.name = 'UnknownInstanceError';
    this.instance = instance;
  }
}

/**
 * Look up an instance by name. Instances declared in the config file
 * shadow the built-in ones.
 */
export function resolveInstance(
  name: string,
  extra: Readonly<Record<string, Instance>> = {},
): Instance {
  const table: Record<string, Instance> = { ...KNOWN_INSTANCES, ...extra };
  const found = table[name];
  if (found === undefined) {
    throw new UnknownInstanceError(name, Object.keys(table).sort());
  }
  return found;
}
