import { collectionPageSchema } from '../schema/catalog.js';
import { LIMITS } from '../config/defaults.js';

// ── Types ────────────────────────────────────────────────────

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export class CatalogError extends Error {
  readonly status: number;

  constructor(url: string, status: number, body: string) {
    super(`Archive API error (${String(status)}) for ${url}: ${body}`);
    this.name = 'CatalogError';
    this.status = status;
  }
}

// ── Listing ──────────────────────────────────────────────────

/**
 * List every collection identifier known to the archive, following
 * the API's pagination. Sorted lexicographically, duplicates dropped.
 */
export async function listCollections(
  apiUrl: string,
  fetchImpl: FetchLike = fetch,
): Promise<string[]> {
  const identifiers = new Set<string>();
  let url: string | null =
    `${apiUrl.replace(/\/+$/, '')}/dandisets/?page_size=${String(LIMITS.CATALOG_PAGE_SIZE)}&ordering=identifier`;

  while (url !== null) {
    const response = await fetchImpl(url, { headers: { Accept: 'application/json' } });
    if (!response.ok) {
      throw new CatalogError(url, response.status, await response.text());
    }

    const body: unknown = await response.json();
    const page = collectionPageSchema.parse(body);
    for (const entry of page.results) {
      identifiers.add(entry.identifier);
    }
    url = page.next;
  }

  return [...identifiers].sort();
}
