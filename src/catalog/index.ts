/**
 * Catalog module: enumerates the archive's collections.
 */

export { listCollections, CatalogError } from './client.js';
export type { FetchLike } from './client.js';
