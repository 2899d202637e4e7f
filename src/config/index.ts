/**
 * Configuration module.
 * Defaults, known instances, config file loading and the merge of
 * CLI flags over file over defaults. Zod-validated.
 */

export {
  TIMEOUTS,
  LIMITS,
  DEFAULT_TIMEOUTS,
  DEFAULT_SIGNALS,
  VIEWPORT,
  LOGIN_BUTTON_LABEL,
} from './defaults.js';
export {
  KNOWN_INSTANCES,
  DEFAULT_INSTANCE,
  COLLECTION_ROUTE,
  collectionsUrl,
  resolveInstance,
  UnknownInstanceError,
} from './instances.js';
export { loadConfigFile } from './loader.js';
export { loadCredentials, MissingCredentialsError, USERNAME_ENV, PASSWORD_ENV } from './credentials.js';
export type { Credentials } from './credentials.js';
export { resolveRunSettings } from './resolve.js';
export type { RunOverrides, RunSettings } from './resolve.js';
