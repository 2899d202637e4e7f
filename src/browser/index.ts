/**
 * Browser module.
 * Playwright behind the BrowserDriver capability interface, the
 * login flow, and the Session that owns one browser end to end.
 */

export { resolveSelector, describeSelector } from './selectors.js';
export { launchPlaywrightDriver } from './driver.js';
export type { BrowserDriver, DriverFactory, DriverOptions } from './driver.js';
export { login } from './auth.js';
export type { LoginOptions } from './auth.js';
export { Session, withSession } from './session.js';
export type { SessionConfig, SessionDeps } from './session.js';
