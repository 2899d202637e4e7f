/**
 * Default configuration values.
 * Timeouts and signal selectors are overridable via config file;
 * the selectors track one specific GUI's markup and drift with it.
 */

import type { Signals, Timeouts, Viewport } from '../schema/index.js';

export const TIMEOUTS = {
  NAVIGATION: 60_000,
  ACTION: 5_000,
  READY_WAIT: 300_000,
  BUSY_APPEAR_GRACE: 5_000,
  BUSY_DISAPPEAR: 300_000,
  LOGIN: 30_000,
  SETTLE: 2_000,
  CHANNEL: 600_000,
  WORKER_EXIT: 10_000,
  TEARDOWN_PAUSE: 1_000,
  REAP_GRACE: 3_000,
} as const;

export const LIMITS = {
  MAX_ATTEMPTS: 5,
  MAX_LOGIN_ROUNDS: 2,
  CATALOG_PAGE_SIZE: 100,
} as const;

export const DEFAULT_TIMEOUTS: Timeouts = {
  navigation: TIMEOUTS.NAVIGATION,
  action: TIMEOUTS.ACTION,
  readyWait: TIMEOUTS.READY_WAIT,
  busyAppearGrace: TIMEOUTS.BUSY_APPEAR_GRACE,
  busyDisappear: TIMEOUTS.BUSY_DISAPPEAR,
  login: TIMEOUTS.LOGIN,
  settle: TIMEOUTS.SETTLE,
};

export const VIEWPORT: Viewport = { width: 1920, height: 1080 };

export const LOGIN_BUTTON_LABEL = 'LOG IN WITH GITHUB';

export const DEFAULT_SIGNALS: Signals = {
  progress: { strategy: 'class', value: 'v-progress-circular' },
  fileListProgress: { strategy: 'class', value: 'v-progress-linear' },
  editMetadataButton: { strategy: 'id', value: 'view-edit-metadata' },
  metadataEditor: { strategy: 'class', value: 'v-dialog--active' },
  loginButton: { strategy: 'id', value: 'login' },
  usernameField: { strategy: 'id', value: 'login_field' },
  passwordField: { strategy: 'id', value: 'password' },
  authorizeButton: { strategy: 'id', value: 'js-oauth-authorize-btn' },
  loggedIn: { strategy: 'id', value: 'logout' },
  rateLimit: { strategy: 'xpath', value: "//*[contains(text(), 'exceeded a secondary rate limit')]" },
};
