import type { Signals, Timeouts } from '../schema/index.js';
import type { Credentials } from '../config/credentials.js';
import { LIMITS, LOGIN_BUTTON_LABEL } from '../config/defaults.js';
import { FatalError } from '../core/errors.js';
import type { Logger } from '../utils/logger.js';
import type { BrowserDriver } from './driver.js';

// ── Public types ─────────────────────────────────────────────

export interface LoginOptions {
  baseUrl: string;
  credentials: Credentials;
  signals: Signals;
  timeouts: Timeouts;
  logger: Logger;
  expectedLabel?: string;
}

type LoginState = 'authorize' | 'loggedIn' | 'rateLimited';

// ── Login flow ──────────────────────────────────────────────

/**
 * Log into the archive GUI through its GitHub OAuth flow.
 *
 * Two outcomes escalate as {@link FatalError} instead of failing the
 * worker: a login control whose label is not the one we know (the GUI
 * changed under us) and GitHub's rate-limit page (retrying would only
 * make the throttling worse).
 */
export async function login(driver: BrowserDriver, options: LoginOptions): Promise<void> {
  const { signals, timeouts, logger } = options;
  const expected = options.expectedLabel ?? LOGIN_BUTTON_LABEL;

  logger.login(`Opening ${options.baseUrl}`);
  await driver.goto(options.baseUrl, timeouts.navigation);
  await driver.waitHidden(signals.progress, timeouts.busyDisappear);

  const label = (await driver.textOf(signals.loginButton, timeouts.login)).trim();
  if (label.toUpperCase() !== expected.toUpperCase()) {
    throw new FatalError(
      `Login control reads "${label}", expected "${expected}"; the GUI has changed`,
    );
  }

  await driver.click(signals.loginButton, timeouts.login);
  await driver.fill(signals.usernameField, options.credentials.username, timeouts.login);
  await driver.fill(signals.passwordField, options.credentials.password, timeouts.login);
  await driver.submit(signals.passwordField, timeouts.login);

  for (let round = 0; round < LIMITS.MAX_LOGIN_ROUNDS; round++) {
    const state = await driver.waitForFirst<LoginState>(
      [
        ['authorize', signals.authorizeButton],
        ['loggedIn', signals.loggedIn],
        ['rateLimited', signals.rateLimit],
      ],
      timeouts.login,
    );

    if (state === 'rateLimited') {
      throw new FatalError('GitHub is rate-limiting logins; stopping the run');
    }
    if (state === 'loggedIn') {
      logger.login('Logged in');
      return;
    }

    logger.login('Authorizing the OAuth application');
    await driver.click(signals.authorizeButton, timeouts.login);
  }

  logger.login('Login flow finished without a logged-in marker; continuing');
}
