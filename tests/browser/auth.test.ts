import { beforeEach, describe, expect, it } from 'vitest';

import { login } from '../../src/browser/auth.js';
import type { LoginOptions } from '../../src/browser/auth.js';
import { DEFAULT_SIGNALS, DEFAULT_TIMEOUTS } from '../../src/config/defaults.js';
import { FatalError, WaitTimeoutError } from '../../src/core/errors.js';
import { silentLogger } from '../../src/utils/logger.js';
import { FakeDriver } from '../helpers/fakes.js';

const OPTIONS: LoginOptions = {
  baseUrl: 'https://gui.test/#/dandiset',
  credentials: { username: 'test-user', password: 'test-secret' },
  signals: DEFAULT_SIGNALS,
  timeouts: DEFAULT_TIMEOUTS,
  logger: silentLogger,
};

describe('login', () => {
  let driver: FakeDriver;

  beforeEach(() => {
    driver = new FakeDriver();
    driver.texts.set('login', '  Log in with GitHub ');
  });

  it('signs in, authorizes the app and stops at the logged-in marker', async () => {
    driver.firstVisible.push('js-oauth-authorize-btn', 'logout');

    await login(driver, OPTIONS);

    expect(driver.calls).toEqual([
      'goto https://gui.test/#/dandiset',
      'waitHidden v-progress-circular',
      'textOf login',
      'click login',
      'fill login_field',
      'fill password',
      'submit password',
      'waitForFirst',
      'click js-oauth-authorize-btn',
      'waitForFirst',
    ]);
    expect(driver.filled.get('login_field')).toBe('test-user');
    expect(driver.filled.get('password')).toBe('test-secret');
  });

  it('skips authorization when already logged in', async () => {
    driver.firstVisible.push('logout');

    await login(driver, OPTIONS);

    expect(driver.calls).not.toContain('click js-oauth-authorize-btn');
    expect(driver.calls.filter((c) => c === 'waitForFirst')).toHaveLength(1);
  });

  it('gives up looking for the marker after two rounds', async () => {
    driver.firstVisible.push('js-oauth-authorize-btn', 'js-oauth-authorize-btn');

    await expect(login(driver, OPTIONS)).resolves.toBeUndefined();
    expect(driver.calls.filter((c) => c === 'click js-oauth-authorize-btn')).toHaveLength(2);
  });

  it('is fatal when the login control carries an unexpected label', async () => {
    driver.texts.set('login', 'Sign in');

    const attempt = login(driver, OPTIONS);
    await expect(attempt).rejects.toBeInstanceOf(FatalError);
    await expect(attempt).rejects.toThrow(
      'Login control reads "Sign in", expected "LOG IN WITH GITHUB"; the GUI has changed',
    );
    expect(driver.calls).not.toContain('click login');
  });

  it('is fatal when GitHub rate-limits the login', async () => {
    driver.firstVisible.push(DEFAULT_SIGNALS.rateLimit.value);

    await expect(login(driver, OPTIONS)).rejects.toThrow(
      new FatalError('GitHub is rate-limiting logins; stopping the run'),
    );
  });

  it('lets a wait timeout through when no known page shows up', async () => {
    await expect(login(driver, OPTIONS)).rejects.toBeInstanceOf(WaitTimeoutError);
  });
});
