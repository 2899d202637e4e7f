import { chromium, errors } from 'playwright-core';
import type { Browser, Page } from 'playwright-core';

import type { Selector, Viewport } from '../schema/index.js';
import { WaitTimeoutError } from '../core/errors.js';
import { describeSelector, resolveSelector } from './selectors.js';

// ── Public types ─────────────────────────────────────────────

/**
 * The browser capabilities the harness consumes. Every wait is
 * bounded and reports running out as a {@link WaitTimeoutError}.
 */
export interface BrowserDriver {
  goto(url: string, timeoutMs: number): Promise<void>;
  waitVisible(target: Selector, timeoutMs: number): Promise<void>;
  waitHidden(target: Selector, timeoutMs: number): Promise<void>;
  /** Resolve with the key of whichever candidate becomes visible first. */
  waitForFirst<K extends string>(
    candidates: ReadonlyArray<readonly [K, Selector]>,
    timeoutMs: number,
  ): Promise<K>;
  click(target: Selector, timeoutMs: number): Promise<void>;
  textOf(target: Selector, timeoutMs: number): Promise<string>;
  fill(target: Selector, value: string, timeoutMs: number): Promise<void>;
  submit(target: Selector, timeoutMs: number): Promise<void>;
  screenshot(filePath: string): Promise<void>;
  /** Serialized HTML of the current page. */
  pageSource(): Promise<string>;
  isAlive(): boolean;
  close(): Promise<void>;
}

export interface DriverOptions {
  headless: boolean;
  viewport: Viewport;
}

export type DriverFactory = (options: DriverOptions) => Promise<BrowserDriver>;

// ── Launch flags ─────────────────────────────────────────────
// The worker usually runs inside a container or under xvfb.

const CHROMIUM_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--disable-gpu'];

// ── Playwright implementation ────────────────────────────────

export const launchPlaywrightDriver: DriverFactory = async (options) => {
  const browser = await chromium.launch({
    headless: options.headless,
    args: CHROMIUM_ARGS,
  });

  let page: Page;
  try {
    const context = await browser.newContext({ viewport: options.viewport });
    page = await context.newPage();
  } catch (err) {
    await browser.close();
    throw err;
  }

  return new PlaywrightDriver(browser, page);
};

class PlaywrightDriver implements BrowserDriver {
  private alive = true;

  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
  ) {
    browser.on('disconnected', () => {
      this.alive = false;
    });
    page.on('crash', () => {
      this.alive = false;
    });
    page.on('close', () => {
      this.alive = false;
    });
  }

  async goto(url: string, timeoutMs: number): Promise<void> {
    await bounded(url, timeoutMs, async () => {
      await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
    });
  }

  async waitVisible(target: Selector, timeoutMs: number): Promise<void> {
    await bounded(`${describeSelector(target)} to appear`, timeoutMs, () =>
      resolveSelector(this.page, target).waitFor({ state: 'visible', timeout: timeoutMs }),
    );
  }

  async waitHidden(target: Selector, timeoutMs: number): Promise<void> {
    await bounded(`${describeSelector(target)} to disappear`, timeoutMs, () =>
      resolveSelector(this.page, target).waitFor({ state: 'hidden', timeout: timeoutMs }),
    );
  }

  async waitForFirst<K extends string>(
    candidates: ReadonlyArray<readonly [K, Selector]>,
    timeoutMs: number,
  ): Promise<K> {
    const [first, ...rest] = candidates;
    if (first === undefined) {
      throw new Error('waitForFirst needs at least one candidate');
    }

    const locators = candidates.map(
      ([key, selector]) => [key, resolveSelector(this.page, selector)] as const,
    );
    const any = rest.reduce(
      (combined, [, selector]) => combined.or(resolveSelector(this.page, selector)),
      resolveSelector(this.page, first[1]),
    );
    const what = candidates.map(([, s]) => describeSelector(s)).join(' | ');

    await bounded(what, timeoutMs, () =>
      any.first().waitFor({ state: 'visible', timeout: timeoutMs }),
    );

    for (const [key, locator] of locators) {
      if (await locator.isVisible()) return key;
    }
    throw new Error(`None of ${what} stayed visible`);
  }

  async click(target: Selector, timeoutMs: number): Promise<void> {
    await bounded(`${describeSelector(target)} to be clickable`, timeoutMs, () =>
      resolveSelector(this.page, target).click({ timeout: timeoutMs }),
    );
  }

  async textOf(target: Selector, timeoutMs: number): Promise<string> {
    return bounded(`text of ${describeSelector(target)}`, timeoutMs, () =>
      resolveSelector(this.page, target).innerText({ timeout: timeoutMs }),
    );
  }

  async fill(target: Selector, value: string, timeoutMs: number): Promise<void> {
    await bounded(`${describeSelector(target)} to accept input`, timeoutMs, () =>
      resolveSelector(this.page, target).fill(value, { timeout: timeoutMs }),
    );
  }

  async submit(target: Selector, timeoutMs: number): Promise<void> {
    await bounded(`${describeSelector(target)} to submit`, timeoutMs, () =>
      resolveSelector(this.page, target).press('Enter', { timeout: timeoutMs }),
    );
  }

  async screenshot(filePath: string): Promise<void> {
    await this.page.screenshot({ path: filePath, fullPage: true });
  }

  pageSource(): Promise<string> {
    return this.page.content();
  }

  isAlive(): boolean {
    return this.alive && this.browser.isConnected() && !this.page.isClosed();
  }

  async close(): Promise<void> {
    if (!this.browser.isConnected()) return;
    await this.browser.close();
  }
}

// ── Timeout mapping ──────────────────────────────────────────

async function bounded<T>(
  what: string,
  timeoutMs: number,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (err instanceof errors.TimeoutError) {
      throw new WaitTimeoutError(what, timeoutMs);
    }
    throw err;
  }
}
