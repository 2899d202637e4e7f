import type { Locator, Page } from 'playwright-core';

import type { Selector } from '../schema/index.js';

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps a configured Selector to a Playwright Locator.
 *
 *   class → `.value`
 *   id    → `[id="value"]`
 *   css   → value as-is
 *   xpath → `xpath=value`
 *   text  → page.getByText(value)
 *
 * Always narrowed to the first match: UI signals such as spinners
 * can be rendered more than once and Playwright locators are strict.
 */
export function resolveSelector(page: Page, selector: Selector): Locator {
  switch (selector.strategy) {
    case 'class':
      return page.locator(`.${selector.value}`).first();

    case 'id':
      return page.locator(`[id="${selector.value}"]`).first();

    case 'css':
      return page.locator(selector.value).first();

    case 'xpath':
      return page.locator(`xpath=${selector.value}`).first();

    case 'text':
      return page.getByText(selector.value).first();
  }
}

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner describing the selector for logs. */
export function describeSelector(selector: Selector): string {
  switch (selector.strategy) {
    case 'class':
      return `.${selector.value}`;
    case 'id':
      return `#${selector.value}`;
    case 'css':
      return selector.value;
    case 'xpath':
      return `xpath=${selector.value}`;
    case 'text':
      return `text="${selector.value}"`;
  }
}
