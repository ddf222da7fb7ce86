import type { Locator, Page } from 'playwright';
import type { BrowserSession } from './browser-session.js';
import { errorMessage } from './errors.js';
import { runStage, STAGE_POLICIES, sleep, type RetryPolicy } from './retry.js';
import { logger } from './logger.js';

const POPUP_CLOSE_SELECTORS = [
  '#ext-gen17',
  'div.x-tool.x-tool-close',
  '[class*="x-tool-close"]',
  '.x-window-header .x-tool-close',
  '.x-window-header .x-tool'
];

const MASK_SELECTORS = ['.ext-el-mask', '#ext-gen20', '.x-mask'];

/**
 * Check if website is responsive with a plain HTTP request
 */
export async function checkWebsiteResponsiveness(url: string, timeoutMs: number = 10_000): Promise<boolean> {
  try {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs), redirect: 'follow' });
    return response.status === 200;
  } catch (error) {
    logger.warn(`⚠️ Website responsiveness check failed: ${errorMessage(error)}`);
    return false;
  }
}

export function isUsablePageUrl(url: string): boolean {
  return url !== '' && !url.startsWith('data:') && url !== 'about:blank';
}

/**
 * Load a page with retries. The HTTP reachability check only runs before the first attempt
 * and its failure is not fatal.
 */
export async function loadPage(page: Page, url: string, policy: RetryPolicy = STAGE_POLICIES.pageLoad): Promise<boolean> {
  const loaded = await runStage(`Loading ${url}`, policy, async attempt => {
    if (attempt === 1 && !(await checkWebsiteResponsiveness(url))) {
      logger.warn('⚠️ Website responsiveness check failed, but continuing with browser load');
    }

    await page.goto(url, { waitUntil: 'load', timeout: 15_000 });
    await page.locator('body').waitFor({ state: 'attached', timeout: 10_000 });

    const currentUrl = page.url();
    if (!isUsablePageUrl(currentUrl)) {
      logger.warn(`⚠️ Website may not have loaded correctly - URL: ${currentUrl}`);
      return false;
    }
    logger.info(`✅ Website loaded: ${currentUrl}`);
    return true;
  });

  return loaded === true;
}

async function firstVisible(page: Page, selectors: string[]): Promise<{ selector: string; locator: Locator } | null> {
  for (const selector of selectors) {
    const locator = page.locator(selector).first();
    try {
      if (await locator.isVisible()) {
        return { selector, locator };
      }
    } catch (error) {
      logger.debug(`Selector ${selector} failed: ${errorMessage(error)}`);
    }
  }
  return null;
}

/**
 * Close the "Updates" window ExtJS shows after login, falling back to Escape.
 * Returns true when something was closed.
 */
export async function closePopup(session: BrowserSession): Promise<boolean> {
  const page = session.currentPage;
  try {
    const target = await firstVisible(page, POPUP_CLOSE_SELECTORS);
    if (target) {
      await session.screenshot('before_popup_close');
      await target.locator.hover();
      await target.locator.click();
      logger.info(`🪟 Popup closed using selector: ${target.selector}`);
      await page.waitForTimeout(2_000);
      await session.screenshot('after_popup_close');
      return true;
    }

    const openWindow = await firstVisible(page, ['.x-window']);
    if (openWindow) {
      await page.keyboard.press('Escape');
      logger.info('🪟 Popup closed using Escape key');
      await page.waitForTimeout(2_000);
      await session.screenshot('after_popup_escape');
      return true;
    }

    logger.debug('No popup found');
    return false;
  } catch (error) {
    logger.debug(`Failed to close popup: ${errorMessage(error)}`);
    return false;
  }
}

export async function closePopups(session: BrowserSession, tries: number = 3): Promise<boolean> {
  for (let attempt = 1; attempt <= tries; attempt++) {
    if (await closePopup(session)) return true;
    await sleep(1_000);
  }
  return false;
}

/**
 * Hide ExtJS loading masks that swallow clicks
 */
export async function hideExtjsMasks(page: Page): Promise<number> {
  try {
    const hidden = await page.evaluate((selectors: string[]) => {
      let count = 0;
      for (const element of Array.from(document.querySelectorAll<HTMLElement>(selectors.join(', ')))) {
        if (element.style.display !== 'none') {
          element.style.display = 'none';
          count++;
        }
      }
      return count;
    }, MASK_SELECTORS);
    if (hidden > 0) {
      logger.info(`🎭 Hid ${hidden} ExtJS mask(s)`);
    }
    return hidden;
  } catch (error) {
    logger.debug(`Failed to remove ExtJS mask: ${errorMessage(error)}`);
    return 0;
  }
}

/**
 * Clear a field and type into it one key at a time
 */
export async function typeLikeHuman(locator: Locator, text: string, delayMs: number = 100): Promise<void> {
  await locator.click();
  await locator.fill('');
  await locator.pressSequentially(text, { delay: delayMs });
}
