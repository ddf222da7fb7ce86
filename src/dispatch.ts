import type { Page } from 'playwright';
import type { BrowserSession } from './browser-session.js';
import type { ServiceM8Authenticator } from './auth.js';
import { AccessDeniedError, errorMessage } from './errors.js';
import { closePopups, hideExtjsMasks } from './page-actions.js';
import { runStage, STAGE_POLICIES, type StageOptions } from './retry.js';
import { logger } from './logger.js';

const DISPATCH_LINK_SELECTORS = [
  "a[href*='job_dispatch']",
  "a[href*='dispatch']",
  "a:has-text('Dispatch')",
  "a:has-text('dispatch')",
  "a:has(span:has-text('Dispatch'))",
  "a:has(div:has-text('Dispatch'))",
  "[class*='dispatch'] a",
  "[id*='dispatch'] a"
];

const ACCESS_DENIED = 'access denied';

export function isDispatchUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return lower.includes('dispatch');
}

/**
 * Direct Dispatch Board URL on whichever ServiceM8 host the session landed on
 */
export function dispatchUrlFor(currentUrl: string): string {
  return `${new URL(currentUrl).origin}/job_dispatch`;
}

export function isAccessDenied(title: string, bodyText: string): boolean {
  return title.toLowerCase().includes(ACCESS_DENIED) || bodyText.toLowerCase().includes(ACCESS_DENIED);
}

type Strategy = { name: string; run: () => Promise<boolean> };

/**
 * Opens the Dispatch Board from wherever login left the page
 */
export class DispatchNavigator {
  constructor(
    private readonly session: BrowserSession,
    private readonly authenticator: ServiceM8Authenticator,
    private readonly maxRetries: number,
    private readonly options: Pick<StageOptions, 'sleep'> = {}
  ) {}

  private get page(): Page {
    return this.session.currentPage;
  }

  async navigate(): Promise<boolean> {
    const strategies: Strategy[] = [
      { name: 'menu link', run: () => this.viaMenuLink() },
      { name: 'direct URL', run: () => this.viaDirectUrl() },
      { name: 'link text search', run: () => this.viaLinkScan() }
    ];

    const result = await runStage(
      'Dispatch navigation',
      STAGE_POLICIES.navigation(this.maxRetries),
      async () => {
        await closePopups(this.session);
        await hideExtjsMasks(this.page);

        for (const strategy of strategies) {
          logger.info(`🧭 Trying Dispatch Board via ${strategy.name}`);
          let clicked = false;
          try {
            clicked = await strategy.run();
          } catch (error) {
            logger.warn(`⚠️ ${strategy.name} failed: ${errorMessage(error)}`);
          }
          if (clicked && (await this.onDispatchBoard())) {
            logger.info(`✅ Reached Dispatch Board via ${strategy.name}`);
            await this.session.screenshot('dispatch_board');
            return true;
          }
        }

        await this.session.screenshot('dispatch_navigation_failed');
        return false;
      },
      { ...this.options, beforeRetry: () => this.refresh() }
    );

    return result === true;
  }

  /**
   * Throws AccessDeniedError so the retry runner stops immediately
   */
  private async onDispatchBoard(): Promise<boolean> {
    const title = await this.page.title();
    const bodyText = await this.page.locator('body').innerText();
    const url = this.page.url();

    if (isAccessDenied(title, bodyText)) {
      await this.session.screenshot('access_denied');
      throw new AccessDeniedError(url, title);
    }

    if (!isDispatchUrl(url)) {
      logger.debug(`Not on Dispatch Board yet: ${url}`);
      return false;
    }
    return true;
  }

  private async viaMenuLink(): Promise<boolean> {
    for (const selector of DISPATCH_LINK_SELECTORS) {
      const link = this.page.locator(selector).first();
      try {
        await link.waitFor({ state: 'visible', timeout: 10_000 });
      } catch {
        logger.debug(`Dispatch link not found using selector: ${selector}`);
        continue;
      }

      logger.info(`Found Dispatch link using selector: ${selector}`);
      await link.scrollIntoViewIfNeeded();
      try {
        await link.hover();
        await link.click({ timeout: 5_000 });
      } catch (clickError) {
        logger.debug(`Regular click failed, using DOM click: ${errorMessage(clickError)}`);
        await link.evaluate((element: HTMLElement) => element.click());
      }
      await this.page.waitForTimeout(10_000);
      return true;
    }
    return false;
  }

  private async viaDirectUrl(): Promise<boolean> {
    const url = dispatchUrlFor(this.page.url());
    logger.info(`Navigating directly to ${url}`);
    await this.page.goto(url, { waitUntil: 'load', timeout: 30_000 });
    await this.page.waitForTimeout(5_000);

    if (!(await this.authenticator.handleTwoFactor())) {
      logger.warn('⚠️ 2FA authentication failed on Dispatch Board');
      return false;
    }
    return true;
  }

  private async viaLinkScan(): Promise<boolean> {
    const index = await this.page.evaluate(() => {
      const links = Array.from(document.querySelectorAll('a'));
      return links.findIndex(link => {
        const href = (link.getAttribute('href') || '').toLowerCase();
        const text = (link.textContent || '').toLowerCase();
        return href.includes('dispatch') || text.includes('dispatch');
      });
    });

    if (index < 0) {
      logger.debug('No link mentioning dispatch found on page');
      return false;
    }

    const link = this.page.locator('a').nth(index);
    logger.info(`Found Dispatch link by text search: ${(await link.innerText()).trim()}`);
    await link.click();
    await this.page.waitForTimeout(10_000);
    return true;
  }

  private async refresh(): Promise<void> {
    logger.info('🔄 Refreshing page before next Dispatch attempt');
    await this.page.reload({ waitUntil: 'load', timeout: 30_000 });
    await this.page.waitForTimeout(5_000);
  }
}
