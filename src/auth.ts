import type { Page } from 'playwright';
import type { ExtractorConfig } from './types.js';
import type { BrowserSession } from './browser-session.js';
import type { CookieJar } from './cookie-jar.js';
import { BASE_URL } from './config.js';
import { captureFingerprint, saveFingerprint } from './fingerprint.js';
import { TwoFactorError, errorMessage } from './errors.js';
import { closePopups, loadPage, typeLikeHuman } from './page-actions.js';
import { runStage, STAGE_POLICIES } from './retry.js';
import { logger } from './logger.js';

const MAIN_MENU_SELECTOR = '.ThemeMainMenu';
const EMAIL_SELECTOR = '#user_email';
const PASSWORD_SELECTOR = '#user_password';
const SUBMIT_SELECTOR = "button[type='submit']";

const AUTH_CODE_INPUT_SELECTORS = [
  "input[name*='code']",
  "input[id*='code']",
  "input[placeholder*='code']",
  "input[placeholder*='digit']",
  "input[type='number']",
  "input[type='text']"
];

const CONTINUE_SELECTORS = [
  "button[type='submit']",
  "input[type='submit']",
  "button:has-text('Continue')",
  "input[value*='Continue']",
  "button:has-text('Verify')",
  "input[value*='Verify']"
];

/**
 * Logged in means we left the login page but are still on ServiceM8
 */
export function isLoggedInUrl(url: string): boolean {
  return !url.toLowerCase().includes('login') && url.includes('servicem8.com');
}

export function isTwoFactorPrompt(pageText: string): boolean {
  const text = pageText.toLowerCase();
  return text.includes('authentication code') || text.includes('enter your authentication');
}

/**
 * Signs into ServiceM8 in the shared browser session.
 * Every public method reports failure through its return value.
 */
export class ServiceM8Authenticator {
  constructor(
    private readonly config: ExtractorConfig,
    private readonly session: BrowserSession,
    private readonly cookieJar: CookieJar
  ) {}

  private get page(): Page {
    return this.session.currentPage;
  }

  /**
   * Main menu visible → logged in; login form visible → not; otherwise judge by URL
   */
  async isLoggedIn(): Promise<boolean> {
    try {
      const currentUrl = this.page.url();
      if (currentUrl.toLowerCase().includes('login')) {
        return false;
      }

      try {
        await this.page.locator(MAIN_MENU_SELECTOR).first().waitFor({ state: 'attached', timeout: 5_000 });
        logger.info('✅ Already logged in - found navigation menu');
        return true;
      } catch {
        logger.debug('Navigation menu not found');
      }

      if ((await this.page.locator(EMAIL_SELECTOR).count()) > 0) {
        logger.info('Not logged in - found login form');
        return false;
      }

      if (isLoggedInUrl(currentUrl)) {
        logger.info('✅ Already logged in - on servicem8 domain');
        return true;
      }
      return false;
    } catch (error) {
      logger.warn(`⚠️ Error checking login status: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Try to reuse the session stored in the cookie jar
   */
  async loginWithCookies(): Promise<boolean> {
    logger.info('🍪 Attempting to login with saved cookies...');
    try {
      if (!(await this.cookieJar.load(this.session.currentContext))) {
        logger.info('No cookies available, will need fresh login');
        return false;
      }

      if (!(await loadPage(this.page, BASE_URL))) {
        logger.error('❌ Failed to load ServiceM8 website');
        return false;
      }

      if (await this.isLoggedIn()) {
        logger.info('✅ Successfully logged in using cookies');
        return true;
      }

      logger.info('Cookies are invalid or expired, need fresh login');
      this.cookieJar.clear();
      await this.session.currentContext.clearCookies();
      return false;
    } catch (error) {
      logger.error(`Error during cookie login: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Fill the login form, with retries
   */
  async login(): Promise<boolean> {
    const policy = STAGE_POLICIES.login(this.config.maxRetries);
    const result = await runStage('Login', policy, async () => {
      if (!(await loadPage(this.page, BASE_URL))) {
        logger.error('❌ Failed to load ServiceM8 website');
        await this.session.screenshot('failed_to_load_website');
        return false;
      }

      await closePopups(this.session);

      const email = this.page.locator(EMAIL_SELECTOR);
      await email.waitFor({ state: 'visible', timeout: 15_000 });
      await this.session.screenshot('login_form_visible');

      await typeLikeHuman(email, this.config.credentials.email);
      await typeLikeHuman(this.page.locator(PASSWORD_SELECTOR), this.config.credentials.password);

      const submit = this.page.locator(SUBMIT_SELECTOR).first();
      await submit.hover();
      await submit.click();
      await this.page.waitForTimeout(5_000);

      if (!(await this.handleTwoFactor())) {
        logger.warn('⚠️ 2FA authentication failed');
        return false;
      }

      const currentUrl = this.page.url();
      if (!isLoggedInUrl(currentUrl)) {
        logger.warn(`⚠️ Login failed - still on login page (${currentUrl})`);
        await this.session.screenshot('login_failed');
        return false;
      }

      logger.info('✅ Login successful');
      await this.session.screenshot('after_login');
      await this.cookieJar.save(this.session.currentContext);
      await this.refreshFingerprint();
      return true;
    });

    return result === true;
  }

  /**
   * Complete the second factor if the page asks for it.
   * Returns true when no prompt was shown or the code was accepted.
   */
  async handleTwoFactor(): Promise<boolean> {
    try {
      logger.info('🔐 Checking for 2FA authentication page...');
      await this.page.waitForTimeout(3_000);

      const pageText = await this.page.locator('body').innerText();
      if (!isTwoFactorPrompt(pageText)) {
        logger.info('No 2FA authentication page detected');
        return true;
      }

      logger.info('🔐 2FA authentication page detected');
      await this.session.screenshot('2fa_page_detected');

      const authCode = this.config.credentials.authCode;
      if (!authCode) {
        throw new TwoFactorError('2FA authentication code required but AUTH_CODE environment variable not set');
      }

      const input = await this.firstPresent(AUTH_CODE_INPUT_SELECTORS);
      if (!input) {
        throw new TwoFactorError('Could not find authentication code input field');
      }
      await input.fill(authCode);
      logger.info('Authentication code entered');

      const button = await this.firstPresent(CONTINUE_SELECTORS);
      if (!button) {
        throw new TwoFactorError('Could not find continue/verify button');
      }
      await button.click();
      logger.info('Continue button clicked');
      await this.page.waitForTimeout(5_000);

      if (isLoggedInUrl(this.page.url())) {
        logger.info('✅ 2FA authentication successful');
        await this.session.screenshot('2fa_success');
        return true;
      }

      logger.warn('⚠️ 2FA authentication may have failed');
      return false;
    } catch (error) {
      logger.error(`Error handling 2FA authentication: ${errorMessage(error)}`);
      return false;
    }
  }

  private async firstPresent(selectors: string[]) {
    for (const selector of selectors) {
      const locator = this.page.locator(selector).first();
      if ((await locator.count()) > 0) {
        logger.debug(`Found element using selector: ${selector}`);
        return locator;
      }
    }
    return null;
  }

  private async refreshFingerprint(): Promise<void> {
    try {
      const fingerprint = await captureFingerprint(this.page);
      saveFingerprint(this.config.fingerprintPath, fingerprint);
    } catch (error) {
      logger.warn(`Failed to save device fingerprint: ${errorMessage(error)}`);
    }
  }
}
