import type { DeviceFingerprint, ExtractionResult, ExtractorConfig } from './types.js';
import { BASE_URL } from './config.js';
import { BrowserSession, killStaleBrowsers } from './browser-session.js';
import { CookieJar } from './cookie-jar.js';
import { captureFingerprint, describeFingerprint, loadFingerprint, saveFingerprint } from './fingerprint.js';
import { ServiceM8Authenticator } from './auth.js';
import { DispatchNavigator } from './dispatch.js';
import { extractSessionWithRetry } from './token-extraction.js';
import { buildApiEndpoints, formatResult } from './api-endpoints.js';
import { BrowserLaunchError, errorMessage } from './errors.js';
import { closePopups, loadPage } from './page-actions.js';
import { STAGE_POLICIES } from './retry.js';
import { logger, StepTimer } from './logger.js';

/**
 * Runs one extraction: browser → login → Dispatch Board → tokens → result.
 * A failed stage ends the run with null; the browser is always closed.
 */
export class ServiceM8Extractor {
  private session: BrowserSession | null = null;
  private readonly cookieJar: CookieJar;

  constructor(
    private readonly config: ExtractorConfig,
    private readonly timer: StepTimer = new StepTimer()
  ) {
    this.cookieJar = new CookieJar(config.cookiesPath, BASE_URL);
  }

  async extract(): Promise<ExtractionResult | null> {
    try {
      const session = new BrowserSession(this.config, loadFingerprint(this.config.fingerprintPath));
      this.session = session;

      if (!(await session.start())) {
        logger.error(`❌ ${new BrowserLaunchError(STAGE_POLICIES.browserInit.attempts).message}`);
        return null;
      }
      this.timer.step('Browser setup');

      const authenticator = new ServiceM8Authenticator(this.config, session, this.cookieJar);
      if (!(await authenticator.loginWithCookies()) && !(await authenticator.login())) {
        logger.error('❌ Login failed');
        return null;
      }
      this.timer.step('Login');

      await closePopups(session);
      const navigator = new DispatchNavigator(session, authenticator, this.config.maxRetries);
      if (!(await navigator.navigate())) {
        logger.error('❌ Failed to navigate to Dispatch Board');
        return null;
      }
      this.timer.step('Dispatch navigation');

      logger.info(`⏳ Waiting ${this.config.dispatchSettleMs / 1000}s for Dispatch Board to load...`);
      await session.currentPage.waitForTimeout(this.config.dispatchSettleMs);

      const { tokens, cookie } = await extractSessionWithRetry(
        session.currentPage,
        session.currentContext,
        this.config.maxRetries
      );
      this.timer.step('Token extraction');

      const records = buildApiEndpoints(tokens, cookie);
      if (records.length === 0) {
        logger.error('❌ No auth tokens found on Dispatch Board');
        await session.screenshot('no_tokens_found');
        return null;
      }

      logger.info(`✅ Built ${records.length} API endpoint(s)`);
      return formatResult(records, cookie, this.config.outputFormat);
    } catch (error) {
      logger.error(`❌ Extraction failed: ${errorMessage(error)}`);
      return null;
    } finally {
      await this.shutdown();
    }
  }

  /**
   * Open ServiceM8 in a clean browser and store its identity for later runs
   */
  async captureFingerprintOnly(): Promise<DeviceFingerprint | null> {
    try {
      const session = new BrowserSession(this.config, null);
      this.session = session;

      if (!(await session.start())) {
        logger.error(`❌ ${new BrowserLaunchError(STAGE_POLICIES.browserInit.attempts).message}`);
        return null;
      }
      if (!(await loadPage(session.currentPage, BASE_URL))) {
        logger.error('❌ Failed to load ServiceM8 website');
        return null;
      }
      await session.currentPage.waitForTimeout(3_000);

      const fingerprint = await captureFingerprint(session.currentPage, 'manual');
      if (!saveFingerprint(this.config.fingerprintPath, fingerprint)) {
        return null;
      }

      logger.info('🖐️  Device fingerprint captured:');
      for (const line of describeFingerprint(fingerprint)) {
        logger.info(`   ${line}`);
      }
      return fingerprint;
    } catch (error) {
      logger.error(`❌ Fingerprint capture failed: ${errorMessage(error)}`);
      return null;
    } finally {
      await this.shutdown();
    }
  }

  async shutdown(): Promise<void> {
    if (this.session) {
      await this.session.close();
      this.session = null;
    }
    if (this.config.killStaleBrowsers) {
      await killStaleBrowsers();
    }
  }
}
