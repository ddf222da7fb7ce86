import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { chromium, type Browser, type BrowserContext, type Page } from 'playwright';
import type { DeviceFingerprint, ExtractorConfig } from './types.js';
import { parseScreenResolution } from './fingerprint.js';
import { saveDownload } from './downloads.js';
import { errorMessage } from './errors.js';
import { runStage, STAGE_POLICIES, sleep } from './retry.js';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
export const DEFAULT_LOCALE = 'en-AU';
export const DEFAULT_TIMEZONE = 'Australia/Sydney';

export const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--window-size=1920,1080',
  '--disable-blink-features=AutomationControlled',
  '--lang=en-AU',
  '--force-device-scale-factor=1',
  '--disable-extensions',
  '--disable-background-networking',
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding',
  '--disable-features=TranslateUI',
  '--no-first-run',
  '--password-store=basic',
  '--use-mock-keychain'
];

/** Values replayed into the page before any site script runs */
export interface IdentityOverrides {
  platform: string;
  language: string;
  languages: string[];
  width: number;
  height: number;
  colorDepth: number;
  pixelRatio: number;
}

export function identityOverrides(fingerprint: DeviceFingerprint): IdentityOverrides {
  const { width, height } = parseScreenResolution(fingerprint.screen_resolution);
  return {
    platform: fingerprint.platform,
    language: fingerprint.language,
    languages: fingerprint.languages,
    width,
    height,
    colorDepth: fingerprint.color_depth,
    pixelRatio: fingerprint.pixel_ratio
  };
}

export function contextOptionsFor(fingerprint: DeviceFingerprint | null) {
  const viewport = fingerprint ? parseScreenResolution(fingerprint.screen_resolution) : { width: 1920, height: 1080 };
  return {
    userAgent: fingerprint?.user_agent || DEFAULT_USER_AGENT,
    locale: fingerprint?.language || DEFAULT_LOCALE,
    timezoneId: fingerprint?.timezone || DEFAULT_TIMEZONE,
    viewport,
    deviceScaleFactor: fingerprint?.pixel_ratio ?? 1,
    acceptDownloads: true,
    extraHTTPHeaders: { 'Accept-Language': `${DEFAULT_LOCALE},en;q=0.9` }
  };
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function screenshotFileName(description: string, date: Date = new Date()): string {
  const stamp = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  const safe = description.replace(/[^a-zA-Z0-9_-]+/g, '_');
  return `${stamp}_${safe}.png`;
}

/**
 * Kill Chrome/Chromium processes left over from earlier runs
 */
export async function killStaleBrowsers(): Promise<void> {
  for (const pattern of ['chrome', 'chromium']) {
    try {
      await execFileAsync('pkill', ['-9', '-f', pattern], { timeout: 5_000 });
      logger.debug(`🧹 Killed stale ${pattern} processes`);
    } catch (error) {
      // pkill exits 1 when nothing matched
      logger.debug(`Process cleanup for ${pattern} skipped: ${errorMessage(error)}`);
    }
  }
  await sleep(2_000);
}

/**
 * Owns the single browser, context and page used for a run
 */
export class BrowserSession {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(
    private readonly config: ExtractorConfig,
    private readonly fingerprint: DeviceFingerprint | null = null
  ) {}

  get currentPage(): Page {
    if (!this.page) {
      throw new Error('Browser session has not been started');
    }
    return this.page;
  }

  get currentContext(): BrowserContext {
    if (!this.context) {
      throw new Error('Browser session has not been started');
    }
    return this.context;
  }

  /**
   * Launch Chromium with retries. Returns false when every attempt failed.
   */
  async start(): Promise<boolean> {
    const started = await runStage('Browser setup', STAGE_POLICIES.browserInit, async () => {
      await this.close();
      if (this.config.killStaleBrowsers) {
        await killStaleBrowsers();
      }

      const headless = !this.config.headful;
      logger.info(`🚀 Launching browser (headless: ${headless})`);
      this.browser = await chromium.launch({
        headless,
        args: LAUNCH_ARGS,
        ignoreDefaultArgs: ['--enable-automation']
      });

      this.context = await this.browser.newContext(contextOptionsFor(this.fingerprint));
      await this.context.addInitScript((overrides: IdentityOverrides | null) => {
        Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
        if (!overrides) return;
        Object.defineProperty(navigator, 'platform', { get: () => overrides.platform });
        Object.defineProperty(navigator, 'language', { get: () => overrides.language });
        Object.defineProperty(navigator, 'languages', { get: () => overrides.languages });
        Object.defineProperty(screen, 'width', { get: () => overrides.width });
        Object.defineProperty(screen, 'height', { get: () => overrides.height });
        Object.defineProperty(screen, 'colorDepth', { get: () => overrides.colorDepth });
        Object.defineProperty(window, 'devicePixelRatio', { get: () => overrides.pixelRatio });
      }, this.fingerprint ? identityOverrides(this.fingerprint) : null);

      if (this.fingerprint) {
        logger.info('🖐️  Applied existing device fingerprint');
      } else {
        logger.info('No existing fingerprint found, will create new one after first successful login');
      }

      this.page = await this.context.newPage();
      this.page.on('dialog', dialog => {
        logger.warn(`💬 Dialog appeared: ${dialog.type()} ${dialog.message()}`);
        dialog.dismiss().catch(error => logger.debug(`Dialog dismiss failed: ${errorMessage(error)}`));
      });
      this.page.on('download', download => {
        void saveDownload(download, this.config.downloadDir);
      });

      await this.page.goto('about:blank');
      logger.info('✅ Browser setup successful');
      return true;
    });

    return started === true;
  }

  /**
   * Save a timestamped screenshot; failures are only logged
   */
  async screenshot(description: string): Promise<string | null> {
    if (!this.page) {
      logger.warn('Cannot take screenshot - browser not started');
      return null;
    }
    try {
      if (!existsSync(this.config.screenshotsDir)) {
        mkdirSync(this.config.screenshotsDir, { recursive: true });
      }
      const filePath = join(this.config.screenshotsDir, screenshotFileName(description));
      await this.page.screenshot({ path: filePath, fullPage: true });
      logger.info(`📸 Screenshot saved: ${filePath}`);
      return filePath;
    } catch (error) {
      logger.warn(`📸 Failed to take screenshot '${description}': ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Clean up browser resources
   */
  async close(): Promise<void> {
    if (this.browser) {
      try {
        await this.browser.close();
        logger.info('🧹 Browser session closed');
      } catch (closeError) {
        logger.warn(`Error closing browser: ${errorMessage(closeError)}`);
      } finally {
        this.browser = null;
        this.context = null;
        this.page = null;
      }
    }
  }
}
