import { existsSync, readFileSync, rmSync, writeFileSync } from 'fs';
import type { BrowserContext } from 'playwright';
import type { StoredCookie } from './types.js';
import { CookieJarSchema } from './schemas/persisted.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

/** The part of a Playwright context the jar needs */
export type CookieContext = Pick<BrowserContext, 'cookies' | 'addCookies'>;

export type CookieParam = Parameters<BrowserContext['addCookies']>[0][number];

export const APP_HOST = 'go.servicem8.com';
export const ROOT_HOST = 'servicem8.com';

export function cookieHeader(cookies: ReadonlyArray<{ name: string; value: string }>): string {
  return cookies.map(cookie => `${cookie.name}=${cookie.value}`).join('; ');
}

function withDomain(cookie: StoredCookie, domain: string): CookieParam {
  return {
    name: cookie.name,
    value: cookie.value,
    domain,
    path: cookie.path || '/',
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite
  };
}

/**
 * Cookie shapes to try, in order, when the stored domain is rejected:
 * original → without leading dot → app host → root host → bound to the base URL.
 */
export function cookieDomainVariants(cookie: StoredCookie, baseUrl: string): CookieParam[] {
  const original = cookie.domain;
  const variants: CookieParam[] = [];

  if (original) {
    variants.push(withDomain(cookie, original));
  }
  if (original.startsWith('.')) {
    variants.push(withDomain(cookie, original.slice(1)));
  }
  if (original.includes(ROOT_HOST)) {
    variants.push(withDomain(cookie, APP_HOST));
  }
  if (original.includes(APP_HOST)) {
    variants.push(withDomain(cookie, ROOT_HOST));
  }
  variants.push({
    name: cookie.name,
    value: cookie.value,
    url: baseUrl,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite
  });

  return variants;
}

/**
 * Cookies persisted between runs so a still-valid session skips the login form
 */
export class CookieJar {
  constructor(private readonly filePath: string, private readonly baseUrl: string) {}

  get path(): string {
    return this.filePath;
  }

  async save(context: CookieContext): Promise<boolean> {
    try {
      const cookies = await context.cookies();
      writeFileSync(this.filePath, JSON.stringify(cookies, null, 2));
      logger.info(`🍪 Saved ${cookies.length} cookie(s) to ${this.filePath}`);
      return true;
    } catch (error) {
      logger.error(`Failed to save cookies: ${errorMessage(error)}`);
      return false;
    }
  }

  read(): StoredCookie[] {
    if (!existsSync(this.filePath)) {
      logger.info('🍪 No cookies file found');
      return [];
    }
    try {
      const parsed = CookieJarSchema.safeParse(JSON.parse(readFileSync(this.filePath, 'utf-8')));
      if (!parsed.success) {
        logger.warn(`⚠️ Cookies file ${this.filePath} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
        return [];
      }
      return parsed.data;
    } catch (error) {
      logger.warn(`⚠️ Failed to read cookies file: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Restore stored cookies into the context.
   * Returns true when at least one cookie was accepted.
   */
  async load(context: CookieContext): Promise<boolean> {
    const cookies = this.read();
    if (cookies.length === 0) {
      return false;
    }

    let loaded = 0;
    for (const cookie of cookies) {
      let accepted = false;
      for (const variant of cookieDomainVariants(cookie, this.baseUrl)) {
        try {
          await context.addCookies([variant]);
          accepted = true;
          break;
        } catch (error) {
          logger.debug(`Cookie ${cookie.name} rejected for ${variant.domain ?? variant.url}: ${errorMessage(error)}`);
        }
      }
      if (accepted) {
        loaded++;
      } else {
        logger.warn(`⚠️ Failed to add cookie ${cookie.name} with all domain variations`);
      }
    }

    logger.info(`🍪 Loaded ${loaded}/${cookies.length} cookie(s) from ${this.filePath}`);
    return loaded > 0;
  }

  /**
   * Delete the jar after the cookies in it turned out to be expired
   */
  clear(): boolean {
    try {
      if (!existsSync(this.filePath)) {
        logger.info('No cookies file to clear');
        return false;
      }
      rmSync(this.filePath);
      logger.info(`🗑️  Cleared invalid cookies from ${this.filePath}`);
      return true;
    } catch (error) {
      logger.error(`Error clearing invalid cookies: ${errorMessage(error)}`);
      return false;
    }
  }
}
