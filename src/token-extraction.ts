import type { BrowserContext, Page } from 'playwright';
import type { AuthTokenMap, ExtractedSession, PageSources, RpcTokenKey } from './types.js';
import { cookieHeader } from './cookie-jar.js';
import { runStage, STAGE_POLICIES, type StageOptions } from './retry.js';
import { logger } from './logger.js';

export interface RpcDefinition {
  key: RpcTokenKey;
  /** Substring searched for; also matches the PluginReminders_ prefixed name */
  needle: string;
}

export const RPC_DEFINITIONS: readonly RpcDefinition[] = [
  { key: 'CalendarStoreRequest', needle: 'CalendarStoreRequest' },
  { key: 'UpdateReminderForJobActivity', needle: 'UpdateReminderForJobActivity' },
  { key: 'SaveRecurringJobSchedule', needle: 'SaveRecurringJobSchedule' }
];

const AUTH_PARAM = 's_auth=';
const AUTH_PATTERN = /s_auth=([a-f0-9]+)/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Token from the first `s_auth=<hex>` in the text
 */
export function findFirstAuth(text: string): string | null {
  const match = AUTH_PATTERN.exec(text);
  return match ? match[1] : null;
}

/**
 * Token from the first `<needle>...s_auth=<hex>` that stays inside one string literal
 */
export function findRpcToken(text: string, needle: string): string | null {
  const pattern = new RegExp(`${escapeRegExp(needle)}[^'"]*s_auth=([a-f0-9]+)`);
  const match = pattern.exec(text);
  return match ? match[1] : null;
}

function firstScriptMatch(scripts: string[], needle: string): string | null {
  for (const script of scripts) {
    const token = findRpcToken(script, needle);
    if (token) return token;
  }
  return null;
}

function firstGlobalMatch(globals: string[], needle: string): string | null {
  for (const value of globals) {
    if (!value.includes(needle) || !value.includes(AUTH_PARAM)) continue;
    const token = findFirstAuth(value);
    if (token) return token;
  }
  return null;
}

/**
 * Map the scraped page content to per-RPC tokens.
 *
 * Inline scripts are searched before string globals and the first match per
 * RPC wins. Only when none of the RPCs match are the fallback buckets filled:
 * `GeneralAuth` from any script, otherwise `FallbackAuth` from the page HTML.
 */
export function extractAuthTokens(sources: PageSources): AuthTokenMap {
  const tokens: AuthTokenMap = {};

  for (const rpc of RPC_DEFINITIONS) {
    const token = firstScriptMatch(sources.scripts, rpc.needle) ?? firstGlobalMatch(sources.globals, rpc.needle);
    if (token) {
      tokens[rpc.key] = token;
    }
  }

  if (Object.keys(tokens).length > 0) {
    return tokens;
  }

  for (const script of sources.scripts) {
    const token = findFirstAuth(script);
    if (token) {
      tokens.GeneralAuth = token;
      return tokens;
    }
  }

  const fallback = findFirstAuth(sources.html);
  if (fallback) {
    tokens.FallbackAuth = fallback;
  }
  return tokens;
}

export interface PageDiagnostics {
  url: string;
  title: string;
  scriptCount: number;
  hasCalendar: boolean;
  hasPluginReminders: boolean;
  hasAuthToken: boolean;
  pageLength: number;
}

export function summarizeSources(sources: PageSources, url: string, title: string): PageDiagnostics {
  return {
    url,
    title,
    scriptCount: sources.scripts.length,
    hasCalendar: sources.html.includes('CalendarStoreRequest'),
    hasPluginReminders: sources.html.includes('PluginReminders'),
    hasAuthToken: sources.html.includes(AUTH_PARAM),
    pageLength: sources.html.length
  };
}

/**
 * Read inline scripts, string globals mentioning s_auth, and the page HTML
 */
export async function collectPageSources(page: Page): Promise<PageSources> {
  return page.evaluate((authParam: string) => {
    const scripts = Array.from(document.getElementsByTagName('script')).map(
      script => script.innerHTML || script.textContent || ''
    );

    const globals: string[] = [];
    for (const prop in window) {
      try {
        const value: unknown = Reflect.get(window, prop);
        if (typeof value === 'string' && value.includes(authParam)) {
          globals.push(value);
        }
      } catch {
        // Some host properties throw on access
        continue;
      }
    }

    return { scripts, globals, html: document.documentElement.outerHTML };
  }, AUTH_PARAM);
}

/**
 * One extraction pass over the current page: tokens plus the session cookie header
 */
export async function extractSession(page: Page, context: BrowserContext): Promise<ExtractedSession> {
  logger.info('🔍 Extracting API data...');

  const sources = await collectPageSources(page);
  const diagnostics = summarizeSources(sources, page.url(), await page.title());
  logger.info('📄 Page diagnostics:', diagnostics);

  const tokens = extractAuthTokens(sources);
  const cookie = cookieHeader(await context.cookies());

  const names = Object.keys(tokens);
  logger.info(`🔑 Found ${names.length} auth token(s): ${names.join(', ') || 'none'}`);
  for (const [name, value] of Object.entries(tokens)) {
    if (value) {
      logger.debug(`   ${name}: ${value.substring(0, 8)}...`);
    }
  }

  return { tokens, cookie };
}

/**
 * Extraction with retries; an empty token map counts as a failed attempt.
 * The page is refreshed and given 3 seconds to settle between attempts.
 */
export async function extractSessionWithRetry(
  page: Page,
  context: BrowserContext,
  maxRetries: number,
  options: Pick<StageOptions, 'sleep'> = {}
): Promise<ExtractedSession> {
  const session = await runStage(
    'Token extraction',
    STAGE_POLICIES.extraction(maxRetries),
    async () => {
      const extracted = await extractSession(page, context);
      return Object.keys(extracted.tokens).length > 0 ? extracted : null;
    },
    {
      ...options,
      beforeRetry: async () => {
        logger.info('🔄 Refreshing page before next extraction attempt');
        await page.reload({ waitUntil: 'load' });
        await page.waitForTimeout(3_000);
      }
    }
  );

  return session ?? { tokens: {}, cookie: '' };
}
