import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CookieJar, cookieDomainVariants, cookieHeader, type CookieContext, type CookieParam } from '../cookie-jar';
import type { StoredCookie } from '../types';

const BASE_URL = 'https://go.servicem8.com';

const sessionCookie = (overrides: Partial<StoredCookie> = {}): StoredCookie => ({
  name: 'PHPSESSID',
  value: 'test-session',
  domain: '.go.servicem8.com',
  path: '/',
  expires: -1,
  httpOnly: true,
  secure: true,
  sameSite: 'Lax',
  ...overrides
});

function fakeContext(stored: StoredCookie[], rejectDomains: string[] = []) {
  const attempts: CookieParam[] = [];
  const accepted: CookieParam[] = [];
  const context: CookieContext = {
    cookies: async () => stored,
    addCookies: async cookies => {
      for (const cookie of cookies) {
        attempts.push(cookie);
        if (cookie.domain !== undefined && rejectDomains.includes(cookie.domain)) {
          throw new Error(`Invalid cookie domain ${cookie.domain}`);
        }
        if (cookie.domain === undefined && rejectDomains.includes('url')) {
          throw new Error('Invalid cookie url');
        }
        accepted.push(cookie);
      }
    }
  };
  return { context, attempts, accepted };
}

describe('cookieHeader', () => {
  it('joins name=value pairs', () => {
    expect(cookieHeader([{ name: 'a', value: '1' }, { name: 'b', value: '2' }])).toBe('a=1; b=2');
  });

  it('is empty without cookies', () => {
    expect(cookieHeader([])).toBe('');
  });
});

describe('cookieDomainVariants', () => {
  const targets = (variants: CookieParam[]) => variants.map(variant => variant.domain ?? variant.url);

  it('tries the original, undotted, app and root domains before the base URL', () => {
    expect(targets(cookieDomainVariants(sessionCookie(), BASE_URL))).toEqual([
      '.go.servicem8.com',
      'go.servicem8.com',
      'go.servicem8.com',
      'servicem8.com',
      BASE_URL
    ]);
  });

  it('only binds to the base URL when the cookie has no domain', () => {
    const variants = cookieDomainVariants(sessionCookie({ domain: '' }), BASE_URL);
    expect(variants).toEqual([
      {
        name: 'PHPSESSID',
        value: 'test-session',
        url: BASE_URL,
        expires: -1,
        httpOnly: true,
        secure: true,
        sameSite: 'Lax'
      }
    ]);
  });

  it('leaves foreign domains alone', () => {
    expect(targets(cookieDomainVariants(sessionCookie({ domain: 'example.com' }), BASE_URL))).toEqual([
      'example.com',
      BASE_URL
    ]);
  });
});

describe('CookieJar', () => {
  let dir: string;
  let jarPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cookie-jar-'));
    jarPath = join(dir, 'cookies.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('saves the context cookies and reads them back', async () => {
    const cookies = [sessionCookie(), sessionCookie({ name: 'remember', value: 'test-remember' })];
    const jar = new CookieJar(jarPath, BASE_URL);

    await expect(jar.save(fakeContext(cookies).context)).resolves.toBe(true);
    expect(JSON.parse(readFileSync(jarPath, 'utf-8'))).toEqual(cookies);
    expect(jar.read()).toEqual(cookies);
  });

  it('fills defaults for cookies stored with only a name and value', () => {
    writeFileSync(jarPath, JSON.stringify([{ name: 'sid', value: 'test-value' }]));

    expect(new CookieJar(jarPath, BASE_URL).read()).toEqual([
      {
        name: 'sid',
        value: 'test-value',
        domain: '',
        path: '/',
        expires: -1,
        httpOnly: false,
        secure: false,
        sameSite: 'Lax'
      }
    ]);
  });

  it('reads nothing from a missing or malformed file', () => {
    const jar = new CookieJar(jarPath, BASE_URL);
    expect(jar.read()).toEqual([]);

    writeFileSync(jarPath, '{ not json');
    expect(jar.read()).toEqual([]);

    writeFileSync(jarPath, JSON.stringify({ cookies: [] }));
    expect(jar.read()).toEqual([]);
  });

  it('stops at the first domain variant the browser accepts', async () => {
    writeFileSync(jarPath, JSON.stringify([sessionCookie()]));
    const { context, attempts, accepted } = fakeContext([], ['.go.servicem8.com']);

    await expect(new CookieJar(jarPath, BASE_URL).load(context)).resolves.toBe(true);
    expect(attempts.map(cookie => cookie.domain)).toEqual(['.go.servicem8.com', 'go.servicem8.com']);
    expect(accepted).toHaveLength(1);
    expect(accepted[0].domain).toBe('go.servicem8.com');
  });

  it('reports failure when every variant is rejected', async () => {
    writeFileSync(jarPath, JSON.stringify([sessionCookie({ domain: 'servicem8.com' })]));
    const { context, attempts } = fakeContext([], ['servicem8.com', 'go.servicem8.com', 'url']);

    await expect(new CookieJar(jarPath, BASE_URL).load(context)).resolves.toBe(false);
    expect(attempts).toHaveLength(3);
  });

  it('loads nothing without a jar file', async () => {
    const { context, attempts } = fakeContext([]);
    await expect(new CookieJar(jarPath, BASE_URL).load(context)).resolves.toBe(false);
    expect(attempts).toHaveLength(0);
  });

  it('clears the jar once', () => {
    writeFileSync(jarPath, '[]');
    const jar = new CookieJar(jarPath, BASE_URL);

    expect(jar.clear()).toBe(true);
    expect(existsSync(jarPath)).toBe(false);
    expect(jar.clear()).toBe(false);
  });
});
