// In-process stand-ins for the Playwright page, context and browser session
import type { BrowserContext, Page } from 'playwright';
import type { BrowserSession } from '../../browser-session';
import type { StoredCookie } from '../../types';

export interface FakePageState {
  url: string;
  title: string;
  bodyText: string;
  /** Selectors that match an element on the page */
  present: Set<string>;
}

export interface FakeLocator {
  first(): FakeLocator;
  nth(index: number): FakeLocator;
  waitFor: jest.Mock<Promise<void>, [unknown?]>;
  count: jest.Mock<Promise<number>, []>;
  innerText: jest.Mock<Promise<string>, []>;
  click: jest.Mock<Promise<void>, [unknown?]>;
  hover: jest.Mock<Promise<void>, []>;
  fill: jest.Mock<Promise<void>, [string]>;
  scrollIntoViewIfNeeded: jest.Mock<Promise<void>, []>;
  evaluate: jest.Mock<Promise<void>, [unknown]>;
}

export interface FakePage {
  state: FakePageState;
  /** The locator the page hands out for a selector */
  element(selector: string): FakeLocator;
  url: jest.Mock<string, []>;
  title: jest.Mock<Promise<string>, []>;
  locator: jest.Mock<FakeLocator, [string]>;
  goto: jest.Mock<Promise<null>, [string, unknown?]>;
  reload: jest.Mock<Promise<null>, [unknown?]>;
  waitForTimeout: jest.Mock<Promise<void>, [number]>;
  evaluate: jest.Mock<Promise<unknown>, unknown[]>;
}

export function createFakePage(initial: Partial<FakePageState> = {}): FakePage {
  const state: FakePageState = {
    url: 'https://go.servicem8.com/main',
    title: 'ServiceM8',
    bodyText: '',
    present: new Set<string>(),
    ...initial
  };
  const locators = new Map<string, FakeLocator>();

  const element = (selector: string): FakeLocator => {
    const existing = locators.get(selector);
    if (existing) return existing;

    const isPresent = () => selector === 'body' || state.present.has(selector);
    const locator: FakeLocator = {
      first: () => locator,
      nth: () => locator,
      waitFor: jest.fn<Promise<void>, [unknown?]>(async () => {
        if (!isPresent()) throw new Error(`Timeout waiting for ${selector}`);
      }),
      count: jest.fn(async () => (isPresent() ? 1 : 0)),
      innerText: jest.fn(async () => (selector === 'body' ? state.bodyText : selector)),
      click: jest.fn<Promise<void>, [unknown?]>(async () => undefined),
      hover: jest.fn(async () => undefined),
      fill: jest.fn<Promise<void>, [string]>(async () => undefined),
      scrollIntoViewIfNeeded: jest.fn(async () => undefined),
      evaluate: jest.fn<Promise<void>, [unknown]>(async () => undefined)
    };
    locators.set(selector, locator);
    return locator;
  };

  return {
    state,
    element,
    url: jest.fn(() => state.url),
    title: jest.fn(async () => state.title),
    locator: jest.fn(element),
    goto: jest.fn<Promise<null>, [string, unknown?]>(async url => {
      state.url = url;
      return null;
    }),
    reload: jest.fn<Promise<null>, [unknown?]>(async () => null),
    waitForTimeout: jest.fn<Promise<void>, [number]>(async () => undefined),
    evaluate: jest.fn<Promise<unknown>, unknown[]>(async () => undefined)
  };
}

export interface FakeContext {
  cookies: jest.Mock<Promise<StoredCookie[]>, []>;
  addCookies: jest.Mock<Promise<void>, [unknown[]]>;
  clearCookies: jest.Mock<Promise<void>, []>;
}

export function createFakeContext(cookies: StoredCookie[] = []): FakeContext {
  return {
    cookies: jest.fn(async () => cookies),
    addCookies: jest.fn<Promise<void>, [unknown[]]>(async () => undefined),
    clearCookies: jest.fn(async () => undefined)
  };
}

export interface FakeSession {
  currentPage: Page;
  currentContext: BrowserContext;
  screenshot: jest.Mock<Promise<string | null>, [string]>;
}

export function createFakeSession(page: FakePage, context: FakeContext = createFakeContext()): FakeSession {
  return {
    currentPage: asPage(page),
    currentContext: asContext(context),
    screenshot: jest.fn<Promise<string | null>, [string]>(async () => null)
  };
}

export const asPage = (page: FakePage): Page => page as unknown as Page;

export const asContext = (context: FakeContext): BrowserContext => context as unknown as BrowserContext;

export const asSession = (session: FakeSession): BrowserSession => session as unknown as BrowserSession;
