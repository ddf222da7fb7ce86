import {
  extractAuthTokens,
  extractSessionWithRetry,
  findFirstAuth,
  findRpcToken,
  summarizeSources
} from '../token-extraction';
import type { PageSources } from '../types';
import { asContext, asPage, createFakeContext, createFakePage } from '../test-utils/mocks/playwright';

const sources = (partial: Partial<PageSources>): PageSources => ({
  scripts: [],
  globals: [],
  html: '',
  ...partial
});

describe('findRpcToken', () => {
  it('reads the token that follows the RPC name inside one string', () => {
    const script = 'store.load({ url: "/CalendarStoreRequest?s_cv=&s_auth=abc123" });';
    expect(findRpcToken(script, 'CalendarStoreRequest')).toBe('abc123');
  });

  it('does not cross a quote between the name and the token', () => {
    const script = 'var name = "CalendarStoreRequest"; var other = "s_auth=dead";';
    expect(findRpcToken(script, 'CalendarStoreRequest')).toBeNull();
  });

  it('matches the plugin-prefixed name', () => {
    const script = "'/PluginReminders_SaveRecurringJobSchedule?x=1&s_auth=9f9f'";
    expect(findRpcToken(script, 'SaveRecurringJobSchedule')).toBe('9f9f');
  });
});

describe('findFirstAuth', () => {
  it('returns the first lowercase hex token', () => {
    expect(findFirstAuth('a?s_auth=0a1b&b?s_auth=ffff')).toBe('0a1b');
  });

  it('ignores tokens that are not lowercase hex', () => {
    expect(findFirstAuth('s_auth=ABC')).toBeNull();
  });
});

describe('extractAuthTokens', () => {
  it('collects each RPC token from the inline scripts', () => {
    const tokens = extractAuthTokens(
      sources({
        scripts: [
          'var a = "PluginReminders_UpdateReminderForJobActivity?s_auth=aa11";',
          'var b = "CalendarStoreRequest?s_auth=bb22"; var c = "CalendarStoreRequest?s_auth=cc33";'
        ]
      })
    );

    expect(tokens).toEqual({
      UpdateReminderForJobActivity: 'aa11',
      CalendarStoreRequest: 'bb22'
    });
  });

  it('keeps the first match when several scripts carry the same RPC', () => {
    const tokens = extractAuthTokens(
      sources({
        scripts: ['x = "CalendarStoreRequest?s_auth=111"', 'y = "CalendarStoreRequest?s_auth=222"']
      })
    );

    expect(tokens).toEqual({ CalendarStoreRequest: '111' });
  });

  it('falls back to string globals when no script mentions the RPC', () => {
    const tokens = extractAuthTokens(
      sources({
        scripts: ['var unrelated = 1;'],
        globals: ['/PluginReminders_SaveRecurringJobSchedule?a=1&s_auth=feed']
      })
    );

    expect(tokens).toEqual({ SaveRecurringJobSchedule: 'feed' });
  });

  it('uses GeneralAuth from any script when no RPC token exists', () => {
    const tokens = extractAuthTokens(
      sources({
        scripts: ['var x = 1;', 'token = "s_auth=abcd"'],
        html: '<a href="/x?s_auth=ffff">'
      })
    );

    expect(tokens).toEqual({ GeneralAuth: 'abcd' });
  });

  it('uses FallbackAuth from the page HTML as a last resort', () => {
    const tokens = extractAuthTokens(
      sources({
        scripts: ['nothing here'],
        html: '<a href="/x?s_auth=0f0f">link</a>'
      })
    );

    expect(tokens).toEqual({ FallbackAuth: '0f0f' });
  });

  it('returns an empty map when the page has no token', () => {
    expect(extractAuthTokens(sources({ scripts: ['var a;'], html: '<body></body>' }))).toEqual({});
  });
});

describe('summarizeSources', () => {
  it('reports the markers found in the page', () => {
    const html = '<script>CalendarStoreRequest s_auth=1</script>';
    const summary = summarizeSources(sources({ scripts: ['one', 'two'], html }), 'https://go.servicem8.com/job_dispatch', 'Dispatch');

    expect(summary).toEqual({
      url: 'https://go.servicem8.com/job_dispatch',
      title: 'Dispatch',
      scriptCount: 2,
      hasCalendar: true,
      hasPluginReminders: false,
      hasAuthToken: true,
      pageLength: html.length
    });
  });
});

describe('extractSessionWithRetry', () => {
  const sessionCookies = [
    {
      name: 'PHPSESSID',
      value: 'test-session',
      domain: '.go.servicem8.com',
      path: '/',
      expires: -1,
      httpOnly: true,
      secure: true,
      sameSite: 'Lax' as const
    }
  ];
  const noWait = jest.fn<Promise<void>, [number]>(async () => undefined);

  beforeEach(() => {
    noWait.mockClear();
  });

  it('refreshes the page after an empty pass and returns the next tokens', async () => {
    const page = createFakePage({ url: 'https://go.servicem8.com/job_dispatch' });
    page.evaluate
      .mockResolvedValueOnce(sources({}))
      .mockResolvedValueOnce(sources({ scripts: ['x = "CalendarStoreRequest?s_auth=ab12"'] }));
    const context = createFakeContext(sessionCookies);

    const session = await extractSessionWithRetry(asPage(page), asContext(context), 3, { sleep: noWait });

    expect(session).toEqual({ tokens: { CalendarStoreRequest: 'ab12' }, cookie: 'PHPSESSID=test-session' });
    expect(page.evaluate).toHaveBeenCalledTimes(2);
    expect(page.reload).toHaveBeenCalledTimes(1);
    expect(page.waitForTimeout).toHaveBeenCalledWith(3_000);
    expect(noWait).toHaveBeenCalledWith(5_000);
  });

  it('gives up with no tokens and no cookie after the last empty pass', async () => {
    const page = createFakePage();
    page.evaluate.mockResolvedValue(sources({}));
    const context = createFakeContext(sessionCookies);

    const session = await extractSessionWithRetry(asPage(page), asContext(context), 3, { sleep: noWait });

    expect(session).toEqual({ tokens: {}, cookie: '' });
    expect(page.evaluate).toHaveBeenCalledTimes(3);
    expect(page.reload).toHaveBeenCalledTimes(2);
  });

  it('treats a page script error as a failed pass', async () => {
    const page = createFakePage();
    page.evaluate
      .mockRejectedValueOnce(new Error('Execution context was destroyed'))
      .mockResolvedValueOnce(sources({ html: '<a href="/CalendarStoreRequest?s_auth=cd34">' }));

    const session = await extractSessionWithRetry(asPage(page), asContext(createFakeContext()), 2, {
      sleep: noWait
    });

    expect(session).toEqual({ tokens: { FallbackAuth: 'cd34' }, cookie: '' });
    expect(page.reload).toHaveBeenCalledTimes(1);
  });
});
