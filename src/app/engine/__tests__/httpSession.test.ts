// ═══════════════════════════════════════════════════════════════════════════════
// Institutional Flow — HTTP Session Test Suite
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi } from 'vitest';

import { HttpSession, sleep } from '../httpSession';


function makeSession(respond: () => Promise<Response> = async () => new Response('ok')) {
  const fetchFn = vi.fn(async (_input: string, _init?: RequestInit) => respond());
  const session = new HttpSession({ headers: { 'User-Agent': 'test-agent' }, timeoutMs: 1000, fetchFn });
  return { session, fetchFn };
}

function setCookieHeaders(...cookies: string[]): Headers {
  const headers = new Headers();
  for (const c of cookies) headers.append('set-cookie', c);
  return headers;
}


describe('HttpSession cookie jar', () => {
  it('keeps only the name=value part of each Set-Cookie', () => {
    const { session } = makeSession();
    session.absorbCookies(setCookieHeaders('nsit=abc; Path=/; HttpOnly', 'bm_sv=xyz; Domain=.nse.test'));

    expect(session.cookieNames()).toEqual(['nsit', 'bm_sv']);
    expect(session.cookieHeader()).toBe('nsit=abc; bm_sv=xyz');
  });

  it('overwrites a cookie set twice', () => {
    const { session } = makeSession();
    session.absorbCookies(setCookieHeaders('nsit=old'));
    session.absorbCookies(setCookieHeaders('nsit=new'));

    expect(session.cookieHeader()).toBe('nsit=new');
  });

  it('ignores a Set-Cookie without a name', () => {
    const { session } = makeSession();
    session.absorbCookies(setCookieHeaders('=orphan; Path=/', 'flag'));

    expect(session.cookieNames()).toEqual([]);
  });
});

describe('HttpSession.get', () => {
  it('sends the base headers and no Cookie on a fresh session', async () => {
    const { session, fetchFn } = makeSession();
    await session.get('https://site.test/');

    const init = fetchFn.mock.calls[0][1];
    expect(init).toMatchObject({ method: 'GET', headers: { 'User-Agent': 'test-agent' } });
    expect(init?.headers).not.toHaveProperty('Cookie');
  });

  it('replays stored cookies', async () => {
    const { session, fetchFn } = makeSession();
    session.absorbCookies(setCookieHeaders('nsit=abc'));
    await session.get('https://site.test/api');

    expect(fetchFn.mock.calls[0][1]).toMatchObject({ headers: { Cookie: 'nsit=abc' } });
  });

  it('reads status, content type and body', async () => {
    const { session } = makeSession(async () =>
      new Response('a,b\n1,2', { status: 202, headers: { 'content-type': 'text/csv' } }),
    );

    expect(await session.get('https://site.test/file')).toEqual({
      status: 202,
      contentType: 'text/csv',
      body: 'a,b\n1,2',
    });
  });

  it('rejects when the transport fails', async () => {
    const { session } = makeSession(async () => {
      throw new Error('ECONNRESET');
    });

    await expect(session.get('https://site.test/')).rejects.toThrow('ECONNRESET');
  });
});

describe('sleep', () => {
  it('resolves immediately for a non-positive delay', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });
});
