// ─── HTTP session with a cookie jar ──────────────────────────────────────────
// The deal endpoint rejects requests that do not carry the cookies its
// landing page hands out. HttpSession remembers every Set-Cookie it sees and
// replays them on later requests made through the same session, so the
// warm-up must complete before the first data request is issued.

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TextResponse {
  status: number;
  contentType: string;
  body: string;
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => setTimeout(resolve, ms));
}

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 ' +
  '(KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

export interface HttpSessionOptions {
  headers: Record<string, string>;
  timeoutMs: number;
  fetchFn?: FetchLike;
}

export class HttpSession {
  private readonly cookies = new Map<string, string>();
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: HttpSessionOptions) {
    this.headers = options.headers;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  /** Store name=value pairs from every Set-Cookie header */
  absorbCookies(headers: Headers): void {
    for (const raw of headers.getSetCookie()) {
      const pair = raw.split(';', 1)[0];
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }

  cookieNames(): string[] {
    return [...this.cookies.keys()];
  }

  cookieHeader(): string {
    return [...this.cookies.entries()].map(([k, v]) => `${k}=${v}`).join('; ');
  }

  /** GET a URL and read the whole body as text. Network errors and timeouts reject. */
  async get(url: string): Promise<TextResponse> {
    const headers: Record<string, string> = { ...this.headers };
    const cookie = this.cookieHeader();
    if (cookie) headers['Cookie'] = cookie;

    const res = await this.fetchFn(url, {
      method: 'GET',
      headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    this.absorbCookies(res.headers);

    return {
      status: res.status,
      contentType: res.headers.get('content-type') ?? '',
      body: await res.text(),
    };
  }
}
