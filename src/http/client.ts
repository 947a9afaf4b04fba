/**
 * HTTP plumbing for the upstream sources
 * Thin wrappers over fetch with timeouts, cookies and error classification
 */

import { TransientNetworkError, UpstreamError } from '../errors.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
  fetchFn?: FetchFn;
}

export interface HttpResponse {
  url: string;
  status: number;
  body: string;
}

const HTML_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';

/**
 * Cookies carried across a multi-step form sequence
 */
export class CookieJar {
  private cookies = new Map<string, string>();

  absorb(headers: Headers): void {
    for (const cookie of headers.getSetCookie()) {
      const pair = cookie.split(';')[0].trim();
      const eq = pair.indexOf('=');
      if (eq <= 0) continue;
      this.cookies.set(pair.slice(0, eq).trim(), pair);
    }
  }

  header(): string {
    return Array.from(this.cookies.values()).join('; ');
  }

  get size(): number {
    return this.cookies.size;
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

/**
 * fetch rejects with TypeError("fetch failed") for resets, refusals and DNS failures
 */
function isConnectionFailure(err: unknown): boolean {
  return err instanceof TypeError && err.message === 'fetch failed';
}

export class HttpClient {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  private async send(method: string, url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchFn(url, {
        ...init,
        method,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      if (isTimeout(err)) {
        throw new TransientNetworkError(`${method} ${url} timed out after ${this.options.timeoutMs}ms`, { cause: err });
      }
      if (isConnectionFailure(err)) {
        throw new TransientNetworkError(`${method} ${url} failed: connection error`, { cause: err });
      }
      throw err;
    }
  }

  private async readBody(method: string, url: string, response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (err) {
      if (isTimeout(err) || err instanceof TypeError) {
        throw new TransientNetworkError(`${method} ${url} body interrupted`, { cause: err });
      }
      throw err;
    }
  }

  /**
   * POST a form (application/x-www-form-urlencoded). Repeated keys are kept in order.
   */
  async postForm(url: string, form: Array<[string, string]>, jar?: CookieJar): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent,
      'Content-Type': 'application/x-www-form-urlencoded',
      'Accept': HTML_ACCEPT,
      'Accept-Language': 'en-US,en;q=0.5',
    };
    if (jar && jar.size > 0) headers['Cookie'] = jar.header();

    const response = await this.send('POST', url, { headers, body: new URLSearchParams(form).toString() });
    jar?.absorb(response.headers);

    const body = await this.readBody('POST', url, response);
    if (!response.ok) {
      throw new UpstreamError(`POST ${url} -> ${response.status}`, response.status);
    }
    return { url, status: response.status, body };
  }

  /**
   * POST a JSON payload and return the decoded JSON body
   */
  async postJson(url: string, payload: unknown, extraHeaders: Record<string, string> = {}): Promise<unknown> {
    const response = await this.send('POST', url, {
      headers: {
        'User-Agent': this.options.userAgent,
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        ...extraHeaders,
      },
      body: JSON.stringify(payload),
    });

    const body = await this.readBody('POST', url, response);
    if (!response.ok) {
      throw new UpstreamError(`POST ${url} -> ${response.status}`, response.status);
    }
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (err) {
      throw new UpstreamError(`POST ${url} returned invalid JSON`, response.status, { cause: err });
    }
  }
}
