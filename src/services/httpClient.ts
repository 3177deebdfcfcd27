import { logger } from '../utils/logger';
import { HttpError, RateLimitError } from '../utils/errorHandler';

const USER_AGENTS = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15'
];

const DEFAULT_TIMEOUT_MS = 15000;

export type QueryParams = Record<string, string | number | undefined>;

export interface GetOptions {
  params?: QueryParams;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  url: string;
  contentType: string;
  body: string;
}

/**
 * Anything that can issue a GET; the scraper services depend on this
 * rather than on HttpClient so tests can hand them canned pages
 */
export interface HttpGetter {
  get(url: string, options?: GetOptions): Promise<HttpResponse>;
}

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }

  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

/**
 * Cookie-keeping GET client with browser-like headers.
 * One User-Agent is picked per instance, like a single browser session.
 */
export class HttpClient implements HttpGetter {
  private readonly cookies = new Map<string, string>();
  private readonly headers: Record<string, string>;

  constructor(userAgent?: string) {
    this.headers = {
      'User-Agent': userAgent || USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)],
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
      'Upgrade-Insecure-Requests': '1',
      'Sec-Fetch-Dest': 'document',
      'Sec-Fetch-Mode': 'navigate',
      'Sec-Fetch-Site': 'none',
      'Cache-Control': 'max-age=0',
      'DNT': '1'
    };
  }

  /**
   * @throws RateLimitError on HTTP 429, HttpError on any other non-2xx status
   */
  async get(url: string, options: GetOptions = {}): Promise<HttpResponse> {
    const target = buildUrl(url, options.params);
    logger.debug(`GET ${target}`);

    const headers: Record<string, string> = { ...this.headers };
    if (this.cookies.size > 0) {
      headers['Cookie'] = [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
    }

    const response = await fetch(target, {
      headers,
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS)
    });

    this.storeCookies(response.headers.getSetCookie());

    if (response.status === 429) {
      throw new RateLimitError(target);
    }

    if (!response.ok) {
      throw new HttpError(response.status, target);
    }

    return {
      status: response.status,
      url: response.url || target,
      contentType: response.headers.get('content-type') || '',
      body: await response.text()
    };
  }

  private storeCookies(setCookies: string[]): void {
    for (const entry of setCookies) {
      const pair = entry.split(';')[0];
      const separator = pair.indexOf('=');
      if (separator > 0) {
        this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
      }
    }
  }
}
