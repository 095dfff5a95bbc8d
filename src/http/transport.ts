/**
 * Retrying Transport
 *
 * Every request to instapaper.com goes through here. A logical request is
 * retried on network failures, 5xx and 429 (honouring Retry-After), and
 * surfaced immediately on authentication failures and other 4xx.
 *
 * Redirects are followed by hand so that cookies set on intermediate hops
 * (the login redirect in particular) are not lost.
 */

import { AuthenticationFailure, describeError, RequestError, TransientNetworkError } from '../errors.js';
import type { Session, SessionCookie } from '../types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { defaultSleep, withRetries, type RetryDecision, type Sleep } from '../utils/retry.js';
import { CookieJar } from './cookies.js';
import { hasLoginForm } from './login-form.js';

const MAX_REDIRECTS = 5;
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; instapaper-export/0.1)';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface TransportOptions {
  /** Total attempts per logical request */
  maxRetries: number;
  backoffBaseMs: number;
  maxBackoffMs: number;
  jitterMs?: number;
  timeoutMs: number;
  /** CSS selector of the login form; a 200 that renders it is a login wall */
  loginFormSelector: string;
  /** Path prefix of the login page; landing there means a login wall */
  loginPath: string;
  userAgent?: string;
  fetch?: FetchLike;
  sleep?: Sleep;
  logger?: Logger;
}

export interface RequestOptions {
  /** Form fields, sent url-encoded (forces a POST body) */
  form?: Record<string, string>;
  /** Session borrowed for this request; never mutated */
  session?: Session | null;
  /**
   * Treat a 200 that shows the login form as an authentication failure.
   * Login and verification turn this off to inspect the page themselves.
   */
  detectLoginWall?: boolean;
}

export interface TransportResponse {
  status: number;
  /** URL of the last hop after redirects */
  url: string;
  body: string;
  headers: Headers;
  /** Cookies the service set anywhere along the redirect chain */
  cookies: SessionCookie[];
}

/** Attempt failure that the retry policy may retry */
class RetryableFailure extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly retryAfterMs?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RetryableFailure';
  }
}

/** AbortSignal.timeout fires a TimeoutError; a plain abort is an AbortError */
function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * Retry-After as delta-seconds or an HTTP date, in milliseconds
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();

  if (/^\d+$/.test(trimmed)) {
    const seconds = Number.parseInt(trimmed, 10);
    return seconds > 0 ? seconds * 1000 : undefined;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return undefined;
  const delta = date - now;
  return delta > 0 ? delta : undefined;
}

export class RetryingTransport {
  private readonly options: TransportOptions;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(options: TransportOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.log = options.logger ?? silentLogger;
  }

  get(url: string, options: Omit<RequestOptions, 'form'> = {}): Promise<TransportResponse> {
    return this.request('GET', url, options);
  }

  post(url: string, form: Record<string, string>, options: Omit<RequestOptions, 'form'> = {}): Promise<TransportResponse> {
    return this.request('POST', url, { ...options, form });
  }

  async request(method: 'GET' | 'POST', url: string, options: RequestOptions = {}): Promise<TransportResponse> {
    const { maxRetries, backoffBaseMs, maxBackoffMs, jitterMs } = this.options;

    return withRetries((attempt) => this.attempt(method, url, options, attempt), {
      maxAttempts: maxRetries,
      baseDelayMs: backoffBaseMs,
      maxDelayMs: maxBackoffMs,
      jitterMs,
      sleep: this.sleep,
      classify: (error): RetryDecision => {
        if (error instanceof RetryableFailure) {
          return { retry: true, delayMs: error.retryAfterMs };
        }
        return { retry: false };
      },
      onRetry: (attempt, error, delayMs) => {
        const seconds = (delayMs / 1000).toFixed(2);
        const message = `${describeError(error)} (attempt ${attempt}/${maxRetries}). Retrying in ${seconds}s.`;
        if (attempt === 1) {
          this.log.info(message);
        } else {
          this.log.warn(message);
        }
      },
      onExhausted: (attempts, error) => {
        this.log.error(`All ${attempts} attempts failed for ${method} ${url}.`);
        const status = error instanceof RetryableFailure ? error.status : undefined;
        return new TransientNetworkError(`${method} ${url} failed after ${attempts} attempts: ${describeError(error)}`, {
          attempts,
          status,
          cause: error,
        });
      },
    });
  }

  /**
   * One attempt: the request plus its redirect chain, then classification
   */
  private async attempt(
    method: 'GET' | 'POST',
    url: string,
    options: RequestOptions,
    attempt: number
  ): Promise<TransportResponse> {
    const jar = new CookieJar(options.session?.cookies ?? []);
    const setCookies: SessionCookie[] = [];
    let currentUrl = url;
    let currentMethod = method;
    let body: URLSearchParams | undefined = options.form ? new URLSearchParams(options.form) : undefined;

    this.log.debug(`${method} ${url}${attempt > 1 ? ` (attempt ${attempt})` : ''}`);

    for (let redirects = 0; ; redirects += 1) {
      const response = await this.send(currentMethod, currentUrl, jar, body);
      setCookies.push(...jar.absorb(response.headers, currentUrl));

      if (response.status >= 300 && response.status < 400) {
        const location = response.headers.get('location');
        if (!location) {
          throw new RequestError(currentUrl, response.status);
        }
        if (redirects >= MAX_REDIRECTS) {
          throw new RequestError(currentUrl, response.status);
        }

        // 303, and 301/302 after a POST, continue as GET without a body
        if (response.status === 303 || ((response.status === 301 || response.status === 302) && currentMethod === 'POST')) {
          currentMethod = 'GET';
          body = undefined;
        }
        currentUrl = new URL(location, currentUrl).toString();
        continue;
      }

      const text = await this.readBody(response, currentUrl);
      this.classify(response, currentUrl, text, options.detectLoginWall ?? true);

      return {
        status: response.status,
        url: currentUrl,
        body: text,
        headers: response.headers,
        cookies: setCookies,
      };
    }
  }

  private async send(
    method: 'GET' | 'POST',
    url: string,
    jar: CookieJar,
    body: URLSearchParams | undefined
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: 'text/html,application/xhtml+xml',
    };
    const cookie = jar.headerFor(url);
    if (cookie) headers.Cookie = cookie;
    if (body) headers['Content-Type'] = 'application/x-www-form-urlencoded';

    try {
      return await this.fetchImpl(url, {
        method,
        headers,
        body: body?.toString(),
        redirect: 'manual',
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new RetryableFailure(`Request timed out after ${this.options.timeoutMs}ms`, undefined, undefined, {
          cause: error,
        });
      }
      throw new RetryableFailure(`Network error: ${describeError(error)}`, undefined, undefined, { cause: error });
    }
  }

  private async readBody(response: Response, url: string): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw new RetryableFailure(`Connection lost while reading ${url}: ${describeError(error)}`, undefined, undefined, {
        cause: error,
      });
    }
  }

  private classify(response: Response, url: string, body: string, detectLoginWall: boolean): void {
    const { status } = response;

    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
      throw new RetryableFailure('Rate limited (429)', status, retryAfterMs);
    }
    if (status >= 500) {
      throw new RetryableFailure(`Request failed with status ${status}`, status);
    }
    if (status === 401 || status === 403) {
      throw AuthenticationFailure.sessionRejected(url, status);
    }
    if (status >= 400) {
      throw new RequestError(url, status);
    }
    if (detectLoginWall && this.isLoginWall(url, body)) {
      throw AuthenticationFailure.sessionRejected(url, status);
    }
  }

  isLoginWall(url: string, body: string): boolean {
    return new URL(url).pathname.startsWith(this.options.loginPath) || hasLoginForm(body, this.options.loginFormSelector);
  }
}
