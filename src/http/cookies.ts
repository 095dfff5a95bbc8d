/**
 * Cookie Jar
 *
 * Minimal cookie handling for a single host: parses Set-Cookie headers,
 * honours deletion (Max-Age <= 0 or a past Expires) and builds the Cookie
 * request header. Paths and the Secure flag are not tracked.
 */

import type { SessionCookie } from '../types.js';

interface ParsedSetCookie {
  cookie: SessionCookie;
  expired: boolean;
}

function normalizeDomain(domain: string): string {
  return domain.trim().replace(/^\./, '').toLowerCase();
}

export function domainMatches(cookieDomain: string, host: string): boolean {
  const domain = normalizeDomain(cookieDomain);
  const target = host.toLowerCase();
  return target === domain || target.endsWith(`.${domain}`);
}

/**
 * Parse one Set-Cookie header value.
 * Cookies without an explicit Domain attribute belong to the request host.
 */
export function parseSetCookie(header: string, requestUrl: string): ParsedSetCookie | null {
  const [pair, ...attributes] = header.split(';');
  if (!pair) return null;

  const separator = pair.indexOf('=');
  if (separator <= 0) return null;

  const name = pair.slice(0, separator).trim();
  const value = pair.slice(separator + 1).trim();
  if (!name) return null;

  let domain = new URL(requestUrl).hostname;
  let expired = false;

  for (const attribute of attributes) {
    const [rawKey, ...rest] = attribute.split('=');
    const key = rawKey?.trim().toLowerCase();
    const attrValue = rest.join('=').trim();

    if (key === 'domain' && attrValue) {
      domain = attrValue;
    } else if (key === 'max-age') {
      const seconds = Number(attrValue);
      if (Number.isFinite(seconds) && seconds <= 0) expired = true;
    } else if (key === 'expires') {
      const expires = Date.parse(attrValue);
      if (!Number.isNaN(expires) && expires <= Date.now()) expired = true;
    }
  }

  return { cookie: { name, value, domain }, expired };
}

export class CookieJar {
  private readonly cookies = new Map<string, SessionCookie>();

  constructor(initial: readonly SessionCookie[] = []) {
    for (const cookie of initial) {
      this.set(cookie);
    }
  }

  private key(cookie: Pick<SessionCookie, 'name' | 'domain'>): string {
    return `${normalizeDomain(cookie.domain)}|${cookie.name}`;
  }

  set(cookie: SessionCookie): void {
    this.cookies.set(this.key(cookie), { ...cookie });
  }

  delete(cookie: Pick<SessionCookie, 'name' | 'domain'>): void {
    this.cookies.delete(this.key(cookie));
  }

  /**
   * Apply the Set-Cookie headers of a response to the jar.
   * Returns the cookies that were set (not deleted) by this response.
   */
  absorb(headers: Headers, requestUrl: string): SessionCookie[] {
    const set: SessionCookie[] = [];
    for (const header of headers.getSetCookie()) {
      const parsed = parseSetCookie(header, requestUrl);
      if (!parsed) continue;
      if (parsed.expired) {
        this.delete(parsed.cookie);
      } else {
        this.set(parsed.cookie);
        set.push(parsed.cookie);
      }
    }
    return set;
  }

  /** Cookie header value for a URL, or null when no cookie applies */
  headerFor(url: string): string | null {
    const host = new URL(url).hostname;
    const pairs = this.toArray()
      .filter((cookie) => domainMatches(cookie.domain, host))
      .map((cookie) => `${cookie.name}=${cookie.value}`);
    return pairs.length > 0 ? pairs.join('; ') : null;
  }

  has(name: string): boolean {
    return this.toArray().some((cookie) => cookie.name === name);
  }

  toArray(): SessionCookie[] {
    return Array.from(this.cookies.values(), (cookie) => ({ ...cookie }));
  }
}
