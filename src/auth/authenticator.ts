/**
 * Authenticator
 *
 * Performs the login handshake and checks that a session is really
 * authenticated (a 200 is not enough: the login page is also a 200).
 * Owns the current session; the transport only borrows it.
 */

import { AuthenticationFailure } from '../errors.js';
import { hasLoginForm } from '../http/login-form.js';
import type { RetryingTransport, TransportResponse } from '../http/transport.js';
import type { Credentials, Session } from '../types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { AuthEndpoints, AuthState } from './types.js';

export interface AuthenticatorOptions {
  transport: RetryingTransport;
  endpoints: AuthEndpoints;
  logger?: Logger;
}

export class Authenticator {
  private readonly transport: RetryingTransport;
  private readonly endpoints: AuthEndpoints;
  private readonly log: Logger;
  private state: AuthState = 'unauthenticated';
  private session: Session | null = null;

  constructor(options: AuthenticatorOptions) {
    this.transport = options.transport;
    this.endpoints = options.endpoints;
    this.log = options.logger ?? silentLogger;
  }

  getState(): AuthState {
    return this.state;
  }

  /** Session of the authenticated state, null otherwise */
  getSession(): Session | null {
    return this.state === 'authenticated' ? this.session : null;
  }

  /**
   * Submit the login form. On success the state is `pending` until
   * `verify` confirms the returned session.
   */
  async login(credentials: Credentials): Promise<Session> {
    this.reset();
    this.state = 'pending';

    const { loginUrl, loginSuccessPath, requiredCookies } = this.endpoints;
    let response: TransportResponse;
    try {
      response = await this.transport.post(
        loginUrl,
        { username: credentials.username, password: credentials.password, keep_logged_in: 'yes' },
        { detectLoginWall: false }
      );
    } catch (error) {
      this.reset();
      if (error instanceof AuthenticationFailure) {
        this.log.error('Login failed. Please check your credentials.');
        throw AuthenticationFailure.loginRejected();
      }
      throw error;
    }

    const names = new Set(response.cookies.map((cookie) => cookie.name));
    const landedPath = new URL(response.url).pathname;
    const landedOnAccount = landedPath === loginSuccessPath || landedPath.startsWith(`${loginSuccessPath}/`);
    const hasCookies = requiredCookies.every((name) => names.has(name));

    if (!landedOnAccount || !hasCookies) {
      this.reset();
      this.log.error('Login failed. Please check your credentials.');
      throw AuthenticationFailure.loginRejected();
    }

    this.log.info('Login successful.');
    const required = new Set(requiredCookies);
    return { cookies: response.cookies.filter((cookie) => required.has(cookie.name)) };
  }

  /**
   * Request the account page with the session and look for the login form.
   * Passing moves to `authenticated`; failing discards the session.
   * Network failures that outlast the retry budget propagate.
   */
  async verify(session: Session): Promise<boolean> {
    if (session.cookies.length === 0) {
      this.reset();
      return false;
    }

    this.state = 'pending';
    let authenticated: boolean;
    try {
      const response = await this.transport.get(this.endpoints.verifyUrl, { session, detectLoginWall: false });
      authenticated = !hasLoginForm(response.body, this.endpoints.loginFormSelector);
    } catch (error) {
      if (!(error instanceof AuthenticationFailure)) {
        this.reset();
        throw error;
      }
      authenticated = false;
    }

    if (!authenticated) {
      this.log.warn('Session verification failed.');
      this.reset();
      return false;
    }

    this.session = session;
    this.state = 'authenticated';
    this.log.debug('Session verified.');
    return true;
  }

  /**
   * Login followed by verification; throws unless the result is authenticated
   */
  async authenticate(credentials: Credentials): Promise<Session> {
    const session = await this.login(credentials);
    if (!(await this.verify(session))) {
      throw AuthenticationFailure.verificationFailed();
    }
    return session;
  }

  /** The service rejected the session mid-run */
  invalidate(): void {
    this.log.warn('Session is no longer accepted.');
    this.reset();
  }

  private reset(): void {
    this.state = 'unauthenticated';
    this.session = null;
  }
}
