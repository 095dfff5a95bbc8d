/**
 * Authentication Types
 */

import type { Credentials, Session } from '../types.js';

/**
 * unauthenticated -> (login) -> pending -> (verify passes) -> authenticated
 * pending -> (verify fails) -> unauthenticated
 * authenticated -> (session rejected mid-run) -> unauthenticated
 */
export type AuthState = 'unauthenticated' | 'pending' | 'authenticated';

/** What the credential resolver found, in precedence order */
export type ResolvedAuth =
  | { kind: 'credentials'; credentials: Credentials; source: 'config' | 'prompt' }
  | { kind: 'session'; session: Session };

/** Asks the user a question on the terminal */
export interface CredentialPrompter {
  ask(question: string, options?: { masked?: boolean }): Promise<string>;
}

/** Anything that can hand back a previously saved session */
export interface SessionSource {
  load(): Promise<Session | null>;
}

export interface AuthEndpoints {
  loginUrl: string;
  verifyUrl: string;
  /** Path the login redirect lands on when it succeeds */
  loginSuccessPath: string;
  /** CSS selector of the login form */
  loginFormSelector: string;
  /** Cookies that must be present after a successful login */
  requiredCookies: readonly string[];
}
