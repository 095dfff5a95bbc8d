/**
 * Credential Resolver
 *
 * Decides how to authenticate, in precedence order:
 * 1. Username and password from config/environment (both non-empty)
 * 2. A saved session that decrypts
 * 3. Interactive prompt (blank answers are accepted and fail at login)
 */

import { CredentialError } from '../errors.js';
import type { Credentials } from '../types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { CredentialPrompter, ResolvedAuth, SessionSource } from './types.js';

export const PROMPT_USERNAME = 'Enter your Instapaper username: ';
export const PROMPT_PASSWORD = 'Enter your Instapaper password: ';

export interface CredentialResolverOptions {
  /** Re-read on every call so a changed environment is picked up */
  getConfiguredCredentials: () => Partial<Credentials>;
  sessions: SessionSource;
  /** null when no terminal is attached */
  prompter: CredentialPrompter | null;
  logger?: Logger;
}

export class CredentialResolver {
  private readonly options: CredentialResolverOptions;
  private readonly log: Logger;

  constructor(options: CredentialResolverOptions) {
    this.options = options;
    this.log = options.logger ?? silentLogger;
  }

  async resolve(): Promise<ResolvedAuth> {
    const configured = this.configuredCredentials();
    if (configured) {
      this.log.info(`Using username '${configured.username}' from configuration.`);
      return { kind: 'credentials', credentials: configured, source: 'config' };
    }

    const session = await this.options.sessions.load();
    if (session) {
      return { kind: 'session', session };
    }

    this.log.info('No valid session found. Please log in.');
    return { kind: 'credentials', credentials: await this.prompt(), source: 'prompt' };
  }

  /**
   * Credentials only, skipping the saved session.
   * Used when a session has been rejected and a fresh login is needed.
   */
  async resolveCredentials(): Promise<Credentials> {
    const configured = this.configuredCredentials();
    if (configured) return configured;
    return this.prompt();
  }

  private configuredCredentials(): Credentials | null {
    const { username, password } = this.options.getConfiguredCredentials();
    if (username && password) {
      return { username, password };
    }
    return null;
  }

  private async prompt(): Promise<Credentials> {
    const { prompter } = this.options;
    if (!prompter) {
      throw CredentialError.noneAvailable();
    }
    const username = await prompter.ask(PROMPT_USERNAME);
    const password = await prompter.ask(PROMPT_PASSWORD, { masked: true });
    return { username: username.trim(), password };
  }
}
