/**
 * Export Pipeline
 *
 * resolve credentials or session -> authenticated session -> paginate ->
 * extract -> aggregate. Any fatal error aborts the run and nothing
 * gathered so far is returned.
 */

import { ArticleExtractor } from './article-extractor.js';
import { Authenticator } from './auth/authenticator.js';
import { CredentialResolver } from './auth/credential-resolver.js';
import { resolvePrompter } from './auth/prompt.js';
import { SessionStore } from './auth/session-store.js';
import type { CredentialPrompter } from './auth/types.js';
import { config } from './config.js';
import { AuthenticationFailure, PersistenceError } from './errors.js';
import { RetryingTransport, type FetchLike } from './http/transport.js';
import { Paginator } from './paginator.js';
import { describeTarget, resolveTarget } from './scrape-targets.js';
import type { ArticleRecord, Credentials, ExportConfig, ScrapeTarget } from './types.js';
import { silentLogger, type Logger } from './utils/logger.js';
import type { Sleep } from './utils/retry.js';

export interface ExportPipelineOptions {
  transport: RetryingTransport;
  authenticator: Authenticator;
  resolver: CredentialResolver;
  sessions: SessionStore;
  extractor: ArticleExtractor;
  target: ScrapeTarget;
  baseUrl: string;
  maxPages?: number;
  logger?: Logger;
}

export class ExportPipeline {
  private readonly options: ExportPipelineOptions;
  private readonly log: Logger;

  constructor(options: ExportPipelineOptions) {
    this.options = options;
    this.log = options.logger ?? silentLogger;
  }

  /**
   * Run one export. A session rejected mid-run triggers exactly one
   * re-login, after which pagination resumes at the page that failed.
   */
  async run(): Promise<ArticleRecord[]> {
    const { transport, authenticator, extractor, target, baseUrl, maxPages } = this.options;

    await this.establishSession();

    const paginator = new Paginator({
      transport,
      extractor,
      target,
      baseUrl,
      maxPages,
      getSession: () => authenticator.getSession(),
      logger: this.log,
    });

    const records: ArticleRecord[] = [];
    const seen = new Set<string>();
    let nextPage = 1;
    let reloggedIn = false;

    this.log.info(`Exporting ${describeTarget(target)}.`);

    for (;;) {
      try {
        for await (const page of paginator.pages(nextPage)) {
          let added = 0;
          for (const record of page.records) {
            if (seen.has(record.id)) {
              this.log.warn(`Duplicate article ${record.id} on page ${page.index}; keeping the first occurrence.`);
              continue;
            }
            seen.add(record.id);
            records.push(record);
            added += 1;
          }
          this.log.info(`Found ${added} articles on page ${page.index}.`);
          nextPage = page.index + 1;
        }
        break;
      } catch (error) {
        if (!(error instanceof AuthenticationFailure) || error.reason !== 'session_rejected' || reloggedIn) {
          throw error;
        }
        reloggedIn = true;
        authenticator.invalidate();
        this.log.info(`Logging in again to resume at page ${nextPage}.`);
        await this.login(await this.options.resolver.resolveCredentials());
      }
    }

    this.log.info(`Scraped ${records.length} articles in total.`);
    return records;
  }

  private async establishSession(): Promise<void> {
    const { authenticator, resolver, sessions } = this.options;
    const resolved = await resolver.resolve();

    if (resolved.kind === 'credentials') {
      await this.login(resolved.credentials);
      return;
    }

    if (await authenticator.verify(resolved.session)) {
      this.log.info('Using saved session.');
      return;
    }

    this.log.info('Saved session is no longer valid. Logging in again.');
    await sessions.discard();
    await this.login(await resolver.resolveCredentials());
  }

  private async login(credentials: Credentials): Promise<void> {
    const session = await this.options.authenticator.authenticate(credentials);
    try {
      await this.options.sessions.save(session);
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      this.log.warn(`${error.message} The session was not saved.`);
    }
  }
}

export interface PipelineRuntime {
  fetch?: FetchLike;
  sleep?: Sleep;
  logger?: Logger;
  /** Overrides the terminal prompter; null disables prompting */
  prompter?: CredentialPrompter | null;
}

/**
 * Wire the pipeline components from a resolved configuration
 */
export function createPipeline(exportConfig: ExportConfig, runtime: PipelineRuntime = {}): ExportPipeline {
  const logger = runtime.logger ?? silentLogger;

  const transport = new RetryingTransport({
    maxRetries: exportConfig.maxRetries,
    backoffBaseMs: exportConfig.backoffFactor * 1000,
    maxBackoffMs: exportConfig.maxBackoffSeconds * 1000,
    timeoutMs: exportConfig.requestTimeoutMs,
    loginFormSelector: config.endpoints.loginFormSelector,
    loginPath: config.loginPath,
    fetch: runtime.fetch,
    sleep: runtime.sleep,
    logger: logger.child('Transport'),
  });

  const sessions = new SessionStore({
    sessionFile: exportConfig.sessionFile,
    keyFile: exportConfig.keyFile,
    logger: logger.child('Session'),
  });

  const prompter = resolvePrompter(runtime.prompter, exportConfig.interactive);

  const resolver = new CredentialResolver({
    getConfiguredCredentials: () => ({ username: exportConfig.username, password: exportConfig.password }),
    sessions,
    prompter,
    logger: logger.child('Auth'),
  });

  const authenticator = new Authenticator({
    transport,
    endpoints: config.endpoints,
    logger: logger.child('Auth'),
  });

  const extractor = new ArticleExtractor({
    fields: exportConfig.fields,
    baseUrl: config.baseUrl,
    logger: logger.child('Extractor'),
  });

  return new ExportPipeline({
    transport,
    authenticator,
    resolver,
    sessions,
    extractor,
    target: resolveTarget(exportConfig),
    baseUrl: config.baseUrl,
    maxPages: exportConfig.maxPages,
    logger: logger.child('Scraper'),
  });
}

/**
 * Export every article of the configured target
 */
export async function runExport(exportConfig: ExportConfig, runtime: PipelineRuntime = {}): Promise<ArticleRecord[]> {
  return createPipeline(exportConfig, runtime).run();
}
