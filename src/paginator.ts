/**
 * Paginator
 *
 * Walks a scrape target page by page. Page n+1 is requested only after page
 * n has been extracted, and the walk ends on the first page without
 * articles or at the configured page limit.
 */

import type { ArticleExtractor } from './article-extractor.js';
import { StructureChangedError } from './errors.js';
import type { RetryingTransport } from './http/transport.js';
import { describeTarget, getPageUrl } from './scrape-targets.js';
import type { ArticleRecord, ScrapeTarget, Session } from './types.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface FetchedPage {
  /** 1-based page index */
  index: number;
  url: string;
  html: string;
  records: ArticleRecord[];
  /** Article elements dropped for lack of an identifier */
  skipped: number;
}

export interface PaginatorOptions {
  transport: RetryingTransport;
  extractor: ArticleExtractor;
  target: ScrapeTarget;
  baseUrl: string;
  /** Session used for each request, read at request time */
  getSession: () => Session | null;
  maxPages?: number;
  logger?: Logger;
}

export class Paginator {
  private readonly options: PaginatorOptions;
  private readonly log: Logger;

  constructor(options: PaginatorOptions) {
    this.options = options;
    this.log = options.logger ?? silentLogger;
  }

  /**
   * Lazily fetch pages starting at `startPage`.
   * Transport failures and malformed pages propagate to the consumer.
   */
  async *pages(startPage = 1): AsyncGenerator<FetchedPage, void, undefined> {
    const { transport, extractor, target, baseUrl, getSession, maxPages } = this.options;

    for (let index = startPage; ; index += 1) {
      if (maxPages !== undefined && index > maxPages) {
        this.log.info(`Reached the page limit (${maxPages}); stopping.`);
        return;
      }

      const url = getPageUrl(baseUrl, target, index);
      this.log.info(`Scraping ${describeTarget(target)} page ${index}...`);

      const response = await transport.get(url, { session: getSession() });
      const result = extractor.extract(response.body, index);

      switch (result.kind) {
        case 'empty':
          this.log.debug(`Page ${index} has no articles; end of list.`);
          return;
        case 'malformed':
          throw new StructureChangedError(index, url, result.reason);
        case 'records':
          if (result.skipped > 0) {
            this.log.warn(`Skipped ${result.skipped} article(s) without an identifier on page ${index}.`);
          }
          yield { index, url, html: response.body, records: result.records, skipped: result.skipped };
          break;
      }
    }
  }
}
