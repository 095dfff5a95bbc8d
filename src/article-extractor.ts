/**
 * Article Extractor
 *
 * Parses one bookmark-list page into article records.
 *
 * Each field is read by its own FieldExtractor with a list of known
 * locations, so a markup change breaks one field rather than the page.
 * Only the identifier is mandatory: elements without one are skipped and
 * counted, and a page where every element lacks one is reported malformed.
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import type { ArticleRecord, FieldOptions, PageResult } from './types.js';
import { silentLogger, type Logger } from './utils/logger.js';

const ARTICLE_LIST_SELECTOR = '#article_list';
const ARTICLE_SELECTOR = 'article';
const ARTICLE_ID_PATTERN = /^article_(.+)$/;

export interface FieldExtractor {
  readonly field: keyof ArticleRecord;
  /** Field value, or null when none of the known locations has it */
  extract(article: Cheerio<Element>): string | null;
}

function normalizeText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/** Text of the first matching selector */
export function textField(field: keyof ArticleRecord, selectors: readonly string[]): FieldExtractor {
  return {
    field,
    extract(article) {
      for (const selector of selectors) {
        const value = nonEmpty(normalizeText(article.find(selector).first().text()));
        if (value) return value;
      }
      return null;
    },
  };
}

/** Attribute of the first matching selector */
export function attributeField(field: keyof ArticleRecord, selectors: readonly string[], attribute: string): FieldExtractor {
  return {
    field,
    extract(article) {
      for (const selector of selectors) {
        const value = nonEmpty(article.find(selector).first().attr(attribute));
        if (value) return value;
      }
      return null;
    },
  };
}

/** `id="article_<id>"`, falling back to `data-article-id` */
export const identifierField: FieldExtractor = {
  field: 'id',
  extract(article) {
    const match = ARTICLE_ID_PATTERN.exec(article.attr('id') ?? '');
    return nonEmpty(match?.[1]) ?? nonEmpty(article.attr('data-article-id'));
  },
};

export const titleField = textField('title', ['.article_title', '.title_meta .title']);
// `a.article_title` links to the reader view, never the source
export const urlField = attributeField('url', ['.title_meta a', 'a.js_domain_linkout'], 'href');
export const previewField = textField('preview', ['.article_preview']);

export interface ArticleExtractorOptions {
  fields: FieldOptions;
  baseUrl: string;
  logger?: Logger;
}

export class ArticleExtractor {
  private readonly fields: FieldOptions;
  private readonly baseUrl: string;
  private readonly log: Logger;

  constructor(options: ArticleExtractorOptions) {
    this.fields = options.fields;
    this.baseUrl = options.baseUrl;
    this.log = options.logger ?? silentLogger;
  }

  extract(html: string, page = 1): PageResult {
    const $: CheerioAPI = cheerio.load(html);
    const list = $(ARTICLE_LIST_SELECTOR);
    if (list.length === 0) {
      return { kind: 'malformed', reason: `could not find article list ('${ARTICLE_LIST_SELECTOR}')`, skipped: 0 };
    }

    const elements = list.find(ARTICLE_SELECTOR).toArray();
    if (elements.length === 0) {
      return { kind: 'empty' };
    }

    const records: ArticleRecord[] = [];
    let skipped = 0;

    elements.forEach((element, index) => {
      const record = this.extractArticle($(element), page, index);
      if (record) {
        records.push(record);
      } else {
        skipped += 1;
      }
    });

    if (records.length === 0) {
      return {
        kind: 'malformed',
        reason: `none of the ${elements.length} article elements has an identifier`,
        skipped,
      };
    }

    return { kind: 'records', records, skipped };
  }

  private extractArticle(article: Cheerio<Element>, page: number, index: number): ArticleRecord | null {
    const id = identifierField.extract(article);
    if (!id) {
      this.log.warn(`Skipping article #${index + 1} on page ${page}: no identifier found.`);
      return null;
    }

    const title = titleField.extract(article);
    if (title === null) {
      this.log.warn(`Article ${id} on page ${page} has no title.`);
    }
    const url = urlField.extract(article);
    if (url === null) {
      this.log.warn(`Article ${id} on page ${page} has no source URL.`);
    }

    const record: ArticleRecord = { id, title: title ?? '', url: url ?? '' };

    if (this.fields.readUrl) {
      record.readUrl = `${this.baseUrl}/read/${id}`;
    }
    if (this.fields.articlePreview) {
      const preview = previewField.extract(article);
      if (preview !== null) record.preview = preview;
    }

    return record;
  }
}
