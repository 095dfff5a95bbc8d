import { describe, expect, it } from 'vitest';

import { ArticleExtractor } from '../src/article-extractor.js';
import type { FieldOptions } from '../src/types.js';
import { createMemoryLogger } from '../src/utils/logger.js';
import { listPage } from './helpers/html.js';

const NO_FIELDS: FieldOptions = { readUrl: false, articlePreview: false };
const ALL_FIELDS: FieldOptions = { readUrl: true, articlePreview: true };

function makeExtractor(fields: FieldOptions = NO_FIELDS) {
  const logger = createMemoryLogger();
  const extractor = new ArticleExtractor({ fields, baseUrl: 'https://www.instapaper.com', logger });
  return { extractor, logger };
}

describe('ArticleExtractor', () => {
  it('extracts records in page order', () => {
    const { extractor } = makeExtractor();
    const html = listPage([
      { id: '100', title: 'First', url: 'https://example.com/a' },
      { id: '101', title: 'Second', url: 'https://example.com/b' },
    ]);

    expect(extractor.extract(html, 1)).toEqual({
      kind: 'records',
      records: [
        { id: '100', title: 'First', url: 'https://example.com/a' },
        { id: '101', title: 'Second', url: 'https://example.com/b' },
      ],
      skipped: 0,
    });
  });

  it('adds the reader URL and preview when enabled', () => {
    const { extractor } = makeExtractor(ALL_FIELDS);
    const html = listPage([{ id: '7', title: 'T', url: 'https://example.com/t', preview: '  A short\n  preview ' }]);

    const result = extractor.extract(html);

    expect(result).toEqual({
      kind: 'records',
      records: [
        {
          id: '7',
          title: 'T',
          url: 'https://example.com/t',
          readUrl: 'https://www.instapaper.com/read/7',
          preview: 'A short preview',
        },
      ],
      skipped: 0,
    });
  });

  it('leaves the preview out when the page has none', () => {
    const { extractor } = makeExtractor(ALL_FIELDS);
    const result = extractor.extract(listPage([{ id: '7', title: 'T', url: 'https://example.com/t' }]));

    expect(result).toStrictEqual({
      kind: 'records',
      records: [{ id: '7', title: 'T', url: 'https://example.com/t', readUrl: 'https://www.instapaper.com/read/7' }],
      skipped: 0,
    });
  });

  it('decodes entities and collapses whitespace in titles', () => {
    const { extractor } = makeExtractor();
    const result = extractor.extract(listPage([{ id: '1', title: ' Tips   &\n Tricks ', url: 'https://example.com/?a=1&b=2' }]));

    expect(result).toMatchObject({
      kind: 'records',
      records: [{ id: '1', title: 'Tips & Tricks', url: 'https://example.com/?a=1&b=2' }],
    });
  });

  it('degrades a missing title and URL to empty strings with warnings', () => {
    const { extractor, logger } = makeExtractor();

    const result = extractor.extract(listPage([{ id: '5' }]), 3);

    expect(result).toEqual({ kind: 'records', records: [{ id: '5', title: '', url: '' }], skipped: 0 });
    expect(logger.lines.filter((line) => line.level === 'warn').map((line) => line.message)).toEqual([
      'Article 5 on page 3 has no title.',
      'Article 5 on page 3 has no source URL.',
    ]);
  });

  it('does not take the reader link as the source URL', () => {
    const { extractor, logger } = makeExtractor();

    const result = extractor.extract(listPage([{ id: '5', title: 'Has title, no source link' }]), 1);

    expect(result).toEqual({
      kind: 'records',
      records: [{ id: '5', title: 'Has title, no source link', url: '' }],
      skipped: 0,
    });
    expect(logger.lines.map((line) => line.message)).toEqual(['Article 5 on page 1 has no source URL.']);
  });

  it('skips articles without an identifier', () => {
    const { extractor } = makeExtractor();
    const html = listPage([{ title: 'Anonymous', url: 'https://example.com/x' }, { id: '9', title: 'Nine', url: 'https://example.com/9' }]);

    expect(extractor.extract(html)).toEqual({
      kind: 'records',
      records: [{ id: '9', title: 'Nine', url: 'https://example.com/9' }],
      skipped: 1,
    });
  });

  it('falls back to data-article-id', () => {
    const { extractor } = makeExtractor();
    const html = `<div id="article_list"><article data-article-id="55"><a class="article_title" href="/read/55">Fallback</a></article></div>`;

    expect(extractor.extract(html)).toMatchObject({ kind: 'records', records: [{ id: '55', title: 'Fallback' }] });
  });

  it('reports an empty list as the end of pagination', () => {
    const { extractor } = makeExtractor();

    expect(extractor.extract(listPage([]))).toEqual({ kind: 'empty' });
  });

  it('reports a page without the article list as malformed', () => {
    const { extractor } = makeExtractor();

    expect(extractor.extract('<html><body><p>Something else</p></body></html>')).toMatchObject({ kind: 'malformed' });
  });

  it('reports a page where no article has an identifier as malformed', () => {
    const { extractor } = makeExtractor();
    const html = listPage([{ title: 'A' }, { title: 'B' }]);

    expect(extractor.extract(html)).toEqual({
      kind: 'malformed',
      reason: 'none of the 2 article elements has an identifier',
      skipped: 2,
    });
  });
});
