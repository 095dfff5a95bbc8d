/**
 * Output Sinks
 *
 * Serialize the aggregated records to CSV, JSON or a SQLite database.
 */

import { writeSqlite } from './output-sqlite.js';
import type { ArticleRecord, FieldOptions, OutputFormat } from './types.js';
import { silentLogger, type Logger } from './utils/logger.js';
import { writeFileAtomic, writeJsonAtomic } from './utils/write-file-atomic.js';

interface Column {
  header: string;
  value: (record: ArticleRecord) => string;
}

function columnsFor(fields: FieldOptions): Column[] {
  const columns: Column[] = [
    { header: 'id', value: (record) => record.id },
    { header: 'title', value: (record) => record.title },
    { header: 'url', value: (record) => record.url },
  ];
  if (fields.readUrl) {
    columns.push({ header: 'instapaper_url', value: (record) => record.readUrl ?? '' });
  }
  if (fields.articlePreview) {
    columns.push({ header: 'article_preview', value: (record) => record.preview ?? '' });
  }
  return columns;
}

/**
 * RFC 4180: quote fields holding a comma, quote or line break; double inner quotes
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(records: readonly ArticleRecord[], fields: FieldOptions): string {
  const columns = columnsFor(fields);
  const lines = [columns.map((column) => column.header).join(',')];
  for (const record of records) {
    lines.push(columns.map((column) => escapeCsvField(column.value(record))).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}

/** Records as written to JSON: only the enabled optional fields */
export function toJsonRecords(records: readonly ArticleRecord[], fields: FieldOptions): ArticleRecord[] {
  return records.map((record) => {
    const out: ArticleRecord = { id: record.id, title: record.title, url: record.url };
    if (fields.readUrl && record.readUrl !== undefined) out.readUrl = record.readUrl;
    if (fields.articlePreview && record.preview !== undefined) out.preview = record.preview;
    return out;
  });
}

/**
 * Write records to `filename`. An empty list writes nothing.
 * Returns whether a file was written.
 */
export async function saveArticles(
  records: readonly ArticleRecord[],
  format: OutputFormat,
  filename: string,
  fields: FieldOptions,
  logger: Logger = silentLogger
): Promise<boolean> {
  if (records.length === 0) {
    logger.info('No articles found to save.');
    return false;
  }

  switch (format) {
    case 'csv':
      await writeFileAtomic(filename, toCsv(records, fields));
      break;
    case 'json':
      await writeJsonAtomic(filename, toJsonRecords(records, fields));
      break;
    case 'sqlite':
      await writeSqlite(records, filename, fields);
      break;
  }

  logger.info(`Saved ${records.length} articles to ${filename}.`);
  return true;
}
