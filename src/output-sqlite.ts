/**
 * SQLite Sink
 *
 * Upserts records into the `articles` table of a SQLite database file.
 * An existing database is opened and updated in place; rows keyed by an id
 * already present are replaced. The database runs in memory (sql.js) and
 * the file is written back atomically.
 */

import { readFile } from 'node:fs/promises';
import sqlJs from 'sql.js';
import type { Database, SqlJsStatic } from 'sql.js';

import { isMissingFileError } from './errors.js';
import type { ArticleRecord, FieldOptions } from './types.js';
import { writeFileAtomic } from './utils/write-file-atomic.js';

const CREATE_TABLE = `CREATE TABLE IF NOT EXISTS articles (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  url TEXT NOT NULL,
  instapaper_url TEXT,
  article_preview TEXT
)`;

const UPSERT =
  'INSERT OR REPLACE INTO articles (id, title, url, instapaper_url, article_preview) VALUES (?, ?, ?, ?, ?)';

let engine: Promise<SqlJsStatic> | undefined;

function loadEngine(): Promise<SqlJsStatic> {
  // The CommonJS entry exposes the initializer as `default` as well
  engine ??= sqlJs.default();
  return engine;
}

async function openDatabase(SQL: SqlJsStatic, filename: string): Promise<Database> {
  try {
    return new SQL.Database(await readFile(filename));
  } catch (e) {
    if (isMissingFileError(e)) return new SQL.Database();
    throw e;
  }
}

export async function writeSqlite(
  records: readonly ArticleRecord[],
  filename: string,
  fields: FieldOptions
): Promise<void> {
  const SQL = await loadEngine();
  const db = await openDatabase(SQL, filename);
  try {
    db.run(CREATE_TABLE);
    db.run('BEGIN');
    const statement = db.prepare(UPSERT);
    try {
      for (const record of records) {
        statement.run([
          record.id,
          record.title,
          record.url,
          fields.readUrl ? (record.readUrl ?? null) : null,
          fields.articlePreview ? (record.preview ?? null) : null,
        ]);
      }
    } finally {
      statement.free();
    }
    db.run('COMMIT');
    await writeFileAtomic(filename, db.export());
  } finally {
    db.close();
  }
}
