/**
 * Type Definitions
 *
 * Shared types for the Instapaper export pipeline.
 */

// ============================================
// Session & credentials
// ============================================

/** Username/password pair. Held in memory for the duration of a login only. */
export interface Credentials {
  username: string;
  password: string;
}

/** A single cookie issued by the service */
export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
}

/** Service-issued cookie set that authenticates subsequent requests */
export interface Session {
  cookies: SessionCookie[];
}

// ============================================
// Articles
// ============================================

/** Normalized unit of scraped output */
export interface ArticleRecord {
  /** Service-assigned identifier, unique within a run */
  id: string;
  title: string;
  /** Original source URL of the article */
  url: string;
  /** Reader URL on instapaper.com (only with the read URL field enabled) */
  readUrl?: string;
  /** Preview snippet (only with the article preview field enabled) */
  preview?: string;
}

/** Optional fields added to every record */
export interface FieldOptions {
  readUrl: boolean;
  articlePreview: boolean;
}

/**
 * Outcome of extracting one page.
 * - records: at least one article was extracted
 * - empty: the article list exists but holds no articles (end of pagination)
 * - malformed: the markup no longer matches what the extractor knows
 */
export type PageResult =
  | { kind: 'records'; records: ArticleRecord[]; skipped: number }
  | { kind: 'empty' }
  | { kind: 'malformed'; reason: string; skipped: number };

// ============================================
// Scrape targets
// ============================================

export type ScrapeTarget =
  | { kind: 'home' }
  | { kind: 'archive' }
  | { kind: 'liked' }
  | { kind: 'folder'; idAndSlug: string };

/** Named folder declared in the config file */
export interface FolderEntry {
  key: string;
  id: string;
  slug: string;
}

// ============================================
// Configuration
// ============================================

/** Fully resolved configuration handed to the pipeline */
export interface ExportConfig {
  username?: string;
  password?: string;
  folderModeEnabled: boolean;
  folderIdAndSlug?: string;
  /** Explicit target; takes precedence over folder mode */
  target?: ScrapeTarget;
  /** Total attempts per request (first try included) */
  maxRetries: number;
  /** Base backoff delay in seconds */
  backoffFactor: number;
  /** Upper bound on a single backoff delay in seconds */
  maxBackoffSeconds: number;
  requestTimeoutMs: number;
  /** Soft safety bound on pages fetched */
  maxPages?: number;
  fields: FieldOptions;
  sessionFile: string;
  keyFile: string;
  /** Whether the resolver may prompt on the terminal */
  interactive: boolean;
}

export type OutputFormat = 'csv' | 'json' | 'sqlite';
