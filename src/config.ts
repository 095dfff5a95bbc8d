/**
 * Application Configuration
 *
 * Typed defaults for the Instapaper endpoints and retry policy, the optional
 * YAML config file, and the merge of flags > environment > file > defaults
 * into one ExportConfig.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';

import type { CliOptions } from './cli-args.js';
import type { Env } from './env.js';
import { ConfigError, describeError, isMissingFileError } from './errors.js';
import { parseTargetArg } from './scrape-targets.js';
import type { ExportConfig, FolderEntry, ScrapeTarget } from './types.js';

const BASE_URL = 'https://www.instapaper.com';

export const config = {
  baseUrl: BASE_URL,

  endpoints: {
    loginUrl: `${BASE_URL}/user/login`,
    verifyUrl: `${BASE_URL}/u`,
    loginSuccessPath: '/u',
    loginFormSelector: '#login_form, form[action$="/user/login"]',
    requiredCookies: ['pfu', 'pfp', 'pfh'],
  },

  // A 200 on this path is the login wall
  loginPath: '/user/login',

  request: {
    timeoutMs: 30_000,
  },

  retries: {
    maxAttempts: 3,
    backoffFactorSeconds: 1,
    maxDelaySeconds: 60,
  },
} as const;

Object.freeze(config);
Object.freeze(config.endpoints);
Object.freeze(config.request);
Object.freeze(config.retries);

// ============================================
// Config file
// ============================================

export interface ConfigFile {
  fields: {
    read_url?: boolean;
    article_preview?: boolean;
  };
  folders: FolderEntry[];
  retries: {
    max_attempts?: number;
    backoff_factor?: number;
    max_delay_seconds?: number;
  };
  max_pages?: number;
  /** Default output file when exporting the liked list */
  liked_output_filename?: string;
  /** Default output file when exporting the archive */
  archive_output_filename?: string;
}

export const EMPTY_CONFIG_FILE: ConfigFile = { fields: {}, folders: [], retries: {} };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function checkOptional(
  errors: string[],
  section: Record<string, unknown>,
  key: string,
  label: string,
  type: 'boolean' | 'number' | 'string'
): void {
  const value = section[key];
  if (value === undefined) return;
  if (typeof value !== type || (type === 'number' && !Number.isFinite(value))) {
    errors.push(`${label} must be a ${type}`);
  }
}

function assertConfigFile(value: unknown, file: string): asserts value is Partial<ConfigFile> {
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid config in ${file}: expected a mapping at the top level`);
  }

  const errors: string[] = [];

  const fields = value.fields;
  if (fields !== undefined) {
    if (!isRecord(fields)) {
      errors.push('fields must be a mapping');
    } else {
      checkOptional(errors, fields, 'read_url', 'fields.read_url', 'boolean');
      checkOptional(errors, fields, 'article_preview', 'fields.article_preview', 'boolean');
    }
  }

  const folders = value.folders;
  if (folders !== undefined) {
    if (!Array.isArray(folders)) {
      errors.push('folders must be a list');
    } else {
      folders.forEach((folder: unknown, index) => {
        const entry = isRecord(folder) ? folder : {};
        const complete = ['key', 'id', 'slug'].every((key) => typeof entry[key] === 'string' && entry[key] !== '');
        if (!complete) {
          errors.push(`folders[${index}] must have string key, id and slug`);
        }
      });
    }
  }

  const retries = value.retries;
  if (retries !== undefined) {
    if (!isRecord(retries)) {
      errors.push('retries must be a mapping');
    } else {
      checkOptional(errors, retries, 'max_attempts', 'retries.max_attempts', 'number');
      checkOptional(errors, retries, 'backoff_factor', 'retries.backoff_factor', 'number');
      checkOptional(errors, retries, 'max_delay_seconds', 'retries.max_delay_seconds', 'number');
    }
  }

  checkOptional(errors, value, 'max_pages', 'max_pages', 'number');
  checkOptional(errors, value, 'liked_output_filename', 'liked_output_filename', 'string');
  checkOptional(errors, value, 'archive_output_filename', 'archive_output_filename', 'string');

  if (errors.length > 0) {
    throw new ConfigError(`Invalid config in ${file}: ${errors.join('; ')}`);
  }
}

/**
 * Read and validate a YAML config file.
 * A missing file yields the empty config unless `required` is set.
 */
export async function loadConfigFile(file: string, options: { required?: boolean } = {}): Promise<ConfigFile> {
  let text: string;
  try {
    text = await readFile(file, 'utf-8');
  } catch (e) {
    if (isMissingFileError(e) && !options.required) {
      return EMPTY_CONFIG_FILE;
    }
    throw new ConfigError(`Could not read config file ${file}: ${describeError(e)}`, { cause: e });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(text);
  } catch (e) {
    throw new ConfigError(`Config file ${file} is not valid YAML: ${describeError(e)}`, { cause: e });
  }

  // An empty document parses to null
  if (parsed === null || parsed === undefined) {
    return EMPTY_CONFIG_FILE;
  }

  assertConfigFile(parsed, file);
  return {
    fields: { ...parsed.fields },
    folders: parsed.folders ?? [],
    retries: { ...parsed.retries },
    max_pages: parsed.max_pages,
    liked_output_filename: parsed.liked_output_filename,
    archive_output_filename: parsed.archive_output_filename,
  };
}

/** Output file the config file names for a target, if any */
export function outputFileForTarget(target: ScrapeTarget, file: ConfigFile): string | undefined {
  switch (target.kind) {
    case 'liked':
      return file.liked_output_filename || undefined;
    case 'archive':
      return file.archive_output_filename || undefined;
    default:
      return undefined;
  }
}

// ============================================
// Merge
// ============================================

export interface ConfigSources {
  cli: CliOptions;
  env: Pick<
    Env,
    'INSTAPAPER_USERNAME' | 'INSTAPAPER_PASSWORD' | 'MAX_RETRIES' | 'BACKOFF_FACTOR' | 'ENABLE_FOLDER_MODE' | 'FOLDER_ID_AND_SLUG'
  >;
  file: ConfigFile;
  sessionFiles: { sessionFile: string; keyFile: string };
  interactive: boolean;
}

function requireInteger(value: number, name: string, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got ${value})`);
  }
  return value;
}

function requireNonNegative(value: number, name: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a number >= 0 (got ${value})`);
  }
  return value;
}

/**
 * Resolve the final configuration.
 * Precedence: CLI flag > environment > config file > default.
 */
export function buildExportConfig(sources: ConfigSources): ExportConfig {
  const { cli, env, file, sessionFiles, interactive } = sources;

  const maxRetries = requireInteger(
    env.MAX_RETRIES ?? file.retries.max_attempts ?? config.retries.maxAttempts,
    'MAX_RETRIES',
    1
  );
  const backoffFactor = requireNonNegative(
    env.BACKOFF_FACTOR ?? file.retries.backoff_factor ?? config.retries.backoffFactorSeconds,
    'BACKOFF_FACTOR'
  );
  const maxBackoffSeconds = requireNonNegative(
    file.retries.max_delay_seconds ?? config.retries.maxDelaySeconds,
    'retries.max_delay_seconds'
  );

  const maxPagesValue = cli.maxPages ?? file.max_pages;
  const maxPages = maxPagesValue === undefined ? undefined : requireInteger(maxPagesValue, 'max pages', 1);

  return {
    username: env.INSTAPAPER_USERNAME || undefined,
    password: env.INSTAPAPER_PASSWORD || undefined,
    folderModeEnabled: env.ENABLE_FOLDER_MODE,
    folderIdAndSlug: env.FOLDER_ID_AND_SLUG,
    target: cli.folder ? parseTargetArg(cli.folder, file.folders) : undefined,
    maxRetries,
    backoffFactor,
    maxBackoffSeconds,
    requestTimeoutMs: config.request.timeoutMs,
    maxPages,
    fields: {
      readUrl: cli.readUrl ?? file.fields.read_url ?? false,
      articlePreview: cli.articlePreview ?? file.fields.article_preview ?? false,
    },
    sessionFile: sessionFiles.sessionFile,
    keyFile: sessionFiles.keyFile,
    interactive,
  };
}
