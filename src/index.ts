/**
 * Library entry point
 */

export type {
  ArticleRecord,
  Credentials,
  ExportConfig,
  FieldOptions,
  FolderEntry,
  OutputFormat,
  PageResult,
  ScrapeTarget,
  Session,
  SessionCookie,
} from './types.js';

export {
  AuthenticationFailure,
  ConfigError,
  CredentialError,
  ExportError,
  PersistenceError,
  RequestError,
  StructureChangedError,
  TransientNetworkError,
  describeError,
  getExitCode,
  isExportError,
  isMissingFileError,
} from './errors.js';
export type { AuthenticationFailureReason, ExportErrorKind } from './errors.js';

export * from './auth/index.js';

export { ArticleExtractor } from './article-extractor.js';
export type { ArticleExtractorOptions, FieldExtractor } from './article-extractor.js';
export { CookieJar } from './http/cookies.js';
export { RetryingTransport } from './http/transport.js';
export type { FetchLike, RequestOptions, TransportOptions, TransportResponse } from './http/transport.js';
export { Paginator } from './paginator.js';
export type { FetchedPage, PaginatorOptions } from './paginator.js';
export { describeTarget, getPageUrl, parseTargetArg, promptForTarget, resolveTarget } from './scrape-targets.js';

export { ExportPipeline, createPipeline, runExport } from './pipeline-runner.js';
export type { ExportPipelineOptions, PipelineRuntime } from './pipeline-runner.js';
export { buildExportConfig, config, loadConfigFile, outputFileForTarget } from './config.js';
export type { ConfigFile, ConfigSources } from './config.js';
export { parseCliArgs } from './cli-args.js';
export type { CliOptions } from './cli-args.js';
export { saveArticles, toCsv, toJsonRecords } from './output.js';
export { writeSqlite } from './output-sqlite.js';
export { runExportCommand } from './export-command.js';
export type { CommandRuntime } from './export-command.js';

export { createConsoleLogger, createMemoryLogger, silentLogger } from './utils/logger.js';
export type { Logger, RecordedLine } from './utils/logger.js';
