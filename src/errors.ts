/**
 * Export Error Taxonomy
 *
 * Every failure that can abort an export is one of these kinds. Each carries a
 * stable exit code and an optional hint the CLI prints as a next step.
 */

export type ExportErrorKind =
  | 'config'
  | 'credential'
  | 'authentication'
  | 'transient_network'
  | 'request'
  | 'structure_changed'
  | 'persistence';

interface ExportErrorOptions {
  cause?: unknown;
  hint?: string;
}

export abstract class ExportError extends Error {
  abstract readonly kind: ExportErrorKind;
  abstract readonly exitCode: number;
  readonly hint: string | undefined;

  constructor(message: string, options: ExportErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.hint = options.hint;
  }
}

/** Invalid config file, flag or environment value */
export class ConfigError extends ExportError {
  readonly kind = 'config';
  readonly exitCode = 1;
}

/** No usable credentials and no reusable session */
export class CredentialError extends ExportError {
  readonly kind = 'credential';
  readonly exitCode = 2;

  static noneAvailable(): CredentialError {
    return new CredentialError('No Instapaper credentials or saved session available.', {
      hint: 'Set INSTAPAPER_USERNAME and INSTAPAPER_PASSWORD, or run the exporter in an interactive terminal.',
    });
  }
}

export type AuthenticationFailureReason = 'login_rejected' | 'verification_failed' | 'session_rejected';

/** Login was refused, or a session stopped being accepted */
export class AuthenticationFailure extends ExportError {
  readonly kind = 'authentication';
  readonly exitCode = 3;
  readonly reason: AuthenticationFailureReason;

  constructor(reason: AuthenticationFailureReason, message: string, options: ExportErrorOptions = {}) {
    super(message, options);
    this.reason = reason;
  }

  static loginRejected(): AuthenticationFailure {
    return new AuthenticationFailure('login_rejected', 'Login failed. Please check your credentials.', {
      hint: 'Verify your Instapaper username and password.',
    });
  }

  static verificationFailed(): AuthenticationFailure {
    return new AuthenticationFailure('verification_failed', 'Login succeeded but the session is not authenticated.', {
      hint: 'Delete the saved session file and log in again.',
    });
  }

  static sessionRejected(url: string, status: number): AuthenticationFailure {
    return new AuthenticationFailure('session_rejected', `Session rejected by ${url} (HTTP ${status}).`);
  }
}

/** Network failure, 5xx or 429 that outlasted the retry budget */
export class TransientNetworkError extends ExportError {
  readonly kind = 'transient_network';
  readonly exitCode = 4;
  readonly attempts: number;
  readonly status: number | undefined;

  constructor(message: string, details: { attempts: number; status?: number; cause?: unknown }) {
    super(message, {
      cause: details.cause,
      hint: 'Instapaper may be unavailable or throttling requests. Try again later or raise MAX_RETRIES.',
    });
    this.attempts = details.attempts;
    this.status = details.status;
  }
}

/** Non-retryable client error (4xx other than 401/403/429) */
export class RequestError extends ExportError {
  readonly kind = 'request';
  readonly exitCode = 7;
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number) {
    super(`Request to ${url} failed with unrecoverable status ${status}.`);
    this.status = status;
    this.url = url;
  }
}

/** The page markup no longer matches what the extractor knows how to read */
export class StructureChangedError extends ExportError {
  readonly kind = 'structure_changed';
  readonly exitCode = 5;
  readonly page: number;
  readonly url: string;

  constructor(page: number, url: string, reason: string) {
    super(`Page ${page} (${url}) could not be parsed: ${reason}`, {
      hint: 'Instapaper may have changed its page layout. Please report this issue.',
    });
    this.page = page;
    this.url = url;
  }
}

/** Session material could not be written with owner-only permissions */
export class PersistenceError extends ExportError {
  readonly kind = 'persistence';
  readonly exitCode = 6;
  readonly path: string;

  constructor(path: string, message: string, cause?: unknown) {
    super(message, { cause, hint: `Check the permissions of ${path} and its directory.` });
    this.path = path;
  }
}

export function isExportError(e: unknown): e is ExportError {
  return e instanceof ExportError;
}

/** Map any thrown value to a process exit code */
export function getExitCode(e: unknown): number {
  return isExportError(e) ? e.exitCode : 1;
}

/** Message of any thrown value, for log lines and error wrapping */
export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return typeof e === 'string' ? e : String(e);
}

/** fs error for a file that does not exist */
export function isMissingFileError(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}
