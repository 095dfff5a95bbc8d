/**
 * Session Store
 *
 * Persists the authenticated cookie set encrypted with AES-256-GCM under a
 * locally generated key. Both files are owner-only (0600); when that cannot
 * be enforced, saving fails with a PersistenceError.
 *
 * Blob layout: MAGIC (4) | IV (12) | auth tag (16) | ciphertext
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { readFile, rm, stat } from 'node:fs/promises';

import { describeError, isMissingFileError, PersistenceError } from '../errors.js';
import type { Session, SessionCookie } from '../types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { writeFileAtomic } from '../utils/write-file-atomic.js';

const MAGIC = Buffer.from('IPS1', 'ascii');
const KEY_BYTES = 32;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const SECRET_FILE_MODE = 0o600;
const SECRET_DIR_MODE = 0o700;

export interface SessionStoreOptions {
  sessionFile: string;
  keyFile: string;
  logger?: Logger;
  /** Default: process.platform */
  platform?: NodeJS.Platform;
}

interface SessionPayload {
  version: 1;
  cookies: SessionCookie[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isSessionCookie(value: unknown): value is SessionCookie {
  return (
    isRecord(value) && typeof value.name === 'string' && typeof value.value === 'string' && typeof value.domain === 'string'
  );
}

function parsePayload(json: string): Session | null {
  const payload: unknown = JSON.parse(json);
  if (!isRecord(payload) || payload.version !== 1) return null;
  const cookies = payload.cookies;
  if (!Array.isArray(cookies) || !cookies.every(isSessionCookie)) return null;
  return { cookies: cookies.map((cookie) => ({ name: cookie.name, value: cookie.value, domain: cookie.domain })) };
}

export class SessionStore {
  readonly sessionFile: string;
  readonly keyFile: string;
  private readonly log: Logger;
  private readonly platform: NodeJS.Platform;

  constructor(options: SessionStoreOptions) {
    this.sessionFile = options.sessionFile;
    this.keyFile = options.keyFile;
    this.log = options.logger ?? silentLogger;
    this.platform = options.platform ?? process.platform;
  }

  /**
   * Saved session, or null when there is none or it cannot be decrypted.
   * A blob that exists but does not decrypt is removed.
   */
  async load(): Promise<Session | null> {
    const key = await this.readKey();
    if (!key) return null;

    let blob: Buffer;
    try {
      blob = await readFile(this.sessionFile);
    } catch (e) {
      if (!isMissingFileError(e)) {
        this.log.warn(`Could not read session from ${this.sessionFile}: ${describeError(e)}`);
      }
      return null;
    }

    try {
      const session = this.decrypt(blob, key);
      if (!session) throw new Error('unexpected session format');
      this.log.debug(`Loaded encrypted session from ${this.sessionFile}.`);
      return session;
    } catch (e) {
      this.log.warn(`Could not load session from ${this.sessionFile}: ${describeError(e)}. A new session will be created.`);
      await this.discard();
      return null;
    }
  }

  /**
   * Encrypt and persist a verified session, creating the key on first use.
   */
  async save(session: Session): Promise<void> {
    const key = (await this.readKey()) ?? (await this.createKey());
    const blob = this.encrypt(session, key);
    await this.writeSecret(this.sessionFile, blob);
    this.log.info(`Saved encrypted session to ${this.sessionFile}.`);
  }

  /** Remove the saved session (the key is kept) */
  async discard(): Promise<void> {
    try {
      await rm(this.sessionFile, { force: true });
    } catch (e) {
      this.log.warn(`Could not remove ${this.sessionFile}: ${describeError(e)}`);
    }
  }

  private async readKey(): Promise<Buffer | null> {
    try {
      const key = await readFile(this.keyFile);
      if (key.length !== KEY_BYTES) {
        this.log.warn(`Ignoring encryption key at ${this.keyFile}: expected ${KEY_BYTES} bytes, found ${key.length}.`);
        return null;
      }
      return key;
    } catch (e) {
      if (!isMissingFileError(e)) {
        this.log.warn(`Could not read encryption key ${this.keyFile}: ${describeError(e)}`);
      }
      return null;
    }
  }

  private async createKey(): Promise<Buffer> {
    const key = randomBytes(KEY_BYTES);
    await this.writeSecret(this.keyFile, key);
    this.log.info(`Generated new encryption key at ${this.keyFile}.`);
    return key;
  }

  private encrypt(session: Session, key: Buffer): Buffer {
    const payload: SessionPayload = { version: 1, cookies: session.cookies };
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv('aes-256-gcm', key, iv);
    const ciphertext = Buffer.concat([cipher.update(JSON.stringify(payload), 'utf8'), cipher.final()]);
    return Buffer.concat([MAGIC, iv, cipher.getAuthTag(), ciphertext]);
  }

  private decrypt(blob: Buffer, key: Buffer): Session | null {
    const headerLength = MAGIC.length + IV_BYTES + TAG_BYTES;
    if (blob.length <= headerLength || !blob.subarray(0, MAGIC.length).equals(MAGIC)) {
      throw new Error('not an encrypted session file');
    }

    const iv = blob.subarray(MAGIC.length, MAGIC.length + IV_BYTES);
    const tag = blob.subarray(MAGIC.length + IV_BYTES, headerLength);
    const ciphertext = blob.subarray(headerLength);

    const decipher = createDecipheriv('aes-256-gcm', key, iv);
    decipher.setAuthTag(tag);
    const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    return parsePayload(plaintext);
  }

  private async writeSecret(filepath: string, data: Buffer): Promise<void> {
    // Windows ignores POSIX modes, so owner-only access cannot be checked there
    if (this.platform === 'win32') {
      throw new PersistenceError(
        filepath,
        `Refusing to write ${filepath}: owner-only permissions cannot be enforced on ${this.platform}.`
      );
    }

    try {
      await writeFileAtomic(filepath, data, { mode: SECRET_FILE_MODE, dirMode: SECRET_DIR_MODE });
    } catch (e) {
      throw new PersistenceError(filepath, `Could not write ${filepath}: ${describeError(e)}`, e);
    }

    let mode: number;
    try {
      ({ mode } = await stat(filepath));
    } catch (e) {
      throw new PersistenceError(filepath, `Could not check permissions of ${filepath}: ${describeError(e)}`, e);
    }

    if ((mode & 0o077) !== 0) {
      await rm(filepath, { force: true });
      throw new PersistenceError(
        filepath,
        `Refusing to keep ${filepath}: the filesystem did not apply owner-only permissions (mode ${(mode & 0o777).toString(8)}).`
      );
    }
  }
}
