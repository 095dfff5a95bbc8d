/**
 * Atomic File Writing
 *
 * Write-to-temp-then-rename, so a file is never left half written.
 * The temp file lives beside the destination so the rename stays atomic,
 * and it is created with the final mode so secrets are never readable by
 * others, not even briefly.
 */

import { chmod, mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

interface WriteOptions {
  /** File mode (permissions). Default: 0o644 */
  mode?: number;
  /** Mode of parent directories created on the way. Default: 0o755 */
  dirMode?: number;
  /** Create parent directories. Default: true */
  createDir?: boolean;
}

export async function writeFileAtomic(
  filepath: string,
  data: string | Uint8Array,
  options: WriteOptions = {}
): Promise<void> {
  const { mode = 0o644, dirMode = 0o755, createDir = true } = options;

  if (createDir) {
    await mkdir(path.dirname(filepath), { recursive: true, mode: dirMode });
  }

  const tempPath = `${filepath}.tmp.${process.pid}.${Date.now()}`;

  try {
    await writeFile(tempPath, data, { mode, flag: 'wx' });
    // writeFile's mode is filtered by the umask
    await chmod(tempPath, mode);
    await rename(tempPath, filepath);
  } catch (e) {
    await rm(tempPath, { force: true });
    throw e;
  }
}

/**
 * Write JSON (2-space indent) atomically
 */
export async function writeJsonAtomic(filepath: string, data: unknown, options: WriteOptions = {}): Promise<void> {
  await writeFileAtomic(filepath, JSON.stringify(data, null, 2), options);
}
