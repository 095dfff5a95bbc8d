/**
 * Centralized Path Management
 *
 * Single source of truth for file locations. Session and key files are
 * looked up in the working directory first, then in the user config
 * directory, unless given explicitly.
 */

import { existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { OutputFormat } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Package root (parent of src/ or dist/)
 */
export const PACKAGE_ROOT = path.resolve(__dirname, '..');

export const PACKAGE_JSON_FILE = path.join(PACKAGE_ROOT, 'package.json');

export const APP_DIR_NAME = 'instapaper-export';
export const CONFIG_FILE_NAME = 'config.yaml';
export const SESSION_FILE_NAME = '.instapaper_session';
export const KEY_FILE_NAME = '.session_key';

export interface PathContext {
  cwd: string;
  home: string;
}

export function defaultPathContext(): PathContext {
  return { cwd: process.cwd(), home: os.homedir() };
}

/**
 * ~/.config/instapaper-export
 */
export function getUserConfigDir(ctx: PathContext = defaultPathContext()): string {
  return path.join(ctx.home, '.config', APP_DIR_NAME);
}

/**
 * .env in the working directory
 */
export function getEnvFile(ctx: PathContext = defaultPathContext()): string {
  return path.join(ctx.cwd, '.env');
}

/**
 * Config file: explicit path, else ./config.yaml, else the user config dir.
 * Returns null when none exists (an explicit path is returned as-is).
 */
export function resolveConfigFile(explicit?: string, ctx: PathContext = defaultPathContext()): string | null {
  if (explicit) return path.resolve(ctx.cwd, explicit);

  const candidates = [path.join(ctx.cwd, CONFIG_FILE_NAME), path.join(getUserConfigDir(ctx), CONFIG_FILE_NAME)];
  return candidates.find((candidate) => existsSync(candidate)) ?? null;
}

function resolveSecretFile(name: string, explicit: string | undefined, ctx: PathContext): string {
  if (explicit) return path.resolve(ctx.cwd, explicit);
  const local = path.join(ctx.cwd, name);
  if (existsSync(local)) return local;
  return path.join(getUserConfigDir(ctx), name);
}

/**
 * Session blob and key locations
 */
export function resolveSessionFiles(
  explicit: { sessionFile?: string; keyFile?: string } = {},
  ctx: PathContext = defaultPathContext()
): { sessionFile: string; keyFile: string } {
  return {
    sessionFile: resolveSecretFile(SESSION_FILE_NAME, explicit.sessionFile, ctx),
    keyFile: resolveSecretFile(KEY_FILE_NAME, explicit.keyFile, ctx),
  };
}

/**
 * output/bookmarks.<ext>
 */
export function getDefaultOutputFile(format: OutputFormat, ctx: PathContext = defaultPathContext()): string {
  const ext = format === 'sqlite' ? 'db' : format;
  return path.join(ctx.cwd, 'output', `bookmarks.${ext}`);
}
