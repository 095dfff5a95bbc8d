/**
 * Environment Configuration
 *
 * Loads variables from .env in the working directory. Getters read
 * process.env on every access so tests can change it.
 */

import dotenv from 'dotenv';
import { getEnvFile } from './paths.js';

let loaded = false;

export function loadEnvFile(file = getEnvFile()): void {
  if (loaded) return;
  dotenv.config({ path: file });
  loaded = true;
}

function readFlag(value: string | undefined): boolean {
  return ['true', '1', 't', 'yes'].includes((value ?? '').trim().toLowerCase());
}

function readNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : Number.NaN;
}

export const env = {
  get INSTAPAPER_USERNAME(): string | undefined {
    return process.env.INSTAPAPER_USERNAME;
  },
  get INSTAPAPER_PASSWORD(): string | undefined {
    return process.env.INSTAPAPER_PASSWORD;
  },
  /** NaN when set but not a number */
  get MAX_RETRIES(): number | undefined {
    return readNumber(process.env.MAX_RETRIES);
  },
  /** NaN when set but not a number */
  get BACKOFF_FACTOR(): number | undefined {
    return readNumber(process.env.BACKOFF_FACTOR);
  },
  get ENABLE_FOLDER_MODE(): boolean {
    return readFlag(process.env.ENABLE_FOLDER_MODE);
  },
  get FOLDER_ID_AND_SLUG(): string | undefined {
    return process.env.FOLDER_ID_AND_SLUG || undefined;
  },
  get DEBUG(): boolean {
    return readFlag(process.env.DEBUG);
  },
};

export type Env = typeof env;
