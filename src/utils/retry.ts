import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * How a failed attempt should be handled.
 * `delayMs` overrides the exponential schedule (e.g. a Retry-After header).
 */
export type RetryDecision = { retry: false } | { retry: true; delayMs?: number };

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  jitterMs?: number;
  classify: (error: unknown) => RetryDecision;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Error to throw once every attempt failed; default: the last error */
  onExhausted?: (attempts: number, error: unknown) => Error;
  sleep?: Sleep;
}

/**
 * base * 2^(attempt - 1), capped, plus optional jitter
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = Infinity, jitterMs = 0): number {
  const exponential = baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
  return Math.min(exponential, maxDelayMs) + jitter;
}

export async function withRetries<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { maxAttempts, baseDelayMs, maxDelayMs, jitterMs = 0, classify, onRetry, onExhausted, sleep = defaultSleep } =
    options;
  const attempts = Math.max(1, Math.floor(maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      const decision = classify(error);
      if (!decision.retry) {
        throw error;
      }

      if (attempt < attempts) {
        const delayMs = decision.delayMs ?? backoffDelay(attempt, baseDelayMs, maxDelayMs, jitterMs);
        onRetry?.(attempt, error, delayMs);
        await sleep(delayMs);
      }
    }
  }

  throw onExhausted ? onExhausted(attempts, lastError) : lastError;
}
