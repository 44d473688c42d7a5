export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function clamp(value: number, min: number, max: number) {
  return Math.min(Math.max(value, min), max);
}

export function clampScore(value: number) {
  return clamp(value, 0, 100);
}

export function round(value: number, decimals = 1) {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function mean(values: readonly number[]) {
  if (!values.length) return 0;
  return values.reduce((a, v) => a + v, 0) / values.length;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** JSON.stringify replacer that writes bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown) {
  return typeof value === 'bigint' ? value.toString() : value;
}

export type RetryOptions = {
  attempts?: number;
  baseDelayMs?: number;
  // Return false to give up immediately (e.g. a contract revert)
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
};

/**
 * Runs `fn` up to `attempts` times, sleeping baseDelayMs * 2^(attempt-1) between tries.
 * Rethrows the last error once attempts are exhausted.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, opts.attempts ?? 3);
  const baseDelayMs = opts.baseDelayMs ?? 250;
  let attempt = 0;
  let lastError: unknown;

  while (attempt < attempts) {
    attempt += 1;
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (opts.shouldRetry && !opts.shouldRetry(err)) throw err;
      if (attempt >= attempts) break;
      opts.onRetry?.(attempt, err);
      await sleep(baseDelayMs * 2 ** (attempt - 1));
    }
  }

  throw lastError;
}

export class DeadlineExceededError extends Error {
  constructor(readonly ms: number) {
    super(`deadline exceeded after ${ms}ms`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Races `promise` against a timer. Without `ms` the promise is returned untouched.
 * The timer is always cleared so nothing is left pending.
 */
export async function withDeadline<T>(promise: Promise<T>, ms?: number): Promise<T> {
  if (ms === undefined) return promise;

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(ms)), Math.max(0, ms));
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
