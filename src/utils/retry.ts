import { SourceRequestError } from '../scrapers/types.js';

export interface RetryOptions {
  retries?: number;
  backoffMs?: number;
  maxBackoffMs?: number;
  jitterMs?: number;
  shouldRetry?: (err: unknown) => boolean;
  deadline?: number; // epoch ms; backoff never sleeps past it
}

function defaultShouldRetry(err: unknown): boolean {
  return err instanceof SourceRequestError;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const retries = options.retries ?? 0;
  const backoffMs = options.backoffMs ?? 1000;
  const maxBackoffMs = options.maxBackoffMs ?? 60_000;
  const jitterMs = options.jitterMs ?? 500;
  const shouldRetry = options.shouldRetry ?? defaultShouldRetry;
  const deadline = options.deadline ?? Infinity;

  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const remaining = deadline - Date.now();
      if (attempt >= retries || remaining <= 0 || !shouldRetry(err)) {
        throw err;
      }
      const delay = Math.min(backoffMs * 2 ** attempt, maxBackoffMs) + Math.random() * jitterMs;
      attempt += 1;
      await sleep(Math.min(delay, remaining));
    }
  }
}
