import { withRetry, type RetryOptions } from '../utils/retry.js';
import {
  SourceRequestError,
  SourceUnavailableError,
  describeTarget,
  type CollectResult,
  type CommentPage,
  type CommentSource,
  type SourceTarget,
} from './types.js';

export interface CollectOptions {
  maxItems?: number;
  deadline?: number; // epoch ms; no new page is requested after it
  maxPages?: number; // per target
  retry?: RetryOptions;
}

/**
 * Page through every target, collecting raw items until a limit is hit.
 *
 * Unavailable targets are logged and skipped; transient failures are retried
 * and then recorded as errors. Ranking dedupes, so overlapping searches are
 * kept as-is here.
 */
export async function collectItems(
  source: CommentSource,
  targets: SourceTarget[],
  options: CollectOptions = {},
): Promise<CollectResult> {
  const maxItems = options.maxItems ?? Infinity;
  const deadline = options.deadline ?? Infinity;
  const maxPages = options.maxPages ?? 1;
  const retry: RetryOptions = {
    retries: 4,
    shouldRetry: (err) => err instanceof SourceRequestError,
    ...options.retry,
    deadline,
  };

  const result: CollectResult = { items: [], errors: [], skipped: [], malformed: 0 };
  const limitReached = () => result.items.length >= maxItems || Date.now() >= deadline;

  for (const target of targets) {
    if (limitReached()) break;
    const label = describeTarget(target);

    let cursor: string | null = null;
    for (let page = 0; page < maxPages; page++) {
      if (limitReached()) break;

      try {
        const current = cursor;
        const { items, next, malformed, errors = [] } = await withRetry((): Promise<CommentPage> => source.fetch(target, current), retry);
        result.items.push(...items.slice(0, maxItems - result.items.length));
        result.malformed += malformed;
        result.errors.push(...errors.map((message) => `${label}: ${message}`));
        console.log(`    ${source.name} ${label}: ${items.length} comments`);
        cursor = next;
      } catch (err) {
        if (err instanceof SourceUnavailableError) {
          console.warn(`    Skipped ${label}: ${err.message}`);
          result.skipped.push(label);
        } else {
          result.errors.push(`${label}: ${err instanceof Error ? err.message : String(err)}`);
        }
        break;
      }

      if (cursor === null) break;
    }
  }

  return result;
}

/** Nothing was collected, and the run either hit errors or had every target refused. */
export function fetchFailed(result: CollectResult, targetCount: number): boolean {
  if (result.items.length > 0) return false;
  return result.errors.length > 0 || result.skipped.length >= targetCount;
}
