import { describe, it, expect, vi, beforeEach } from 'vitest';
import { collectItems, fetchFailed } from '../src/scrapers/collect.js';
import {
  SourceRequestError,
  SourceUnavailableError,
  type CollectResult,
  type CommentPage,
  type CommentSource,
  type RawItem,
  type SourceTarget,
} from '../src/scrapers/types.js';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

function raw(id: string): RawItem {
  return {
    source: 'r/test',
    comment_url: `https://www.reddit.com/r/test/comments/t/x/${id}/`,
    author: 'tester',
    body: `comment ${id}`,
  };
}

function page(ids: string[], next: string | null = null, malformed = 0): CommentPage {
  return { items: ids.map(raw), next, malformed };
}

function fakeSource(fetch: (target: SourceTarget, cursor: string | null) => Promise<CommentPage>): CommentSource {
  return { name: 'fake', fetch: vi.fn(fetch) };
}

const NO_WAIT = { backoffMs: 0, jitterMs: 0 };

describe('collectItems', () => {
  it('follows cursors up to maxPages', async () => {
    const source = fakeSource(async (_target, cursor) =>
      cursor === null ? page(['a', 'b'], 'p2', 1) : page(['c'], 'p3'),
    );

    const result = await collectItems(source, [{ kind: 'search', subreddit: 'test', query: 'q' }], { maxPages: 2 });

    expect(result.items.map((i) => i.body)).toEqual(['comment a', 'comment b', 'comment c']);
    expect(result.malformed).toBe(1);
    expect(source.fetch).toHaveBeenCalledTimes(2);
  });

  it('skips unavailable targets and records other failures', async () => {
    const source = fakeSource(async (target) => {
      if (target.kind === 'thread' && target.url.endsWith('gone')) {
        throw new SourceUnavailableError(404, 'not found');
      }
      if (target.kind === 'thread' && target.url.endsWith('broken')) {
        throw new Error('Unexpected thread payload');
      }
      return page(['ok']);
    });

    const result = await collectItems(source, [
      { kind: 'thread', url: 'https://www.reddit.com/gone' },
      { kind: 'thread', url: 'https://www.reddit.com/broken' },
      { kind: 'thread', url: 'https://www.reddit.com/fine' },
    ]);

    expect(result.items).toHaveLength(1);
    expect(result.skipped).toEqual(['https://www.reddit.com/gone']);
    expect(result.errors).toEqual(['https://www.reddit.com/broken: Unexpected thread payload']);
  });

  it('keeps a partial page and records the failures it reports', async () => {
    const source = fakeSource(async () => ({ ...page(['a']), errors: ['/r/test/comments/b/: socket hang up'] }));

    const result = await collectItems(source, [{ kind: 'search', subreddit: 'test', query: 'q' }]);

    expect(result.items).toHaveLength(1);
    expect(result.errors).toEqual(['r/test "q": /r/test/comments/b/: socket hang up']);
  });

  it('retries transient failures', async () => {
    let calls = 0;
    const source = fakeSource(async () => {
      calls++;
      if (calls === 1) throw new SourceRequestError(429, 'rate limited');
      return page(['a']);
    });

    const result = await collectItems(source, [{ kind: 'thread', url: 'https://www.reddit.com/t' }], { retry: NO_WAIT });

    expect(calls).toBe(2);
    expect(result.items).toHaveLength(1);
    expect(result.errors).toEqual([]);
  });

  it('stops at maxItems', async () => {
    const source = fakeSource(async () => page(['a', 'b', 'c']));

    const result = await collectItems(
      source,
      [
        { kind: 'thread', url: 'https://www.reddit.com/1' },
        { kind: 'thread', url: 'https://www.reddit.com/2' },
      ],
      { maxItems: 2 },
    );

    expect(result.items.map((i) => i.body)).toEqual(['comment a', 'comment b']);
    expect(source.fetch).toHaveBeenCalledTimes(1);
  });

  it('requests nothing once the deadline has passed', async () => {
    const source = fakeSource(async () => page(['a']));

    const result = await collectItems(source, [{ kind: 'thread', url: 'https://www.reddit.com/1' }], {
      deadline: Date.now() - 1,
    });

    expect(result.items).toEqual([]);
    expect(source.fetch).not.toHaveBeenCalled();
  });
});

describe('fetchFailed', () => {
  const empty: CollectResult = { items: [], errors: [], skipped: [], malformed: 0 };

  it('fails a run whose only thread is unavailable', () => {
    expect(fetchFailed({ ...empty, skipped: ['https://www.reddit.com/r/x/comments/1/t'] }, 1)).toBe(true);
  });

  it('fails a run that collected nothing and hit errors', () => {
    expect(fetchFailed({ ...empty, skipped: ['r/a "q"'], errors: ['r/b "q": returned 503'] }, 3)).toBe(true);
  });

  it('passes a run where some targets answered with no comments', () => {
    expect(fetchFailed({ ...empty, skipped: ['r/a "q"'] }, 2)).toBe(false);
  });

  it('passes any run that collected something', () => {
    expect(fetchFailed({ ...empty, items: [raw('a')], errors: ['r/b "q": returned 503'] }, 2)).toBe(false);
  });

  it('fails a single unavailable thread end to end', async () => {
    const source = fakeSource(async () => {
      throw new SourceUnavailableError(404, 'GET /r/x/comments/1/t/.json returned 404');
    });
    const targets: SourceTarget[] = [{ kind: 'thread', url: 'https://www.reddit.com/r/x/comments/1/t' }];

    const result = await collectItems(source, targets);

    expect(result.errors).toEqual([]);
    expect(fetchFailed(result, targets.length)).toBe(true);
  });
});
