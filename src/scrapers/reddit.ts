import { z } from 'zod';
import {
  SourceRequestError,
  SourceUnavailableError,
  type CommentPage,
  type CommentSource,
  type RawItem,
  type SourceTarget,
} from './types.js';

export const SUBREDDITS = [
  'AI_Agents',
  'Entrepreneur',
  'SaaS',
  'startups',
  'ArtificialIntelligence',
  'MachineLearning',
  'nocode',
  'automation',
];

export const SEARCH_QUERIES = [
  'making money AI agents',
  'selling AI agents',
  'AI agent revenue',
  'agent as a service',
  'automations $/mo',
  'monetize AI agent',
  'clients AI agent niche',
  'vendre agent IA',
  'revenu par mois agent IA',
];

const PUBLIC_BASE = 'https://www.reddit.com';
const OAUTH_BASE = 'https://oauth.reddit.com';
const REQUEST_TIMEOUT_MS = 20_000;
const SKIPPED_BODIES = new Set(['[deleted]', '[removed]']);

const thingSchema = z.object({
  kind: z.string(),
  data: z.record(z.string(), z.unknown()),
});

const listingSchema = z.object({
  data: z.object({
    children: z.array(thingSchema),
    after: z.string().nullable().optional(),
  }),
});

const threadSchema = z.object({
  id: z.string(),
  title: z.string(),
  permalink: z.string(),
  subreddit: z.string(),
});

const commentSchema = z.object({
  id: z.string(),
  body: z.string(),
  author: z.string().nullable().optional(),
  permalink: z.string(),
  score: z.number().optional(),
  created_utc: z.number().optional(),
  replies: z.unknown().optional(),
});

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

type Thing = z.infer<typeof thingSchema>;
type Thread = z.infer<typeof threadSchema>;

export interface RedditSourceOptions {
  maxThreads?: number; // per search page
  maxComments?: number; // per thread
  delayMs?: number; // pause between thread requests
  deadline?: number; // epoch ms; caps each request timeout and stops walking a search page
}

function userAgent(): string {
  return process.env.REDDIT_USER_AGENT || 'proofscout/0.1.0';
}

// OAuth token cache
let cachedToken: { token: string; expiresAt: number } | null = null;

async function getOAuthToken(): Promise<string | null> {
  const clientId = process.env.REDDIT_CLIENT_ID;
  const clientSecret = process.env.REDDIT_CLIENT_SECRET;
  const username = process.env.REDDIT_USERNAME;
  const password = process.env.REDDIT_PASSWORD;

  if (!clientId || !clientSecret || !username || !password) {
    return null; // Fall back to unauthenticated
  }

  // Return cached token if still valid (with 60s buffer)
  if (cachedToken && Date.now() < cachedToken.expiresAt - 60_000) {
    return cachedToken.token;
  }

  try {
    const credentials = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');
    const res = await fetch(`${PUBLIC_BASE}/api/v1/access_token`, {
      method: 'POST',
      headers: {
        'Authorization': `Basic ${credentials}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        'User-Agent': userAgent(),
      },
      body: `grant_type=password&username=${encodeURIComponent(username)}&password=${encodeURIComponent(password)}`,
    });

    if (!res.ok) {
      console.error(`Reddit OAuth failed: ${res.status}`);
      return null;
    }

    const parsed = tokenSchema.safeParse(await res.json());
    if (!parsed.success) {
      console.error('Reddit OAuth returned an unexpected payload');
      return null;
    }
    cachedToken = {
      token: parsed.data.access_token,
      expiresAt: Date.now() + parsed.data.expires_in * 1000,
    };
    return cachedToken.token;
  } catch (err) {
    console.error(`Reddit OAuth error: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

async function getJson(path: string, deadline = Infinity): Promise<unknown> {
  const remaining = deadline - Date.now();
  if (remaining <= 0) {
    throw new Error(`GET ${path} skipped: deadline reached`);
  }
  const token = await getOAuthToken();
  const url = `${token ? OAUTH_BASE : PUBLIC_BASE}${path}`;
  const headers: Record<string, string> = { 'User-Agent': userAgent() };
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }

  let res: Response;
  try {
    res = await fetch(url, { headers, signal: AbortSignal.timeout(Math.min(REQUEST_TIMEOUT_MS, remaining)) });
  } catch (err) {
    throw new SourceRequestError(null, `GET ${path} failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (res.status === 403 || res.status === 404) {
    throw new SourceUnavailableError(res.status, `GET ${path} returned ${res.status}`);
  }
  if (res.status === 429 || res.status >= 500) {
    throw new SourceRequestError(res.status, `GET ${path} returned ${res.status}`);
  }
  if (!res.ok) {
    throw new Error(`GET ${path} returned ${res.status}`);
  }

  return res.json();
}

/** "/r/x/comments/id/title" from any thread URL form, without the ".json" suffix. */
export function threadPath(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url, PUBLIC_BASE);
  } catch {
    throw new SourceUnavailableError(400, `Not a Reddit thread URL: ${url}`);
  }
  if (!/(^|\.)reddit\.com$/.test(parsed.hostname) || !parsed.pathname.includes('/comments/')) {
    throw new SourceUnavailableError(400, `Not a Reddit thread URL: ${url}`);
  }
  return parsed.pathname.replace(/\.json$/, '').replace(/\/+$/, '');
}

function toRawItem(comment: z.infer<typeof commentSchema>, thread: Thread): RawItem {
  return {
    source: `r/${thread.subreddit}`,
    comment_url: `${PUBLIC_BASE}${comment.permalink}`,
    thread_url: `${PUBLIC_BASE}${thread.permalink}`,
    thread_title: thread.title,
    author: comment.author ?? '[deleted]',
    body: comment.body,
    popularity: comment.score,
    published_at: comment.created_utc !== undefined
      ? new Date(comment.created_utc * 1000).toISOString()
      : undefined,
  };
}

/** Depth-first walk of a comment tree; "more" stubs are not expanded. */
export function flattenComments(children: Thing[], thread: Thread, page: CommentPage): void {
  for (const child of children) {
    if (child.kind !== 't1') continue;

    const parsed = commentSchema.safeParse(child.data);
    if (!parsed.success) {
      page.malformed++;
      continue;
    }

    if (!SKIPPED_BODIES.has(parsed.data.body.trim())) {
      page.items.push(toRawItem(parsed.data, thread));
    }

    const replies = listingSchema.safeParse(parsed.data.replies);
    if (replies.success) {
      flattenComments(replies.data.data.children, thread, page);
    }
  }
}

async function fetchThread(url: string, maxComments: number, deadline?: number): Promise<CommentPage> {
  const path = threadPath(url);
  const body = await getJson(`${path}/.json?raw_json=1&limit=${maxComments}`, deadline);
  const parsed = z.array(listingSchema).min(2).safeParse(body);
  if (!parsed.success) {
    throw new Error(`Unexpected thread payload for ${path}`);
  }

  const [postListing, commentListing] = parsed.data;
  const thread = threadSchema.safeParse(postListing.data.children[0]?.data);
  if (!thread.success) {
    throw new Error(`Thread ${path} has no post data`);
  }

  const page: CommentPage = { items: [], next: null, malformed: 0 };
  flattenComments(commentListing.data.children, thread.data, page);
  page.items = page.items.slice(0, maxComments);
  return page;
}

export function createRedditSource(options: RedditSourceOptions = {}): CommentSource {
  const maxThreads = options.maxThreads ?? 15;
  const maxComments = options.maxComments ?? 100;
  const delayMs = options.delayMs ?? 500;
  const deadline = options.deadline ?? Infinity;

  async function searchPage(subreddit: string, query: string, cursor: string | null): Promise<CommentPage> {
    const params = new URLSearchParams({
      q: query,
      restrict_sr: '1',
      sort: 'new',
      limit: String(maxThreads),
      raw_json: '1',
    });
    if (cursor) params.set('after', cursor);

    const parsed = listingSchema.safeParse(await getJson(`/r/${subreddit}/search.json?${params.toString()}`, deadline));
    if (!parsed.success) {
      throw new Error(`Unexpected search payload for r/${subreddit}`);
    }

    const errors: string[] = [];
    const page: CommentPage = { items: [], next: parsed.data.data.after ?? null, malformed: 0, errors };
    for (const child of parsed.data.data.children) {
      if (Date.now() >= deadline) break;
      const thread = threadSchema.safeParse(child.data);
      if (child.kind !== 't3' || !thread.success) continue;

      // One failing thread never discards the comments already on the page.
      try {
        const comments = await fetchThread(`${PUBLIC_BASE}${thread.data.permalink}`, maxComments, deadline);
        page.items.push(...comments.items);
        page.malformed += comments.malformed;
      } catch (err) {
        if (err instanceof SourceUnavailableError) {
          console.warn(`    Skipped thread ${thread.data.permalink}: ${err.message}`);
        } else {
          const message = err instanceof Error ? err.message : String(err);
          console.warn(`    Failed thread ${thread.data.permalink}: ${message}`);
          errors.push(`${thread.data.permalink}: ${message}`);
        }
      }

      if (delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
    }

    return page;
  }

  return {
    name: 'reddit',
    fetch(target: SourceTarget, cursor: string | null): Promise<CommentPage> {
      return target.kind === 'thread'
        ? fetchThread(target.url, maxComments, deadline)
        : searchPage(target.subreddit, target.query, cursor);
    },
  };
}
