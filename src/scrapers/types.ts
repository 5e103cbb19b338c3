export interface RawItem {
  source: string; // e.g. "r/SaaS"
  comment_url: string;
  thread_url?: string;
  thread_title?: string;
  author: string;
  body: string;
  popularity?: number; // upvotes, tie-break metadata only
  published_at?: string; // ISO 8601
}

export type SourceTarget =
  | { kind: 'thread'; url: string }
  | { kind: 'search'; subreddit: string; query: string };

export interface CommentPage {
  items: RawItem[];
  next: string | null; // null = done
  malformed: number;
  errors?: string[]; // parts of the page that failed; the rest is kept
}

export interface CommentSource {
  name: string;
  fetch(target: SourceTarget, cursor: string | null): Promise<CommentPage>;
}

export interface CollectResult {
  items: RawItem[];
  errors: string[];
  skipped: string[];
  malformed: number;
}

/** The source refuses the target (forbidden or not found); skip it, never retry. */
export class SourceUnavailableError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'SourceUnavailableError';
    this.status = status;
  }
}

/** Transient failure (network, rate limit, server error); worth retrying. */
export class SourceRequestError extends Error {
  readonly status: number | null;

  constructor(status: number | null, message: string) {
    super(message);
    this.name = 'SourceRequestError';
    this.status = status;
  }
}

export function describeTarget(target: SourceTarget): string {
  return target.kind === 'thread'
    ? target.url
    : `r/${target.subreddit} "${target.query}"`;
}
