export { createRedditSource, SUBREDDITS, SEARCH_QUERIES } from './reddit.js';
export { collectItems, fetchFailed } from './collect.js';
export { SourceUnavailableError, SourceRequestError, describeTarget } from './types.js';
export type { RawItem, SourceTarget, CommentPage, CommentSource, CollectResult } from './types.js';
export type { RedditSourceOptions } from './reddit.js';
export type { CollectOptions } from './collect.js';
