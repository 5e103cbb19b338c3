import type { RawItem } from '../scrapers/types.js';
import type { Lexicon } from '../scoring/lexicon.js';
import type { ScoredRecord } from '../scoring/types.js';
import { detectMentions } from '../scoring/numbers.js';
import { extractSignals } from '../scoring/signals.js';
import { aggregateScore, pickBestMention } from '../scoring/aggregate.js';

export interface RankOptions {
  lexicon: Lexicon;
  /** Keep items without any number; their revenue sub-score is 0. */
  allowNoNumbers?: boolean;
  minScore?: number;
}

export interface RankStats {
  received: number;
  malformed: number;
  duplicates: number;
  without_mention: number;
  below_min_score: number;
  kept: number;
}

export interface RankResult {
  records: ScoredRecord[];
  stats: RankStats;
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Bodies that cannot be scored: missing, blank, or carrying broken encoding. */
export function isMalformed(item: RawItem): boolean {
  if (typeof item.body !== 'string' || item.body.trim() === '') return true;
  if (typeof item.comment_url !== 'string' || item.comment_url === '') return true;
  return item.body.includes('\uFFFD') || LONE_SURROGATE.test(item.body);
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/** Score one item. Pure: no I/O, no shared state. */
export function scoreItem(item: RawItem, order: number, lexicon: Lexicon): ScoredRecord {
  const mentions = detectMentions(item.body, lexicon);
  const mention = pickBestMention(mentions);
  const signals = extractSignals(item, lexicon);
  const breakdown = aggregateScore(signals, mention);

  return deepFreeze({
    ...item,
    score: breakdown.total,
    order,
    mention,
    mentions,
    signals,
    breakdown,
  });
}

/**
 * Score a batch and return the qualifying records, highest score first.
 * Items are deduplicated by comment URL (first occurrence wins) and equal
 * scores keep their discovery order.
 */
export function rankItems(items: readonly RawItem[], options: RankOptions): RankResult {
  const stats: RankStats = {
    received: items.length,
    malformed: 0,
    duplicates: 0,
    without_mention: 0,
    below_min_score: 0,
    kept: 0,
  };
  const minScore = options.minScore ?? 0;
  const seen = new Set<string>();
  const candidates: Array<{ item: RawItem; order: number }> = [];

  for (const [order, item] of items.entries()) {
    if (isMalformed(item)) {
      stats.malformed++;
      continue;
    }
    if (seen.has(item.comment_url)) {
      stats.duplicates++;
      continue;
    }
    seen.add(item.comment_url);
    candidates.push({ item, order });
  }

  // Independent per item; ranking waits for the whole batch.
  const scored = candidates.map(({ item, order }) => scoreItem(item, order, options.lexicon));

  const records = scored.filter((record) => {
    if (!record.mention && !options.allowNoNumbers) {
      stats.without_mention++;
      return false;
    }
    if (record.score < minScore) {
      stats.below_min_score++;
      return false;
    }
    return true;
  });

  records.sort((a, b) => b.score - a.score || a.order - b.order);
  stats.kept = records.length;

  return { records, stats };
}
