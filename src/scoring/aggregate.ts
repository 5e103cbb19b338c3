import type { MonetaryMention, Recurrence, ScoreBreakdown, Sentiment, SignalSet } from './types.js';

export const REVENUE_CAP = 55;
export const MARKET_CAP = 20;
export const STACK_CAP = 15;
export const SENTIMENT_CAP = 10;

const MENTION_BASE = 25;
const CURRENCY_BONUS = 5;
const NICHE_POINTS = 10;
const CLIENT_POINTS = 10;
const POINTS_PER_TOOL = 3;

const RECURRENCE_POINTS: Record<Recurrence, number> = {
  week: 15,
  month: 12,
  day: 10,
  year: 8,
  other: 6,
  none: 0,
};

const SENTIMENT_POINTS: Record<Sentiment, number> = {
  success: 10,
  neutral: 5,
  none: 0,
  failure: 0,
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function revenuePoints(mention: MonetaryMention | null): number {
  if (!mention) return 0;
  const points =
    MENTION_BASE +
    RECURRENCE_POINTS[mention.recurrence] +
    (mention.precision === 'exact' ? 10 : 5) +
    (mention.currency ? CURRENCY_BONUS : 0);
  return Math.min(REVENUE_CAP, points);
}

export function marketPoints(signals: Pick<SignalSet, 'niche' | 'client'>): number {
  const points = (signals.niche !== null ? NICHE_POINTS : 0) + (signals.client ? CLIENT_POINTS : 0);
  return Math.min(MARKET_CAP, points);
}

export function stackPoints(tools: readonly string[]): number {
  return Math.min(STACK_CAP, POINTS_PER_TOOL * new Set(tools).size);
}

export function sentimentPoints(sentiment: Sentiment): number {
  return Math.min(SENTIMENT_CAP, SENTIMENT_POINTS[sentiment]);
}

/**
 * The most specific mention: highest revenue points, earliest on ties.
 * Duplicates are never summed.
 */
export function pickBestMention(mentions: readonly MonetaryMention[]): MonetaryMention | null {
  let best: MonetaryMention | null = null;
  for (const mention of mentions) {
    if (!best || revenuePoints(mention) > revenuePoints(best)) {
      best = mention;
    }
  }
  return best;
}

/**
 * Composite 0–100 score. Sub-scores are capped per category, the sum is
 * clamped, and a failure sentiment then forces the total to 0 whatever the
 * other categories earned.
 */
export function aggregateScore(signals: SignalSet, mention: MonetaryMention | null): ScoreBreakdown {
  const revenue = revenuePoints(mention);
  const market = marketPoints(signals);
  const stack = stackPoints(signals.tools);
  const sentiment = sentimentPoints(signals.sentiment);

  const sum = clamp(Math.round(revenue + market + stack + sentiment), 0, 100);
  const overridden = signals.sentiment === 'failure';

  return {
    revenue,
    market,
    stack,
    sentiment,
    total: overridden ? 0 : sum,
    overridden,
  };
}
