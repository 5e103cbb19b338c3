import type { RawItem } from '../scrapers/types.js';

export type Recurrence = 'day' | 'week' | 'month' | 'year' | 'other' | 'none';
export type Precision = 'exact' | 'approximate_or_range';
export type Sentiment = 'success' | 'neutral' | 'failure' | 'none';

export interface MonetaryMention {
  amount: number;
  currency: boolean;
  currency_code: string | null;
  precision: Precision;
  recurrence: Recurrence;
  text: string;
  start: number;
  end: number;
}

export interface SignalSet {
  niche: string | null; // purpose clause snippet, e.g. "e-commerce clients"
  client: boolean;
  market: boolean;
  tools: string[];
  sentiment: Sentiment;
}

export interface ScoreBreakdown {
  revenue: number;
  market: number;
  stack: number;
  sentiment: number;
  total: number;
  overridden: boolean; // failure sentiment forced total to 0
}

export interface ScoredRecord extends Readonly<RawItem> {
  readonly score: number;
  readonly order: number; // discovery index
  readonly mention: Readonly<MonetaryMention> | null;
  readonly mentions: readonly Readonly<MonetaryMention>[];
  readonly signals: Readonly<SignalSet>;
  readonly breakdown: Readonly<ScoreBreakdown>;
}
