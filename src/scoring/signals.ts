import type { RawItem } from '../scrapers/types.js';
import type { Lexicon } from './lexicon.js';
import type { Sentiment, SignalSet } from './types.js';
import { containsTerm, escapeRegExp, firstTerm, termPattern } from './terms.js';

const NICHE_MAX_WORDS = 12;
const CLIENT_REACH = 3; // tokens between a client noun and a proper noun

interface Token {
  text: string;
  start: number;
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const m of text.matchAll(/[\p{L}\p{N}]+(?:['’&-][\p{L}\p{N}]+)*/gu)) {
    tokens.push({ text: m[0], start: m.index ?? 0 });
  }
  return tokens;
}

function startsSentence(text: string, start: number): boolean {
  const before = text.slice(0, start).replace(/["'“(\s]+$/u, '');
  return before === '' || /[.!?:\n]$/.test(before);
}

/**
 * Purpose clause introduced by a pivot ("for dentists", "to help realtors").
 * Returns up to twelve words following the pivot, cut at the first punctuation.
 */
export function findNiche(text: string, lexicon: Lexicon): string | null {
  const flat = text.replace(/\s+/g, ' ');
  const stopwords = new Set(lexicon.niche_stopwords.map((w) => w.toLowerCase()));

  for (const pivot of lexicon.niche_pivots) {
    const re = new RegExp(`${termPattern(pivot)}\\s+(\\p{L}[\\p{L}\\p{N}&'-]*)`, 'giu');
    for (const m of flat.matchAll(re)) {
      const word = m[1];
      if (stopwords.has(word.toLowerCase())) continue;

      const from = (m.index ?? 0) + m[0].length - word.length;
      const words = flat.slice(from).split(' ').slice(0, NICHE_MAX_WORDS).join(' ');
      const snippet = words.split(/[.?!;:()[\]{}|\/\\]/)[0].trim();
      if (snippet) return snippet;
    }
  }

  return null;
}

/**
 * Explicit client context: a client, role or company noun within a few words
 * of a capitalized proper noun ("founder of Acme", "clients like Shopify
 * stores"), or a company name carrying a legal suffix ("Acme Inc").
 */
export function hasClientContext(text: string, lexicon: Lexicon): boolean {
  const suffixes = lexicon.company_suffixes.map(escapeRegExp).join('|');
  const company = new RegExp(`(?<![\\p{L}\\p{N}])\\p{Lu}[\\p{L}\\p{N}&-]+\\s+(?:${suffixes})(?![\\p{L}\\p{N}])`, 'u');
  if (company.test(text)) return true;

  const nouns = new Set(lexicon.client_nouns.map((w) => w.toLowerCase()));
  const stopwords = new Set(lexicon.proper_noun_stopwords);
  const tools = new Set(lexicon.tools.map((t) => t.toLowerCase()));

  const tokens = tokenize(text);
  const proper = tokens.map(
    (t) =>
      t.text.length >= 2 &&
      /^\p{Lu}/u.test(t.text) &&
      !stopwords.has(t.text) &&
      !tools.has(t.text.toLowerCase()) &&
      !startsSentence(text, t.start),
  );

  for (const [i, token] of tokens.entries()) {
    if (!nouns.has(token.text.toLowerCase())) continue;
    const lo = Math.max(0, i - CLIENT_REACH);
    const hi = Math.min(tokens.length - 1, i + CLIENT_REACH);
    for (let j = lo; j <= hi; j++) {
      if (j !== i && proper[j]) return true;
    }
  }

  return false;
}

/** Distinct tool names from the lexicon, in lexicon order. */
export function findTools(text: string, lexicon: Lexicon): string[] {
  return [...new Set(lexicon.tools.filter((tool) => containsTerm(text, tool)))];
}

/** Failure short-circuits; then success; then any hedging reads as neutral. */
export function classifySentiment(text: string, lexicon: Lexicon): Sentiment {
  if (firstTerm(text, lexicon.sentiment.failure)) return 'failure';
  if (firstTerm(text, lexicon.sentiment.success)) return 'success';
  if (firstTerm(text, lexicon.sentiment.doubt)) return 'neutral';
  return 'none';
}

export function extractSignals(item: Pick<RawItem, 'body' | 'thread_title'>, lexicon: Lexicon): SignalSet {
  const niche = findNiche(item.body, lexicon);
  const client = hasClientContext(item.body, lexicon);
  const stackText = item.thread_title ? `${item.body}\n${item.thread_title}` : item.body;

  return {
    niche,
    client,
    market: niche !== null || client,
    tools: findTools(stackText, lexicon),
    sentiment: classifySentiment(item.body, lexicon),
  };
}
