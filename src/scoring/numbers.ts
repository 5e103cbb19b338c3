import type { Lexicon } from './lexicon.js';
import type { MonetaryMention } from './types.js';
import { classifyPrecision, classifyRecurrence, clauseWindow } from './recurrence.js';
import { escapeRegExp } from './terms.js';

interface AmountSpan {
  amount: number;
  start: number;
  end: number;
  currency_code: string | null;
  currency: boolean;
  range: boolean;
}

interface WordToken {
  word: string;
  start: number;
  end: number;
}

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
  b: 1_000_000_000,
};

const WORD_SEPARATOR = /^(?:\s+|\s*-\s*)$/;

interface Patterns {
  amount: RegExp;
  symbolBefore: RegExp;
  codeBefore: RegExp;
  currencyAfter: RegExp;
  rangeBetween: RegExp;
  currencyToken: RegExp;
}

const patternCache = new WeakMap<Lexicon, Patterns>();

function alternation(terms: string[]): string {
  // Longest first so "million" is tried before "m".
  return [...terms].sort((a, b) => b.length - a.length).map(escapeRegExp).join('|');
}

function patternsFor(lexicon: Lexicon): Patterns {
  const cached = patternCache.get(lexicon);
  if (cached) return cached;

  const magnitudes = alternation(Object.keys(lexicon.magnitude_words));
  const symbols = alternation(Object.keys(lexicon.currency_symbols));
  const codes = alternation(Object.keys(lexicon.currency_codes));
  const separators = alternation(lexicon.range_separators);

  const patterns: Patterns = {
    // Digits glued to a letter ("n8n") or a "letter-" prefix ("gpt-4") are product names, not amounts.
    // A suffixed bound before the hyphen ("5k-10k") is not a prefix.
    amount: new RegExp(
      String.raw`(?<![\p{L}\p{N}_.,])(?:(?<!\p{L}-)|(?<=\p{N}[kmb]-))` +
        String.raw`(\d{1,3}(?:[.,]\d{3})+(?:[.,]\d+)?|\d+(?:[.,]\d+)?)` +
        String.raw`(?:([kmb])(?![\p{L}\p{N}])|\s*(${magnitudes})(?![\p{L}\p{N}]))?(?!\p{N})`,
      'giu',
    ),
    symbolBefore: new RegExp(`(${symbols})\\s?$`, 'u'),
    codeBefore: new RegExp(`(?<![\\p{L}\\p{N}])(${codes})\\s?$`, 'iu'),
    currencyAfter: new RegExp(`^\\s?(${symbols}|${codes})(?![\\p{L}\\p{N}])`, 'iu'),
    rangeBetween: new RegExp(`^\\s*(?:${separators})\\s*$`, 'iu'),
    currencyToken: new RegExp(`${symbols}|(?<![\\p{L}\\p{N}])(?:${codes})(?![\\p{L}\\p{N}])`, 'giu'),
  };
  patternCache.set(lexicon, patterns);
  return patterns;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * "3.000" and "1,000.50" group thousands; "1,5" and "2.5" are decimals.
 * Only the last separator decides: three digits after it make it a grouping.
 */
export function parseAmount(raw: string): number {
  const last = Math.max(raw.lastIndexOf('.'), raw.lastIndexOf(','));
  if (last < 0) return Number.parseFloat(raw);

  const whole = raw.slice(0, last).replace(/[.,]/g, '');
  const tail = raw.slice(last + 1);
  return Number.parseFloat(tail.length === 3 ? `${whole}${tail}` : `${whole}.${tail}`);
}

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

function currencyCode(lexicon: Lexicon, token: string): string | null {
  return lookup(lexicon.currency_symbols, token) ?? lookup(lexicon.currency_codes, token.toLowerCase()) ?? null;
}

/** Attach a currency found right before or right after the amount. */
function withCurrency(text: string, span: AmountSpan, lexicon: Lexicon): AmountSpan {
  const patterns = patternsFor(lexicon);
  const lead = text.slice(Math.max(0, span.start - 8), span.start);
  const before = patterns.symbolBefore.exec(lead) ?? patterns.codeBefore.exec(lead);
  if (before) {
    return { ...span, currency: true, currency_code: currencyCode(lexicon, before[1]) };
  }

  const after = patterns.currencyAfter.exec(text.slice(span.end));
  if (after) {
    return {
      ...span,
      end: span.end + after[0].length,
      currency: true,
      currency_code: currencyCode(lexicon, after[1]),
    };
  }

  return span;
}

function digitAmounts(text: string, lexicon: Lexicon): AmountSpan[] {
  const spans: AmountSpan[] = [];

  for (const m of text.matchAll(patternsFor(lexicon).amount)) {
    const start = m.index ?? 0;
    let amount = parseAmount(m[1]);
    if (!Number.isFinite(amount)) continue;

    if (m[2]) {
      amount *= lookup(SUFFIX_MULTIPLIERS, m[2].toLowerCase()) ?? 1;
    } else if (m[3]) {
      amount *= lookup(lexicon.magnitude_words, m[3].toLowerCase()) ?? 1;
    }

    spans.push({
      amount,
      start,
      end: start + m[0].length,
      currency: false,
      currency_code: null,
      range: false,
    });
  }

  return spans;
}

/**
 * Evaluate one run of number words, e.g. "seven hundred thousand".
 * Units add up, "hundred" multiplies the pending group, larger scales close it.
 */
function evaluateWords(words: string[], lexicon: Lexicon): number {
  let total = 0;
  let current = 0;

  for (const word of words) {
    const unit = lookup(lexicon.number_words, word);
    if (unit !== undefined) {
      current += unit;
    } else if (word === 'a') {
      current = 1;
    } else if (word === 'hundred') {
      current = (current || 1) * 100;
    } else {
      const scale = lookup(lexicon.magnitude_words, word);
      if (scale !== undefined) {
        total += (current || 1) * scale;
        current = 0;
      }
    }
  }

  return total + current;
}

function wordAmounts(text: string, lexicon: Lexicon): AmountSpan[] {
  const tokens: WordToken[] = [];
  for (const m of text.matchAll(/\p{L}+/gu)) {
    const start = m.index ?? 0;
    tokens.push({ word: m[0].toLowerCase(), start, end: start + m[0].length });
  }

  const isUnit = (t: WordToken | undefined) => t !== undefined && lookup(lexicon.number_words, t.word) !== undefined;
  const isScale = (t: WordToken | undefined) =>
    t !== undefined && (t.word === 'hundred' || lookup(lexicon.magnitude_words, t.word) !== undefined);

  const spans: AmountSpan[] = [];
  let i = 0;

  while (i < tokens.length) {
    const first = tokens[i];
    const run: WordToken[] = [];

    if (isUnit(first) || (first.word === 'a' && isScale(tokens[i + 1]))) {
      run.push(first);
      let j = i + 1;
      while (j < tokens.length) {
        const prev = run[run.length - 1];
        const tok = tokens[j];
        if (!WORD_SEPARATOR.test(text.slice(prev.end, tok.start))) break;

        if (isUnit(tok) || isScale(tok)) {
          run.push(tok);
        } else if (tok.word === 'and' && isScale(prev) && isUnit(tokens[j + 1])) {
          run.push(tok);
        } else {
          break;
        }
        j++;
      }
    }

    if (run.length === 0) {
      i++;
      continue;
    }
    const consumed = run.length;
    if (run[run.length - 1].word === 'and') run.pop();

    const last = run[run.length - 1];
    spans.push({
      amount: evaluateWords(run.map((t) => t.word), lexicon),
      start: first.start,
      end: last.end,
      currency: false,
      currency_code: null,
      range: false,
    });
    i += consumed;
  }

  return spans;
}

/** Collapse "5-10k" / "$5k to $10k" into one span carrying the upper bound. */
function mergeRanges(text: string, spans: AmountSpan[], lexicon: Lexicon): AmountSpan[] {
  const { rangeBetween, currencyToken } = patternsFor(lexicon);
  const merged: AmountSpan[] = [];

  for (const span of spans) {
    const prev = merged[merged.length - 1];
    // The upper bound's own currency sits between the two numbers.
    const between = prev && span.start >= prev.end ? text.slice(prev.end, span.start).replace(currencyToken, '') : null;
    if (prev && !prev.range && between !== null && rangeBetween.test(between)) {
      merged[merged.length - 1] = {
        amount: Math.max(prev.amount, span.amount),
        start: prev.start,
        end: span.end,
        currency: prev.currency || span.currency,
        currency_code: prev.currency_code ?? span.currency_code,
        range: true,
      };
    } else {
      merged.push(span);
    }
  }

  return merged;
}

/**
 * Find every monetary-looking amount in the text, in text order.
 *
 * Currency is optional: a bare "3 clients" is still a mention, only a less
 * specific one. Text without digits or number words yields no mentions.
 */
export function detectMentions(text: string, lexicon: Lexicon): MonetaryMention[] {
  const spans = [...digitAmounts(text, lexicon), ...wordAmounts(text, lexicon)]
    .map((span) => withCurrency(text, span, lexicon))
    .sort((a, b) => a.start - b.start);

  return mergeRanges(text, spans, lexicon).map((span) => {
    const window = clauseWindow(text, span.start, span.end);
    return {
      amount: round2(span.amount),
      currency: span.currency,
      currency_code: span.currency_code,
      precision: classifyPrecision(window, span.range, lexicon),
      recurrence: classifyRecurrence(window, lexicon),
      text: text.slice(span.start, span.end),
      start: span.start,
      end: span.end,
    };
  });
}
