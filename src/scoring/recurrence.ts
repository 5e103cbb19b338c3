import type { Lexicon } from './lexicon.js';
import type { Precision, Recurrence } from './types.js';
import { findTerm, termPattern } from './terms.js';

/** Characters inspected on each side of a mention, within its clause. */
export const CLAUSE_REACH = 40;
/** Characters before a mention searched for "about", "~", "up to"... */
export const QUALIFIER_REACH = 20;

const PERIODS = ['day', 'week', 'month', 'year', 'other'] as const;

// A period ends a clause only when followed by whitespace, so "2.5k" and "make.com" stay whole.
const CLAUSE_BOUNDARY = /[!?;\n]|\.(?=\s|$)/g;

export interface ClauseWindow {
  before: string;
  after: string;
}

export function clauseWindow(text: string, start: number, end: number): ClauseWindow {
  let from = Math.max(0, start - CLAUSE_REACH);
  let to = Math.min(text.length, end + CLAUSE_REACH);

  for (const m of text.matchAll(CLAUSE_BOUNDARY)) {
    const at = m.index ?? 0;
    if (at < start) {
      from = Math.max(from, at + 1);
    } else if (at >= end) {
      to = Math.min(to, at);
      break;
    }
  }

  return { before: text.slice(from, start), after: text.slice(end, to) };
}

/**
 * Period the amount is tied to. Every recurrence term found in the window is
 * a candidate; the one closest to the mention wins, text after the mention
 * winning ties ("$500/mo, $6k a year" → month for $500).
 */
export function classifyRecurrence(window: ClauseWindow, lexicon: Lexicon): Recurrence {
  let best: Recurrence = 'none';
  let bestDistance = Infinity;

  for (const period of PERIODS) {
    for (const term of lexicon.recurrence[period]) {
      for (const hit of findTerm(window.after, term)) {
        if (hit.start < bestDistance) {
          best = period;
          bestDistance = hit.start;
        }
      }
      for (const hit of findTerm(window.before, term)) {
        // Half a character behind, so a term after the mention wins at equal distance.
        const distance = window.before.length - hit.end + 0.5;
        if (distance < bestDistance) {
          best = period;
          bestDistance = distance;
        }
      }
    }
  }

  return best;
}

export function classifyPrecision(window: ClauseWindow, isRange: boolean, lexicon: Lexicon): Precision {
  if (isRange) return 'approximate_or_range';

  const lead = window.before.slice(-QUALIFIER_REACH);
  if (lexicon.approximate_qualifiers.some((term) => findTerm(lead, term).length > 0)) {
    return 'approximate_or_range';
  }

  const trail = window.after.replace(/^\s+/, '');
  for (const suffix of lexicon.approximate_suffixes) {
    if (new RegExp(`^${termPattern(suffix)}`, 'iu').test(trail)) {
      return 'approximate_or_range';
    }
  }

  return 'exact';
}
