const WORD_CHAR = /[\p{L}\p{N}]/u;

const cache = new Map<string, RegExp>();

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Regex source for a lexicon term. Word boundaries are only asserted on the
 * sides of the term that end in a letter or digit, so `/mo` matches inside
 * `$5k/mo` while `mo` does not match inside `month`.
 */
export function termPattern(term: string): string {
  const body = escapeRegExp(term).replace(/\s+/g, '\\s+');
  const head = WORD_CHAR.test(term.charAt(0)) ? '(?<![\\p{L}\\p{N}])' : '';
  const tail = WORD_CHAR.test(term.charAt(term.length - 1)) ? '(?![\\p{L}\\p{N}])' : '';
  return `${head}${body}${tail}`;
}

function termRegExp(term: string): RegExp {
  let re = cache.get(term);
  if (!re) {
    re = new RegExp(termPattern(term), 'giu');
    cache.set(term, re);
  }
  re.lastIndex = 0;
  return re;
}

export interface TermHit {
  term: string;
  start: number;
  end: number;
}

export function findTerm(text: string, term: string): TermHit[] {
  const hits: TermHit[] = [];
  for (const m of text.matchAll(termRegExp(term))) {
    const start = m.index ?? 0;
    hits.push({ term, start, end: start + m[0].length });
  }
  return hits;
}

export function containsTerm(text: string, term: string): boolean {
  return termRegExp(term).test(text);
}

/** First term of the list (in list order) present in the text. */
export function firstTerm(text: string, terms: readonly string[]): string | null {
  return terms.find((term) => containsTerm(text, term)) ?? null;
}
