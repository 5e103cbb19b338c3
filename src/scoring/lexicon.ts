import { readFileSync } from 'node:fs';
import { z } from 'zod';

const DEFAULT_LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

const termList = z.array(z.string().min(1));

const lexiconSchema = z.object({
  currency_symbols: z.record(z.string(), z.string()),
  currency_codes: z.record(z.string(), z.string()),
  magnitude_words: z.record(z.string(), z.number().positive()),
  number_words: z.record(z.string(), z.number().int().nonnegative()),
  recurrence: z.object({
    day: termList,
    week: termList,
    month: termList,
    year: termList,
    other: termList,
  }),
  approximate_qualifiers: termList,
  approximate_suffixes: termList,
  range_separators: termList,
  niche_pivots: termList,
  niche_stopwords: termList,
  client_nouns: termList,
  company_suffixes: termList,
  proper_noun_stopwords: termList,
  tools: termList,
  sentiment: z.object({
    failure: termList,
    success: termList,
    doubt: termList,
  }),
});

// Override files may name any subset of lists; nested groups are merged per key.
const lexiconOverrideSchema = lexiconSchema
  .extend({
    recurrence: lexiconSchema.shape.recurrence.partial(),
    sentiment: lexiconSchema.shape.sentiment.partial(),
  })
  .partial()
  .strict();

export type Lexicon = z.infer<typeof lexiconSchema>;
export type LexiconOverride = z.infer<typeof lexiconOverrideSchema>;

export class LexiconError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LexiconError';
  }
}

function readJson(path: string | URL): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new LexiconError(`Cannot read lexicon ${String(path)}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function mergeLexicon(base: Lexicon, override: LexiconOverride): Lexicon {
  const { recurrence, sentiment, ...lists } = override;
  return {
    ...base,
    ...lists,
    recurrence: { ...base.recurrence, ...recurrence },
    sentiment: { ...base.sentiment, ...sentiment },
  };
}

let defaultLexicon: Lexicon | null = null;

/**
 * Load the keyword tables the scoring engine runs on.
 *
 * The bundled `data/lexicon.json` is always the base; an override file
 * replaces whichever lists it names.
 */
export function loadLexicon(overridePath?: string): Lexicon {
  if (!defaultLexicon) {
    const parsed = lexiconSchema.safeParse(readJson(DEFAULT_LEXICON_URL));
    if (!parsed.success) {
      throw new LexiconError(`Bundled lexicon is invalid: ${describeIssues(parsed.error)}`);
    }
    defaultLexicon = parsed.data;
  }

  if (!overridePath) return defaultLexicon;

  const parsed = lexiconOverrideSchema.safeParse(readJson(overridePath));
  if (!parsed.success) {
    throw new LexiconError(`Lexicon ${overridePath} is invalid: ${describeIssues(parsed.error)}`);
  }
  return mergeLexicon(defaultLexicon, parsed.data);
}
