import { describe, it, expect } from 'vitest';
import { detectMentions, parseAmount } from '../src/scoring/numbers.js';
import { loadLexicon } from '../src/scoring/lexicon.js';

const lexicon = loadLexicon();

describe('detectMentions', () => {
  it('reads a symbol amount with a k suffix and a /month period', () => {
    const [mention, ...rest] = detectMentions('I make $5k/month doing this', lexicon);

    expect(rest).toHaveLength(0);
    expect(mention).toMatchObject({
      amount: 5000,
      currency: true,
      currency_code: 'USD',
      precision: 'exact',
      recurrence: 'month',
      text: '5k',
    });
  });

  it('attaches a trailing currency word and extends the mention text', () => {
    const [mention] = detectMentions('about 2,500 euros a month', lexicon);

    expect(mention).toMatchObject({
      amount: 2500,
      currency: true,
      currency_code: 'EUR',
      precision: 'approximate_or_range',
      recurrence: 'month',
      text: '2,500 euros',
      start: 6,
      end: 17,
    });
  });

  it('collapses a range into its upper bound', () => {
    const mentions = detectMentions('5-10k per month', lexicon);

    expect(mentions).toHaveLength(1);
    expect(mentions[0]).toMatchObject({
      amount: 10000,
      currency: false,
      currency_code: null,
      precision: 'approximate_or_range',
      recurrence: 'month',
      text: '5-10k',
    });
  });

  it.each([
    ['I make 5k-10k per month', 10000, '5k-10k'],
    ['$5k-$10k per month', 10000, '5k-$10k'],
    ['$5k to $10k per month', 10000, '5k to $10k'],
    ['between $5,000 - $8,000 a month', 8000, '5,000 - $8,000'],
  ])('reads "%s" as one range', (body, amount, text) => {
    const mentions = detectMentions(body, lexicon);

    expect(mentions).toHaveLength(1);
    expect(mentions[0]).toMatchObject({ amount, precision: 'approximate_or_range', recurrence: 'month', text });
  });

  it('keeps the currency of a range whose bounds both carry a symbol', () => {
    const [mention] = detectMentions('$5k-$10k per month', lexicon);
    expect(mention).toMatchObject({ currency: true, currency_code: 'USD' });
  });

  it('reads European thousands and decimal separators', () => {
    const [euros] = detectMentions('€3.000 par mois', lexicon);
    expect(euros).toMatchObject({ amount: 3000, currency_code: 'EUR', recurrence: 'month', text: '3.000' });

    const mentions = detectMentions('1,5k par mois', lexicon);
    expect(mentions).toHaveLength(1);
    expect(mentions[0]).toMatchObject({ amount: 1500, recurrence: 'month', text: '1,5k' });
  });

  it('evaluates number words', () => {
    const [mention] = detectMentions('we make seven hundred thousand dollars a year', lexicon);

    expect(mention).toMatchObject({
      amount: 700000,
      currency_code: 'USD',
      recurrence: 'year',
      precision: 'exact',
      text: 'seven hundred thousand dollars',
    });
  });

  it('reads "a grand" as 1000', () => {
    const [mention] = detectMentions('it cost me a grand', lexicon);
    expect(mention.amount).toBe(1000);
    expect(mention.text).toBe('a grand');
    expect(mention.currency).toBe(false);
  });

  it('treats a trailing "+" as approximate', () => {
    const [mention] = detectMentions('3k+ a week', lexicon);
    expect(mention).toMatchObject({ amount: 3000, precision: 'approximate_or_range', recurrence: 'week' });
  });

  it('keeps a decimal amount whole across the clause boundary check', () => {
    const [mention] = detectMentions('made 2.5k last month.', lexicon);
    expect(mention).toMatchObject({ amount: 2500, recurrence: 'month', text: '2.5k' });
  });

  it('returns every mention in text order, each with its nearest period', () => {
    const mentions = detectMentions('$500/mo now, $6k a year', lexicon);

    expect(mentions.map((m) => m.amount)).toEqual([500, 6000]);
    expect(mentions.map((m) => m.recurrence)).toEqual(['month', 'year']);
  });

  it('ignores digits inside product names', () => {
    expect(detectMentions('n8n and gpt-4', lexicon)).toEqual([]);
  });

  it('returns nothing for text without numbers', () => {
    expect(detectMentions('we never made a sale with this, total failure', lexicon)).toEqual([]);
  });
});

describe('parseAmount', () => {
  it.each([
    ['3.000', 3000],
    ['1,000.50', 1000.5],
    ['1.000,50', 1000.5],
    ['1,5', 1.5],
    ['2.5', 2.5],
    ['12,345,678', 12345678],
    ['400', 400],
  ])('parses %s', (raw, expected) => {
    expect(parseAmount(raw)).toBe(expected);
  });
});
