import { describe, it, expect } from 'vitest';
import { isMalformed, rankItems, scoreItem } from '../src/ranking/rank.js';
import { loadLexicon } from '../src/scoring/lexicon.js';
import type { RawItem } from '../src/scrapers/types.js';

const lexicon = loadLexicon();

function item(id: string, body: string, overrides: Partial<RawItem> = {}): RawItem {
  return {
    source: 'r/AI_Agents',
    comment_url: `https://www.reddit.com/r/AI_Agents/comments/t1/x/${id}/`,
    thread_url: 'https://www.reddit.com/r/AI_Agents/comments/t1/x/',
    thread_title: 'What are you charging?',
    author: `user_${id}`,
    body,
    ...overrides,
  };
}

const ECOMMERCE = 'I make $5k/month doing this, mostly for e-commerce clients using n8n';

describe('scoreItem', () => {
  it('scores a recurring, exact, currency-tagged revenue claim', () => {
    const record = scoreItem(item('a', ECOMMERCE), 0, lexicon);

    expect(record.breakdown).toEqual({ revenue: 52, market: 10, stack: 3, sentiment: 10, total: 75, overridden: false });
    expect(record.score).toBe(75);
    expect(record.mention).toMatchObject({ amount: 5000, currency_code: 'USD', recurrence: 'month', precision: 'exact' });
  });

  it('zeroes a failure story even when it carries an amount', () => {
    const record = scoreItem(item('b', 'we spent $200 on ads and never made a sale, total failure'), 0, lexicon);

    expect(record.breakdown.revenue).toBe(40);
    expect(record.breakdown.overridden).toBe(true);
    expect(record.score).toBe(0);
  });

  it('scores a revenue range on its upper bound at range precision', () => {
    const record = scoreItem(item('r', 'I make $5k-$10k/month building agents for dentists'), 0, lexicon);

    expect(record.mention).toMatchObject({ amount: 10000, precision: 'approximate_or_range', recurrence: 'month' });
    expect(record.breakdown.revenue).toBe(47);
    expect(record.score).toBe(67);
  });

  it('returns a frozen record', () => {
    const record = scoreItem(item('c', ECOMMERCE), 0, lexicon);

    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.signals)).toBe(true);
    expect(Object.isFrozen(record.signals.tools)).toBe(true);
  });
});

describe('score bounds', () => {
  it.each([
    ['almost nothing', '.'],
    ['a bare number', '3'],
    ['many tools', 'We bill $20k/mo for agents on n8n, zapier, langchain, crewai, autogen, openai, claude and flowise'],
    ['a failure with an amount', 'Spent $90,000 a year on this and it failed, no sales at all'],
    ['huge amounts', 'I make 999,999,999,999 dollars per week for dentists, profitable, paying customers'],
    ['a range and a word amount', 'we made five thousand to 10k a month helping realtors'],
    ['no numbers at all', 'How do I find clients for my agent agency?'],
  ])('keeps %s within 0-100 with revenue capped at 55', (_label, body) => {
    const scored = scoreItem(item('bounds', body), 0, lexicon);
    const { records } = rankItems([item('bounds', body)], { lexicon, allowNoNumbers: true });

    for (const record of [scored, ...records]) {
      expect(Number.isInteger(record.score)).toBe(true);
      expect(record.score).toBeGreaterThanOrEqual(0);
      expect(record.score).toBeLessThanOrEqual(100);
      expect(record.breakdown.revenue).toBeLessThanOrEqual(55);
    }
    expect(records).toHaveLength(1);
  });
});

describe('isMalformed', () => {
  it('flags blank bodies and broken encoding', () => {
    expect(isMalformed(item('d', '   '))).toBe(true);
    expect(isMalformed(item('e', 'made 300 \uFFFD'))).toBe(true);
    expect(isMalformed(item('f', 'made 300 \uD800 then'))).toBe(true);
    expect(isMalformed(item('g', 'made 300 😀'))).toBe(false);
  });
});

describe('rankItems', () => {
  const items = [
    item('once-1', 'Charged 300 once'),
    item('ecom', ECOMMERCE),
    item('thanks', 'Great post, thanks'),
    item('once-2', 'Charged 300 once'),
  ];

  it('sorts by score and keeps discovery order on ties', () => {
    const { records, stats } = rankItems(items, { lexicon });

    expect(records.map((r) => [r.author, r.score])).toEqual([
      ['user_ecom', 75],
      ['user_once-1', 35],
      ['user_once-2', 35],
    ]);
    expect(stats).toEqual({
      received: 4,
      malformed: 0,
      duplicates: 0,
      without_mention: 1,
      below_min_score: 0,
      kept: 3,
    });
  });

  it('keeps comments without numbers when asked, with no revenue points', () => {
    const { records } = rankItems(items, { lexicon, allowNoNumbers: true });

    expect(records).toHaveLength(4);
    expect(records[3].author).toBe('user_thanks');
    expect(records[3].breakdown.revenue).toBe(0);
  });

  it('drops records below the minimum score', () => {
    const { records, stats } = rankItems(items, { lexicon, minScore: 40 });

    expect(records.map((r) => r.author)).toEqual(['user_ecom']);
    expect(stats.below_min_score).toBe(2);
  });

  it('dedupes by comment URL, first occurrence wins', () => {
    const first = item('dup', 'Charged 300 once');
    const second = { ...item('dup', ECOMMERCE), author: 'someone_else' };

    const { records, stats } = rankItems([first, second], { lexicon });

    expect(records).toHaveLength(1);
    expect(records[0].author).toBe('user_dup');
    expect(records[0].score).toBe(35);
    expect(stats.duplicates).toBe(1);
  });

  it('counts and skips malformed items', () => {
    const { records, stats } = rankItems([item('blank', ''), item('ok', 'Charged 300 once')], { lexicon });

    expect(records).toHaveLength(1);
    expect(stats.malformed).toBe(1);
  });

  it('returns an empty ranking for an empty batch', () => {
    expect(rankItems([], { lexicon }).records).toEqual([]);
  });
});
