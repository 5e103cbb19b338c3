import { createClient, SupabaseClient } from '@supabase/supabase-js';
import type { ScoredRecord } from '../scoring/types.js';
import { requireEnv } from '../publisher/config.js';

const TABLE = 'scored_comments';

let client: SupabaseClient | null = null;

export function getClient(): SupabaseClient {
  if (client) return client;

  const url = requireEnv('SUPABASE_URL');
  const key = requireEnv('SUPABASE_ANON_KEY');

  client = createClient(url, key);
  return client;
}

export function toRow(record: ScoredRecord, scrapedAt: string) {
  return {
    comment_url: record.comment_url,
    source: record.source,
    thread_url: record.thread_url ?? null,
    thread_title: record.thread_title ?? null,
    author: record.author,
    body: record.body,
    score: record.score,
    popularity: record.popularity ?? null,
    published_at: record.published_at ?? null,
    revenue_amount: record.mention?.amount ?? null,
    revenue_currency: record.mention?.currency_code ?? null,
    recurrence: record.mention?.recurrence ?? null,
    precision: record.mention?.precision ?? null,
    sentiment: record.signals.sentiment,
    niche: record.signals.niche,
    tools: [...record.signals.tools],
    scraped_at: scrapedAt,
  };
}

/** Upsert on comment_url, so re-running a search refreshes scores instead of duplicating rows. */
export async function upsertScoredRecords(records: readonly ScoredRecord[]): Promise<{ upserted: number; errors: string[] }> {
  const db = getClient();
  const errors: string[] = [];
  let upserted = 0;

  const scrapedAt = new Date().toISOString();
  const rows = records.map((r) => toRow(r, scrapedAt));

  // Upsert in chunks of 100
  for (let i = 0; i < rows.length; i += 100) {
    const chunk = rows.slice(i, i + 100);
    const { error, count } = await db
      .from(TABLE)
      .upsert(chunk, { onConflict: 'comment_url', count: 'exact' });

    if (error) {
      errors.push(`Upsert chunk ${i}: ${error.message}`);
    } else {
      upserted += count ?? chunk.length;
    }
  }

  return { upserted, errors };
}
