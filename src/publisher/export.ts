import { Feed } from 'feed';
import { stringify } from 'csv-stringify/sync';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import type { MonetaryMention, ScoredRecord } from '../scoring/types.js';

export const CSV_COLUMNS = ['source', 'thread_url', 'comment_url', 'author', 'post', 'score'] as const;

const DOCUMENT_TITLE = 'AI agents — revenue social proof (sorted by score)';
const FEED_LINK = 'https://www.reddit.com/r/AI_Agents/';

export interface ExportResult {
  files: string[];
  errors: string[];
}

const csvRowSchema = z.object({
  source: z.string(),
  thread_url: z.string(),
  comment_url: z.string(),
  author: z.string(),
  post: z.string(),
  score: z.coerce.number().int(),
});

export type CsvRow = z.infer<typeof csvRowSchema>;

function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function formatAmount(mention: MonetaryMention): string {
  const amount = Number.isInteger(mention.amount) ? String(mention.amount) : mention.amount.toFixed(2);
  const parts = [mention.currency_code ? `${amount} ${mention.currency_code}` : amount];
  if (mention.recurrence !== 'none') parts.push(`per ${mention.recurrence}`);
  parts.push(mention.precision === 'exact' ? 'exact' : 'approximate');
  return `${mention.text} (${parts.join(', ')})`;
}

export function toCsv(records: readonly ScoredRecord[]): string {
  return stringify(
    records.map((r) => ({
      source: r.source,
      thread_url: r.thread_url ?? '',
      comment_url: r.comment_url,
      author: r.author,
      post: r.body.trim(),
      score: r.score,
    })),
    { header: true, columns: [...CSV_COLUMNS] },
  );
}

/** Read back a CSV written by `toCsv`. */
export function parseCsvExport(csv: string): CsvRow[] {
  const rows: unknown = parse(csv, { columns: true, skip_empty_lines: true });
  const parsed = z.array(csvRowSchema).safeParse(rows);
  if (!parsed.success) {
    throw new Error(`Not a proofscout CSV export: ${parsed.error.issues[0]?.message ?? 'invalid rows'}`);
  }
  return parsed.data;
}

export function toMarkdown(records: readonly ScoredRecord[], date: Date, title = DOCUMENT_TITLE): string {
  let md = `# ${title}\n\n`;
  md += `_${formatDate(date)} — ${records.length} comments, highest score first._\n\n`;

  for (const [i, r] of records.entries()) {
    md += `## ${i + 1}. ${r.thread_title ?? r.source}\n\n`;
    md += `- **Score**: ${r.score}\n`;
    md += `- **Source**: ${r.source}\n`;
    if (r.thread_url) md += `- **Thread**: ${r.thread_url}\n`;
    md += `- **Comment**: ${r.comment_url}\n`;
    md += `- **Author**: ${r.author}\n`;
    if (r.mention) md += `- **Revenue**: ${formatAmount(r.mention)}\n`;
    if (r.signals.niche) md += `- **Market**: ${r.signals.niche}\n`;
    if (r.signals.tools.length > 0) md += `- **Tools**: ${r.signals.tools.join(', ')}\n`;
    md += `- **Sentiment**: ${r.signals.sentiment}\n\n`;

    const quoted = r.body.trim().split('\n').map((line) => `> ${line}`.trimEnd()).join('\n');
    md += `${quoted}\n\n---\n\n`;
  }

  return md;
}

export function toRssFeed(records: readonly ScoredRecord[], date: Date): string {
  const feed = new Feed({
    title: DOCUMENT_TITLE,
    description: 'Comments mentioning revenue from AI agents, ranked by heuristic score.',
    id: FEED_LINK,
    link: FEED_LINK,
    language: 'en',
    updated: date,
    generator: 'proofscout v0.1.0',
    copyright: 'Comment authors',
  });

  for (const r of records) {
    feed.addItem({
      title: `[${r.score}] ${r.thread_title ?? r.source} — ${r.author}`,
      id: r.comment_url,
      link: r.comment_url,
      description: r.body.trim(),
      date: r.published_at ? new Date(r.published_at) : date,
      category: [
        { name: r.source },
        { name: r.signals.sentiment },
      ],
    });
  }

  return feed.rss2();
}

/**
 * Write `<base>.csv`, `<base>.md` and `<base>.xml`, preserving the ranked order.
 */
export async function exportFiles(
  records: readonly ScoredRecord[],
  base: string,
  date?: Date,
): Promise<ExportResult> {
  const now = date ?? new Date();
  const files: string[] = [];
  const errors: string[] = [];

  try {
    await mkdir(dirname(base), { recursive: true });

    const outputs: Array<[string, string]> = [
      [`${base}.csv`, toCsv(records)],
      [`${base}.md`, toMarkdown(records, now)],
      [`${base}.xml`, toRssFeed(records, now)],
    ];

    for (const [path, content] of outputs) {
      await writeFile(path, content, 'utf-8');
      files.push(path);
    }
  } catch (err) {
    errors.push(`Export of ${basename(base)} failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  return { files, errors };
}
