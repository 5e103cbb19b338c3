import type { ScoredRecord } from '../scoring/types.js';
import { requireEnv } from './config.js';

const NOTION_API = 'https://api.notion.com/v1';
const NOTION_VERSION = '2022-06-28';
const TITLE_LIMIT = 200;
const RICH_TEXT_LIMIT = 1900; // Notion caps a rich_text item at 2000 characters

function notionHeaders(apiKey: string): Record<string, string> {
  return {
    'Authorization': `Bearer ${apiKey}`,
    'Notion-Version': NOTION_VERSION,
    'Content-Type': 'application/json',
  };
}

function richText(content: string) {
  return { rich_text: [{ text: { content: content.slice(0, RICH_TEXT_LIMIT) } }] };
}

/** Database row for one record; `Name` is the title property every Notion database has. */
export function notionPagePayload(record: ScoredRecord, databaseId: string) {
  return {
    parent: { database_id: databaseId },
    properties: {
      'Name': { title: [{ text: { content: `${record.source} – ${record.author}`.slice(0, TITLE_LIMIT) } }] },
      'Source': richText(record.source),
      'Thread URL': { url: record.thread_url ?? null },
      'Comment URL': { url: record.comment_url },
      'Author': richText(record.author),
      'Score': { number: record.score },
      'Post': richText(record.body.trim()),
    },
  };
}

export async function pushToNotion(
  records: readonly ScoredRecord[],
  delayMs = 200,
): Promise<{ created: number; errors: string[] }> {
  const apiKey = requireEnv('NOTION_API_KEY');
  const databaseId = requireEnv('NOTION_DATABASE_ID');
  const errors: string[] = [];
  let created = 0;

  for (const record of records) {
    try {
      const res = await fetch(`${NOTION_API}/pages`, {
        method: 'POST',
        headers: notionHeaders(apiKey),
        body: JSON.stringify(notionPagePayload(record, databaseId)),
      });
      if (res.ok) {
        created++;
      } else {
        errors.push(`Notion push for ${record.comment_url} returned ${res.status}`);
      }
    } catch (err) {
      errors.push(`Notion push for ${record.comment_url}: ${err instanceof Error ? err.message : String(err)}`);
    }

    // Notion allows about three requests per second
    if (delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  return { created, errors };
}

/** Append one external file block per public link to NOTION_BLOCK_ID. */
export async function attachFilesToNotion(links: Record<string, string>): Promise<{ errors: string[] }> {
  const apiKey = requireEnv('NOTION_API_KEY');
  const blockId = requireEnv('NOTION_BLOCK_ID');

  const children = Object.entries(links).map(([name, url]) => ({
    object: 'block',
    type: 'file',
    file: {
      type: 'external',
      external: { url },
      caption: [{ type: 'text', text: { content: name } }],
    },
  }));

  const res = await fetch(`${NOTION_API}/blocks/${blockId}/children`, {
    method: 'PATCH',
    headers: notionHeaders(apiKey),
    body: JSON.stringify({ children }),
  });

  if (!res.ok) {
    return { errors: [`Notion file append returned ${res.status}`] };
  }
  return { errors: [] };
}
