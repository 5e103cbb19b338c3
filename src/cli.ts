import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import { resolve } from 'node:path';
import { createRedditSource, collectItems, fetchFailed, SUBREDDITS, SEARCH_QUERIES } from './scrapers/index.js';
import type { SourceTarget } from './scrapers/index.js';
import { loadLexicon, LexiconError, type Lexicon } from './scoring/lexicon.js';
import { rankItems } from './ranking/rank.js';
import { formatAmount } from './publisher/export.js';
import type { UploadTarget } from './publisher/upload.js';
import {
  fileSink,
  notionDatabaseSink,
  notionFilesSink,
  publishSink,
  runSinks,
  supabaseSink,
  type Sink,
} from './publisher/sinks.js';

interface RunOptions {
  minScore?: number;
  allowNoNumbers?: boolean;
  out: string;
  maxItems?: number;
  timeout?: number;
  lexicon?: string;
  files: boolean;
  uploadTarget?: UploadTarget;
  notion?: boolean;
  notionFiles?: boolean;
  supabase?: boolean;
  top: number;
}

interface SearchOptions extends RunOptions {
  subreddit: string[];
  query: string[];
  maxThreads: number;
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return n;
}

function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive number of seconds.');
  }
  return n;
}

function withRunOptions(command: Command): Command {
  return command
    .option('--min-score <n>', 'Drop records scoring below this', parseCount)
    .option('--allow-no-numbers', 'Keep comments without any number (revenue scores 0)')
    .option('--out <basename>', 'Base name of the exported files', 'proofscout')
    .option('--max-items <n>', 'Stop collecting after this many comments', parseCount)
    .option('--timeout <seconds>', 'Overall deadline for collecting', parseSeconds)
    .option('--lexicon <file>', 'JSON file overriding keyword lists (or PROOFSCOUT_LEXICON)')
    .option('--no-files', 'Do not write CSV/Markdown/RSS files')
    .addOption(new Option('--upload-target <target>', 'Publish exported files').choices(['gist', 'repo']))
    .option('--notion', 'Create one page per record in NOTION_DATABASE_ID')
    .option('--notion-files', 'Append links to the published files under NOTION_BLOCK_ID')
    .option('--supabase', 'Upsert records into the scored_comments table')
    .option('--top <n>', 'Records to print', parseCount, 10);
}

function isUploadTarget(value: string | undefined): value is UploadTarget {
  return value === 'gist' || value === 'repo';
}

function buildSinks(opts: RunOptions): Sink[] {
  const sinks: Sink[] = [];
  if (opts.files) sinks.push(fileSink());
  if (isUploadTarget(opts.uploadTarget)) sinks.push(publishSink(opts.uploadTarget));
  if (opts.notion) sinks.push(notionDatabaseSink());
  if (opts.notionFiles) sinks.push(notionFilesSink());
  if (opts.supabase) sinks.push(supabaseSink());
  return sinks;
}

async function run(targets: SourceTarget[], opts: RunOptions, maxThreads?: number): Promise<void> {
  const start = Date.now();

  let lexicon: Lexicon;
  try {
    lexicon = loadLexicon(opts.lexicon ?? process.env.PROOFSCOUT_LEXICON);
  } catch (err) {
    if (err instanceof LexiconError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const deadline = opts.timeout !== undefined ? start + opts.timeout * 1000 : undefined;

  console.log(`Collecting comments from ${targets.length} target(s)...`);
  const source = createRedditSource({ maxThreads, deadline });
  const collected = await collectItems(source, targets, { maxItems: opts.maxItems, deadline });

  for (const err of collected.errors) {
    console.error(`    ERROR: ${err}`);
  }

  const { records, stats } = rankItems(collected.items, {
    lexicon,
    allowNoNumbers: opts.allowNoNumbers,
    minScore: opts.minScore,
  });

  console.log(
    `\nScored ${stats.received} comments: ${stats.kept} kept, ` +
      `${stats.without_mention} without a number, ${stats.below_min_score} below min score, ` +
      `${stats.duplicates} duplicates, ${stats.malformed + collected.malformed} malformed`,
  );

  if (records.length > 0 && opts.top > 0) {
    console.log('\nTop records:');
    for (const record of records.slice(0, opts.top)) {
      const revenue = record.mention ? formatAmount(record.mention) : 'no amount';
      console.log(`  [${record.score}] ${record.source} — ${record.author}: ${revenue}`);
      console.log(`    ${record.comment_url}`);
    }
  }

  const sinks = buildSinks(opts);
  let failedSinks = 0;
  if (sinks.length > 0) {
    console.log('\nExporting...');
    const outcomes = await runSinks(sinks, {
      records,
      outBase: resolve(opts.out),
      date: new Date(),
      files: [],
      links: {},
    });
    failedSinks = outcomes.filter((o) => o.status === 'failed').length;
  }

  const elapsed = ((Date.now() - start) / 1000).toFixed(1);
  console.log(
    `\nDone in ${elapsed}s: ${collected.items.length} collected, ${records.length} ranked, ` +
      `${collected.skipped.length} skipped, ${collected.errors.length} errors, ${failedSinks} failed sinks`,
  );

  // Partial collection is still success; nothing at all with errors is not.
  if (fetchFailed(collected, targets.length) || failedSinks > 0) {
    process.exit(1);
  }
}

const program = new Command();

program
  .name('proofscout')
  .description('Find comments that put a number on AI agent revenue, score and rank them')
  .version('0.1.0');

withRunOptions(
  program
    .command('thread <url>')
    .description('Score every comment of one Reddit thread'),
).action(async (url: string, opts: RunOptions) => {
  await run([{ kind: 'thread', url }], opts);
});

withRunOptions(
  program
    .command('search')
    .description('Search subreddits for threads and score their comments')
    .option('--subreddit <names...>', 'Subreddits to search', SUBREDDITS)
    .option('--query <queries...>', 'Search queries', SEARCH_QUERIES)
    .option('--max-threads <n>', 'Threads per search page', parseCount, 15),
).action(async (opts: SearchOptions) => {
  const targets: SourceTarget[] = [];
  for (const subreddit of opts.subreddit) {
    for (const query of opts.query) {
      targets.push({ kind: 'search', subreddit, query });
    }
  }
  await run(targets, opts, opts.maxThreads);
});

await program.parseAsync();
