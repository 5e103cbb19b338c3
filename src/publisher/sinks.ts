import type { ScoredRecord } from '../scoring/types.js';
import { upsertScoredRecords } from '../db/supabase.js';
import { SinkConfigError } from './config.js';
import { exportFiles } from './export.js';
import { attachFilesToNotion, pushToNotion } from './notion.js';
import { uploadFiles, type UploadTarget } from './upload.js';

/** What the sinks share: the ranked records plus whatever earlier sinks produced. */
export interface SinkContext {
  records: readonly ScoredRecord[];
  outBase: string;
  date: Date;
  files: string[];
  links: Record<string, string>;
}

export interface SinkReport {
  detail: string;
  errors: string[];
  skipped?: boolean;
}

export interface Sink {
  name: string;
  run(ctx: SinkContext): Promise<SinkReport>;
}

export type SinkStatus = 'ok' | 'skipped' | 'failed';

export interface SinkOutcome {
  sink: string;
  status: SinkStatus;
  detail: string;
  errors: string[];
}

export function fileSink(): Sink {
  return {
    name: 'files',
    async run(ctx) {
      const { files, errors } = await exportFiles(ctx.records, ctx.outBase, ctx.date);
      ctx.files.push(...files);
      return { detail: `${files.length} files written`, errors };
    },
  };
}

export function publishSink(target: UploadTarget): Sink {
  return {
    name: `publish:${target}`,
    async run(ctx) {
      if (ctx.files.length === 0) {
        return { detail: 'no exported files to publish', errors: [], skipped: true };
      }
      const { links, errors } = await uploadFiles(target, ctx.files);
      Object.assign(ctx.links, links);
      return { detail: `${Object.keys(links).length} public links`, errors };
    },
  };
}

export function notionDatabaseSink(delayMs?: number): Sink {
  return {
    name: 'notion-db',
    async run(ctx) {
      const { created, errors } = await pushToNotion(ctx.records, delayMs);
      return { detail: `${created}/${ctx.records.length} pages created`, errors };
    },
  };
}

export function notionFilesSink(): Sink {
  return {
    name: 'notion-files',
    async run(ctx) {
      const count = Object.keys(ctx.links).length;
      if (count === 0) {
        return { detail: 'no public links to attach (use --upload-target)', errors: [], skipped: true };
      }
      const { errors } = await attachFilesToNotion(ctx.links);
      return { detail: `${count} file blocks appended`, errors };
    },
  };
}

export function supabaseSink(): Sink {
  return {
    name: 'supabase',
    async run(ctx) {
      const { upserted, errors } = await upsertScoredRecords(ctx.records);
      return { detail: `${upserted} rows upserted`, errors };
    },
  };
}

/**
 * Run each enabled sink in order. A sink missing its configuration is
 * skipped with a warning; a failing sink is reported and the rest still run.
 */
export async function runSinks(sinks: Sink[], ctx: SinkContext): Promise<SinkOutcome[]> {
  const outcomes: SinkOutcome[] = [];

  for (const sink of sinks) {
    try {
      const report = await sink.run(ctx);
      const status: SinkStatus = report.errors.length > 0 ? 'failed' : report.skipped ? 'skipped' : 'ok';
      if (status === 'skipped') {
        console.warn(`  ${sink.name}: skipped, ${report.detail}`);
      } else {
        console.log(`  ${sink.name}: ${report.detail}`);
      }
      for (const err of report.errors) {
        console.error(`    ERROR (${sink.name}): ${err}`);
      }
      outcomes.push({ sink: sink.name, status, detail: report.detail, errors: report.errors });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (err instanceof SinkConfigError) {
        console.warn(`  ${sink.name}: skipped, ${message}`);
        outcomes.push({ sink: sink.name, status: 'skipped', detail: message, errors: [] });
      } else {
        console.error(`    ERROR (${sink.name}): ${message}`);
        outcomes.push({ sink: sink.name, status: 'failed', detail: message, errors: [message] });
      }
    }
  }

  return outcomes;
}
