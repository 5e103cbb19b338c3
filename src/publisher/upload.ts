import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { SinkConfigError, requireEnv } from './config.js';

export type UploadTarget = 'gist' | 'repo';

const GITHUB_API = 'https://api.github.com';

export interface UploadResult {
  links: Record<string, string>; // file name -> public raw URL
  errors: string[];
}

const gistSchema = z.object({
  files: z.record(z.string(), z.object({ raw_url: z.string().optional() })),
});

const contentSchema = z.object({ sha: z.string() });

function githubHeaders(token: string): Record<string, string> {
  return {
    'Authorization': `Bearer ${token}`,
    'Accept': 'application/vnd.github+json',
    'Content-Type': 'application/json',
    'User-Agent': 'proofscout/0.1.0',
  };
}

async function describeFailure(res: Response): Promise<string> {
  const text = await res.text().catch(() => '');
  return `${res.status}${text ? `: ${text.slice(0, 200)}` : ''}`;
}

/** One public Gist holding every file; returns the raw URL of each. */
export async function uploadToGist(paths: string[]): Promise<UploadResult> {
  const token = requireEnv('GITHUB_TOKEN', 'needed to create a Gist');
  const description = process.env.GIST_DESCRIPTION || 'proofscout exports';

  const files: Record<string, { content: string }> = {};
  for (const path of paths) {
    files[basename(path)] = { content: await readFile(path, 'utf-8') };
  }

  const res = await fetch(`${GITHUB_API}/gists`, {
    method: 'POST',
    headers: githubHeaders(token),
    body: JSON.stringify({ description, public: true, files }),
  });

  if (!res.ok) {
    return { links: {}, errors: [`Gist create failed ${await describeFailure(res)}`] };
  }

  const parsed = gistSchema.safeParse(await res.json());
  if (!parsed.success) {
    return { links: {}, errors: ['Gist create returned an unexpected payload'] };
  }

  const links: Record<string, string> = {};
  for (const [name, meta] of Object.entries(parsed.data.files)) {
    if (meta.raw_url) links[name] = meta.raw_url;
  }
  return { links, errors: [] };
}

/** Create or update each file under GITHUB_PATH_PREFIX on GITHUB_BRANCH of GITHUB_REPO. */
export async function uploadToRepo(paths: string[]): Promise<UploadResult> {
  const token = requireEnv('GITHUB_TOKEN', 'needed to push to a repository');
  const repoSlug = requireEnv('GITHUB_REPO', 'owner/repo');
  const [owner, repo, ...rest] = repoSlug.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new SinkConfigError(`GITHUB_REPO must look like owner/repo, got "${repoSlug}"`);
  }
  const branch = process.env.GITHUB_BRANCH || 'main';
  const prefix = (process.env.GITHUB_PATH_PREFIX ?? 'scraping').replace(/^\/+|\/+$/g, '');

  const links: Record<string, string> = {};
  const errors: string[] = [];

  for (const path of paths) {
    const name = basename(path);
    const repoPath = prefix ? `${prefix}/${name}` : name;
    const url = `${GITHUB_API}/repos/${owner}/${repo}/contents/${repoPath}`;

    try {
      // Updating an existing file requires its current sha.
      let sha: string | undefined;
      const existing = await fetch(`${url}?ref=${encodeURIComponent(branch)}`, { headers: githubHeaders(token) });
      if (existing.ok) {
        const parsed = contentSchema.safeParse(await existing.json());
        if (parsed.success) sha = parsed.data.sha;
      }

      const content = (await readFile(path)).toString('base64');
      const res = await fetch(url, {
        method: 'PUT',
        headers: githubHeaders(token),
        body: JSON.stringify({ message: `Upload ${name} from proofscout`, content, branch, sha }),
      });

      if (!res.ok) {
        errors.push(`Repo upload failed for ${repoPath} ${await describeFailure(res)}`);
        continue;
      }
      links[name] = `https://raw.githubusercontent.com/${owner}/${repo}/${branch}/${repoPath}`;
    } catch (err) {
      errors.push(`Repo upload failed for ${repoPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return { links, errors };
}

export function uploadFiles(target: UploadTarget, paths: string[]): Promise<UploadResult> {
  return target === 'gist' ? uploadToGist(paths) : uploadToRepo(paths);
}
