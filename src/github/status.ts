import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

import { z } from 'zod';

import type { FetchLike } from '../catalog/client.js';
import type { RunReport } from '../schema/index.js';
import { countFailures } from '../report/reporter.js';

const API_URL = 'https://api.github.com';

// ── Schemas ──────────────────────────────────────────────────

export const commitStateSchema = z.enum(['error', 'failure', 'pending', 'success']);

export type CommitState = z.infer<typeof commitStateSchema>;

const pullRequestSchema = z.object({
  statuses_url: z.string().url(),
});

export const repositorySchema = z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected OWNER/NAME');

// ── Public types ─────────────────────────────────────────────

export interface CommitStatusRequest {
  repository: string;
  pr: number;
  state: CommitState;
  context?: string | undefined;
  description?: string | undefined;
  targetUrl?: string | undefined;
}

export class GitHubError extends Error {
  readonly status: number;

  constructor(what: string, status: number, body: string) {
    super(`GitHub API error (${String(status)}) while ${what}: ${body}`);
    this.name = 'GitHubError';
    this.status = status;
  }
}

// ── Status ───────────────────────────────────────────────────

/** Set a commit status on the head commit of a pull request. */
export async function setCommitStatus(
  request: CommitStatusRequest,
  token: string,
  fetchImpl: FetchLike = fetch,
): Promise<void> {
  const repository = repositorySchema.parse(request.repository);
  const headers = {
    Authorization: `bearer ${token}`,
    Accept: 'application/vnd.github.v3+json',
  };

  const prResponse = await fetchImpl(`${API_URL}/repos/${repository}/pulls/${String(request.pr)}`, {
    headers,
  });
  if (!prResponse.ok) {
    throw new GitHubError(`fetching PR #${String(request.pr)}`, prResponse.status, await prResponse.text());
  }
  const pr = pullRequestSchema.parse(await prResponse.json());

  const body: Record<string, string> = { state: request.state };
  if (request.context !== undefined) body.context = request.context;
  if (request.description !== undefined) body.description = request.description;
  if (request.targetUrl !== undefined) body.target_url = request.targetUrl;

  const statusResponse = await fetchImpl(pr.statuses_url, {
    method: 'POST',
    headers: { ...headers, 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
  if (!statusResponse.ok) {
    throw new GitHubError('posting the commit status', statusResponse.status, await statusResponse.text());
  }
}

/** `success` when every step of every collection succeeded. */
export function statusStateFor(report: RunReport): CommitState {
  return countFailures(report) === 0 ? 'success' : 'failure';
}

// ── Token ────────────────────────────────────────────────────

export type GitConfigReader = (key: string) => Promise<string | undefined>;

export const readGitConfig: GitConfigReader = async (key) => {
  try {
    const { stdout } = await promisify(execFile)('git', ['config', key]);
    const value = stdout.trim();
    return value.length > 0 ? value : undefined;
  } catch {
    // `git config` exits 1 when the key is unset.
    return undefined;
  }
};

export async function resolveGitHubToken(
  env: NodeJS.ProcessEnv,
  readConfig: GitConfigReader = readGitConfig,
): Promise<string> {
  const fromEnv = env.GITHUB_TOKEN;
  if (fromEnv !== undefined && fromEnv.length > 0) return fromEnv;

  const fromGit = await readConfig('hub.oauthtoken');
  if (fromGit !== undefined) return fromGit;

  throw new Error(
    'GitHub OAuth token not set. Set via GITHUB_TOKEN environment variable or hub.oauthtoken Git config option.',
  );
}
