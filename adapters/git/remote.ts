//NOTE(self): Infer owner/repo from the `origin` remote when no repository is configured
//NOTE(self): Handles git@github.com:owner/repo.git and https://github.com/owner/repo(.git)

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { GitHubRepoRef } from '@adapters/github/types.js';
import { logger } from '@modules/logger.js';

const execFileAsync = promisify(execFile);

export function parseRemoteUrl(url: string): GitHubRepoRef | null {
  const trimmed = url.trim();
  let path: string;

  if (trimmed.startsWith('git@')) {
    const separator = trimmed.indexOf(':');
    if (separator === -1) return null;
    path = trimmed.slice(separator + 1);
  } else if (trimmed.includes('github.com/')) {
    path = trimmed.split('github.com/')[1];
  } else {
    return null;
  }

  if (path.endsWith('.git')) {
    path = path.slice(0, -4);
  }

  const parts = path.replace(/^\/+|\/+$/g, '').split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) return null;
  return { owner: parts[0], repo: parts[1] };
}

//NOTE(self): Accepts the `owner/repo` form used in PLAN_TRACKER_REPO
export function parseRepoSlug(slug: string): GitHubRepoRef | null {
  const match = slug.trim().match(/^([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+)$/);
  return match ? { owner: match[1], repo: match[2] } : null;
}

export async function inferRepoFromOrigin(cwd?: string): Promise<GitHubRepoRef | null> {
  try {
    const { stdout } = await execFileAsync('git', ['remote', 'get-url', 'origin'], { cwd });
    return parseRemoteUrl(stdout);
  } catch (error) {
    logger.debug('Could not read origin remote', { error: String(error) });
    return null;
  }
}
