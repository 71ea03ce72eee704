import { config as dotenvConfig } from 'dotenv';
import type { GitHubRepoRef } from '@adapters/github/types.js';
import { parseRepoSlug, inferRepoFromOrigin } from '@adapters/git/remote.js';
import { setAuth, verifyAuth } from '@adapters/github/authenticate.js';
import { isLogLevel, type LogLevel } from '@modules/logger.js';
import { DEFAULT_ANTHROPIC_MODEL, DEFAULT_RELEASE_PACKAGE } from '@common/config.js';
import { PrerequisiteError } from '@common/errors.js';

dotenvConfig();

export interface Config {
  github: {
    token: string | null;
    //NOTE(self): null means "infer from the origin remote"
    repo: GitHubRepoRef | null;
  };
  release: {
    package: string;
    downstream: GitHubRepoRef;
  };
  anthropic: {
    apiKey: string | null;
    model: string;
  };
  logging: {
    level: LogLevel;
    dir: string | null;
  };
}

function optionalEnv(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function nullableEnv(key: string): string | null {
  const value = process.env[key];
  return value && value.trim() ? value.trim() : null;
}

function repoEnv(key: string, fallback: string | null): GitHubRepoRef | null {
  const raw = nullableEnv(key) ?? fallback;
  if (!raw) return null;
  const parsed = parseRepoSlug(raw);
  if (!parsed) {
    throw new PrerequisiteError(`${key} must look like owner/repo, got "${raw}"`);
  }
  return parsed;
}

export function loadConfig(): Config {
  const releasePackage = optionalEnv('RELEASE_PACKAGE', DEFAULT_RELEASE_PACKAGE);
  const level = optionalEnv('PLAN_TRACKER_LOG_LEVEL', 'info');

  const downstream = repoEnv('RELEASE_DOWNSTREAM_REPO', `conda-forge/${releasePackage}-feedstock`);
  if (!downstream) {
    throw new PrerequisiteError('RELEASE_DOWNSTREAM_REPO could not be resolved');
  }

  return {
    github: {
      token: nullableEnv('GITHUB_TOKEN') ?? nullableEnv('GH_TOKEN'),
      repo: repoEnv('PLAN_TRACKER_REPO', null),
    },
    release: {
      package: releasePackage,
      downstream,
    },
    anthropic: {
      apiKey: nullableEnv('ANTHROPIC_API_KEY'),
      model: optionalEnv('ANTHROPIC_MODEL', DEFAULT_ANTHROPIC_MODEL),
    },
    logging: {
      level: isLogLevel(level) ? level : 'info',
      dir: nullableEnv('PLAN_TRACKER_LOG_DIR'),
    },
  };
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

//NOTE(self): Prerequisite gate run before any other work: token present, token valid, repo known
export async function requireGitHub(config: Config): Promise<{ repo: GitHubRepoRef; username: string }> {
  if (!config.github.token) {
    throw new PrerequisiteError(
      'No GitHub token found. Set GITHUB_TOKEN (or GH_TOKEN) in the environment or .env file.'
    );
  }

  setAuth(config.github.token);
  const verified = await verifyAuth();
  if (!verified.success) {
    throw new PrerequisiteError(
      `GitHub authentication failed: ${verified.error}. Check that GITHUB_TOKEN is valid and has repo scope.`
    );
  }

  const repo = config.github.repo ?? await inferRepoFromOrigin();
  if (!repo) {
    throw new PrerequisiteError(
      'Could not determine the repository. Set PLAN_TRACKER_REPO=owner/repo or run inside a clone with a GitHub origin.'
    );
  }

  return { repo, username: verified.data.login };
}
