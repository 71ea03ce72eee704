//NOTE(self): One JSON request against the GitHub REST API, mapped onto GitHubResult
//NOTE(self): Every adapter goes through here; nothing below throws for HTTP or network failures

import { getAuthHeaders, getAuth } from '@adapters/github/authenticate.js';
import type { GitHubResult } from '@adapters/github/types.js';
import { GITHUB_API } from '@common/config.js';
import { githubFetch, readErrorBody } from './rate-limit.js';

export interface GitHubRequest {
  method?: 'GET' | 'POST' | 'PATCH';
  //NOTE(self): Path below the API root, e.g. /repos/owner/repo/issues
  path: string;
  query?: Record<string, string | undefined>;
  body?: unknown;
  //NOTE(self): 'optional' lets public reads run unauthenticated at the lower rate limit
  auth?: 'required' | 'optional';
  //NOTE(self): Prefix for the error when GitHub sends no message, e.g. "Failed to create issue"
  failure: string;
}

const ANONYMOUS_HEADERS = { 'Accept': 'application/vnd.github.v3+json' };

export function buildUrl(path: string, query: Record<string, string | undefined> = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) params.set(key, value);
  }
  const qs = params.toString();
  return `${GITHUB_API}${path}${qs ? `?${qs}` : ''}`;
}

export async function githubRequest<T>(request: GitHubRequest): Promise<GitHubResult<T>> {
  const authenticated = getAuth() !== null;
  if (!authenticated && request.auth !== 'optional') {
    return { success: false, error: 'GitHub not authenticated' };
  }

  try {
    const response = await githubFetch(buildUrl(request.path, request.query), {
      method: request.method ?? 'GET',
      headers: authenticated ? getAuthHeaders() : ANONYMOUS_HEADERS,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
    });

    if (!response.ok) {
      const error = await readErrorBody(response);
      return {
        success: false,
        status: response.status,
        error: error.message || `${request.failure}: ${response.status}`,
      };
    }

    const data: T = await response.json();
    return { success: true, data };
  } catch (error) {
    return { success: false, error: String(error) };
  }
}
