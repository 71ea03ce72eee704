//NOTE(self): Issue search — GitHub matches the text against titles, bodies and comments
//NOTE(self): GET /search/issues?q=repo:owner/repo is:issue label:"x" "text"

import type { GitHubIssue, GitHubResult, GitHubSearchResult } from '@adapters/github/types.js';
import { GITHUB_PAGE_SIZE } from '@common/config.js';
import { githubRequest } from './request.js';

export interface SearchIssuesParams {
  owner: string;
  repo: string;
  text: string;
  labels?: string[];
}

export function buildSearchQuery(params: SearchIssuesParams): string {
  const terms = [`repo:${params.owner}/${params.repo}`, 'is:issue'];
  for (const label of params.labels ?? []) {
    terms.push(`label:"${label}"`);
  }
  terms.push(`"${params.text.replace(/"/g, '')}"`);
  return terms.join(' ');
}

export async function searchIssues(params: SearchIssuesParams): Promise<GitHubResult<GitHubIssue[]>> {
  const result = await githubRequest<GitHubSearchResult<GitHubIssue>>({
    path: '/search/issues',
    query: { q: buildSearchQuery(params), per_page: String(GITHUB_PAGE_SIZE) },
    failure: 'Failed to search issues',
  });
  return result.success ? { success: true, data: result.data.items } : result;
}
