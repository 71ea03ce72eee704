import { getAuth } from '@adapters/github/authenticate.js';
import type { GitHubIssue, GitHubResult } from '@adapters/github/types.js';
import { githubRequest } from './request.js';

export interface CreateIssueParams {
  owner: string;
  repo: string;
  title: string;
  body?: string;
  labels?: string[];
  assignees?: string[];
}

//NOTE(self): Plan entities are always self-assigned — default to the authenticated user
export function resolveAssignees(requested: string[] | undefined, username: string | null): string[] {
  if (requested && requested.length > 0) return requested;
  return username ? [username] : [];
}

export function createIssue(params: CreateIssueParams): Promise<GitHubResult<GitHubIssue>> {
  return githubRequest<GitHubIssue>({
    method: 'POST',
    path: `/repos/${params.owner}/${params.repo}/issues`,
    body: {
      title: params.title,
      body: params.body,
      labels: params.labels,
      assignees: resolveAssignees(params.assignees, getAuth()?.username ?? null),
    },
    failure: 'Failed to create issue',
  });
}
