import type { GitHubIssue, GitHubResult } from '@adapters/github/types.js';
import { githubRequest } from './request.js';

export interface GetIssueParams {
  owner: string;
  repo: string;
  issue_number: number;
}

export function getIssue(params: GetIssueParams): Promise<GitHubResult<GitHubIssue>> {
  return githubRequest<GitHubIssue>({
    path: `/repos/${params.owner}/${params.repo}/issues/${params.issue_number}`,
    failure: 'Failed to fetch issue',
  });
}
