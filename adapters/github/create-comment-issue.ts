import type { GitHubComment, GitHubResult } from '@adapters/github/types.js';
import { githubRequest } from './request.js';

export interface CreateIssueCommentParams {
  owner: string;
  repo: string;
  issue_number: number;
  body: string;
}

export function createIssueComment(params: CreateIssueCommentParams): Promise<GitHubResult<GitHubComment>> {
  return githubRequest<GitHubComment>({
    method: 'POST',
    path: `/repos/${params.owner}/${params.repo}/issues/${params.issue_number}/comments`,
    body: { body: params.body },
    failure: 'Failed to create comment',
  });
}
