//NOTE(self): GET /repos/:owner/:repo/issues/:number/comments — first page only

import type { GitHubComment, GitHubResult } from '@adapters/github/types.js';
import { GITHUB_PAGE_SIZE } from '@common/config.js';
import { githubRequest } from './request.js';

export interface ListIssueCommentsParams {
  owner: string;
  repo: string;
  issue_number: number;
}

export function listIssueComments(params: ListIssueCommentsParams): Promise<GitHubResult<GitHubComment[]>> {
  return githubRequest<GitHubComment[]>({
    path: `/repos/${params.owner}/${params.repo}/issues/${params.issue_number}/comments`,
    query: { per_page: String(GITHUB_PAGE_SIZE) },
    failure: 'Failed to list comments',
  });
}
