import type { GitHubPullRequest, GitHubResult } from '@adapters/github/types.js';
import { GITHUB_PAGE_SIZE } from '@common/config.js';
import { githubRequest } from './request.js';

export interface ListPullRequestsParams {
  owner: string;
  repo: string;
  state?: 'open' | 'closed' | 'all';
  sort?: 'created' | 'updated' | 'popularity' | 'long-running';
  direction?: 'asc' | 'desc';
  per_page?: number;
}

//NOTE(self): Works without a token for public repos (lower rate limit)
export function listPullRequests(params: ListPullRequestsParams): Promise<GitHubResult<GitHubPullRequest[]>> {
  return githubRequest<GitHubPullRequest[]>({
    path: `/repos/${params.owner}/${params.repo}/pulls`,
    query: {
      state: params.state,
      sort: params.sort,
      direction: params.direction,
      per_page: String(params.per_page ?? GITHUB_PAGE_SIZE),
    },
    auth: 'optional',
    failure: 'Failed to list pull requests',
  });
}
