import type { GitHubIssue, GitHubResult } from '@adapters/github/types.js';
import { GITHUB_PAGE_SIZE } from '@common/config.js';
import { githubRequest } from './request.js';

export interface ListIssuesParams {
  owner: string;
  repo: string;
  state?: 'open' | 'closed' | 'all';
  //NOTE(self): GitHub ANDs the labels together
  labels?: string[];
  sort?: 'created' | 'updated' | 'comments';
  direction?: 'asc' | 'desc';
  per_page?: number;
}

export async function listIssues(params: ListIssuesParams): Promise<GitHubResult<GitHubIssue[]>> {
  const result = await githubRequest<GitHubIssue[]>({
    path: `/repos/${params.owner}/${params.repo}/issues`,
    query: {
      state: params.state,
      labels: params.labels?.length ? params.labels.join(',') : undefined,
      sort: params.sort,
      direction: params.direction,
      per_page: String(params.per_page ?? GITHUB_PAGE_SIZE),
    },
    failure: 'Failed to list issues',
  });

  //NOTE(self): The issues endpoint also returns pull requests — drop them
  return result.success
    ? { success: true, data: result.data.filter(issue => !issue.pull_request) }
    : result;
}
