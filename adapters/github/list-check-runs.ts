//NOTE(self): Check runs for a commit — used to report CI state of a pull request head
//NOTE(self): GET /repos/:owner/:repo/commits/:ref/check-runs

import type { GitHubCheckRun, GitHubResult } from '@adapters/github/types.js';
import { GITHUB_PAGE_SIZE } from '@common/config.js';
import { githubRequest } from './request.js';

export interface ListCheckRunsParams {
  owner: string;
  repo: string;
  ref: string;
}

export async function listCheckRuns(params: ListCheckRunsParams): Promise<GitHubResult<GitHubCheckRun[]>> {
  const result = await githubRequest<{ total_count: number; check_runs: GitHubCheckRun[] }>({
    path: `/repos/${params.owner}/${params.repo}/commits/${params.ref}/check-runs`,
    query: { per_page: String(GITHUB_PAGE_SIZE) },
    auth: 'optional',
    failure: 'Failed to list check runs',
  });
  return result.success ? { success: true, data: result.data.check_runs } : result;
}
