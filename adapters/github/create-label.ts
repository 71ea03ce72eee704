//NOTE(self): Create a repository label
//NOTE(self): POST /repos/:owner/:repo/labels — a 422 `already_exists` is success, not a duplicate

import { getAuthHeaders, getAuth } from '@adapters/github/authenticate.js';
import type { GitHubErrorBody, GitHubResult } from '@adapters/github/types.js';
import { githubFetch, readErrorBody } from './rate-limit.js';
import { buildUrl } from './request.js';

export interface CreateLabelParams {
  owner: string;
  repo: string;
  name: string;
  color: string;
  description?: string;
}

export type CreateLabelOutcome = 'created' | 'existing';

export function isAlreadyExists(status: number, body: GitHubErrorBody): boolean {
  return status === 422 && (body.errors ?? []).some(e => e.code === 'already_exists');
}

export async function createLabel(
  params: CreateLabelParams
): Promise<GitHubResult<CreateLabelOutcome>> {
  const auth = getAuth();
  if (!auth) {
    return { success: false, error: 'GitHub not authenticated' };
  }

  try {
    const response = await githubFetch(
      buildUrl(`/repos/${params.owner}/${params.repo}/labels`),
      {
        method: 'POST',
        headers: getAuthHeaders(),
        body: JSON.stringify({
          name: params.name,
          color: params.color,
          description: params.description,
        }),
      }
    );

    if (response.ok) {
      return { success: true, data: 'created' };
    }

    const error = await readErrorBody(response);
    if (isAlreadyExists(response.status, error)) {
      return { success: true, data: 'existing' };
    }

    return {
      success: false,
      status: response.status,
      error: error.message || `Failed to create label: ${response.status}`,
    };
  } catch (error) {
    return { success: false, error: String(error) };
  }
}
