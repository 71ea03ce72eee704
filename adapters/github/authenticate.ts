import type { GitHubAuth, GitHubResult, GitHubUser } from '@adapters/github/types.js';
import { GITHUB_API, GITHUB_API_VERSION } from '@common/config.js';
import { logger } from '@modules/logger.js';

let currentAuth: GitHubAuth | null = null;

export function setAuth(token: string, username: string | null = null): void {
  currentAuth = { token, username };
}

export function getAuth(): GitHubAuth | null {
  return currentAuth;
}

export function getAuthHeaders(): Record<string, string> {
  if (!currentAuth) {
    throw new Error('GitHub not authenticated');
  }
  return {
    'Authorization': `Bearer ${currentAuth.token}`,
    'Accept': 'application/vnd.github.v3+json',
    'Content-Type': 'application/json',
    'X-GitHub-Api-Version': GITHUB_API_VERSION,
  };
}

export function clearAuth(): void {
  currentAuth = null;
}

//NOTE(self): Confirms the token works and records the login it belongs to
export async function verifyAuth(): Promise<GitHubResult<GitHubUser>> {
  if (!currentAuth) {
    return { success: false, error: 'GitHub not authenticated' };
  }

  try {
    const response = await fetch(`${GITHUB_API}/user`, {
      headers: getAuthHeaders(),
    });

    if (!response.ok) {
      return {
        success: false,
        status: response.status,
        error: `GitHub rejected the token (${response.status})`,
      };
    }

    const user: GitHubUser = await response.json();
    currentAuth = { ...currentAuth, username: user.login };
    return { success: true, data: user };
  } catch (e) {
    logger.debug('GitHub auth verification failed', { error: String(e) });
    return { success: false, error: String(e) };
  }
}
