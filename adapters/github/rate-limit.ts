import { logger } from '@modules/logger.js';
import {
  GITHUB_MIN_SPACING_MS,
  GITHUB_LOW_BUDGET_THRESHOLD,
  GITHUB_MAX_RETRY_AFTER_S,
} from '@common/config.js';
import type { GitHubErrorBody } from '@adapters/github/types.js';

// Module-level singleton state
let rateLimitRemaining = 5000;
let rateLimitReset = 0;       // Unix epoch seconds
let lastRequestTime = 0;

function readRateLimitHeaders(response: Response): void {
  const remaining = response.headers.get('x-ratelimit-remaining');
  const reset = response.headers.get('x-ratelimit-reset');

  if (remaining !== null) rateLimitRemaining = parseInt(remaining, 10);
  if (reset !== null) rateLimitReset = parseInt(reset, 10);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function retryAfterSeconds(response: Response): number {
  const retryAfter = response.headers.get('retry-after');
  return retryAfter ? parseInt(retryAfter, 10) : 60;
}

async function retryOnce(url: string, options: RequestInit | undefined, retrySeconds: number): Promise<Response> {
  await sleep(retrySeconds * 1000);
  lastRequestTime = Date.now();
  const retryResponse = await fetch(url, options);
  readRateLimitHeaders(retryResponse);
  return retryResponse;
}

export async function githubFetch(url: string, options?: RequestInit): Promise<Response> {
  // Pre-request budget check
  if (rateLimitRemaining < GITHUB_LOW_BUDGET_THRESHOLD) {
    const resetDate = new Date(rateLimitReset * 1000);
    logger.warn('GitHub rate limit low, returning synthetic 503', {
      remaining: rateLimitRemaining,
      resetAt: resetDate.toISOString(),
    });
    return new Response(JSON.stringify({ message: 'Rate limit budget low, skipping request' }), {
      status: 503,
      statusText: 'Service Unavailable (rate limit budget low)',
      headers: { 'Content-Type': 'application/json' },
    });
  }

  // Minimum spacing between requests
  const elapsed = Date.now() - lastRequestTime;
  if (lastRequestTime > 0 && elapsed < GITHUB_MIN_SPACING_MS) {
    await sleep(GITHUB_MIN_SPACING_MS - elapsed);
  }
  lastRequestTime = Date.now();

  const response = await fetch(url, options);
  readRateLimitHeaders(response);

  // 429, or 403 with an exhausted budget: one short retry, otherwise hand back as-is
  const limited = response.status === 429 || (response.status === 403 && rateLimitRemaining === 0);
  if (limited) {
    const retrySeconds = retryAfterSeconds(response);
    if (retrySeconds <= GITHUB_MAX_RETRY_AFTER_S) {
      logger.warn('GitHub rate limited, short retry', { status: response.status, retrySeconds });
      return retryOnce(url, options, retrySeconds);
    }
    logger.warn('GitHub rate limited, retry-after too long, returning as-is', { status: response.status, retrySeconds });
  }

  return response;
}

//NOTE(self): Pull the `message` out of a GitHub error response, tolerating non-JSON bodies
export async function readErrorBody(response: Response): Promise<GitHubErrorBody> {
  try {
    const body: GitHubErrorBody = await response.json();
    return body;
  } catch {
    // non-JSON response (e.g. HTML 502)
    return {};
  }
}

export function _resetRateLimitForTesting(): void {
  rateLimitRemaining = 5000;
  rateLimitReset = 0;
  lastRequestTime = 0;
}
