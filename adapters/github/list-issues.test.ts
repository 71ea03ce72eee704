import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@modules/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { listIssues } from '@adapters/github/list-issues.js';
import { buildSearchQuery } from '@adapters/github/search-issues.js';
import { setAuth, clearAuth } from '@adapters/github/authenticate.js';
import { _resetRateLimitForTesting } from '@adapters/github/rate-limit.js';

const fetchMock = vi.fn();

function issue(number: number, extra: Record<string, unknown> = {}) {
  return {
    id: number,
    number,
    title: `Issue ${number}`,
    body: null,
    state: 'open',
    user: { login: 'test-user', id: 1 },
    labels: [{ id: 1, name: 'plan:overview', color: '0052cc' }],
    assignees: [],
    html_url: `https://github.com/test-org/test-repo/issues/${number}`,
    created_at: '2024-05-01T12:00:00Z',
    updated_at: '2024-05-01T12:00:00Z',
    closed_at: null,
    ...extra,
  };
}

beforeEach(() => {
  _resetRateLimitForTesting();
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
  setAuth('test-secret', 'test-user');
});

afterEach(() => {
  vi.unstubAllGlobals();
  clearAuth();
});

describe('listIssues', () => {
  it('filters by labels, asks for one full page and drops pull requests', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify([
      issue(1),
      issue(2, { pull_request: { url: 'https://api.github.com/repos/test-org/test-repo/pulls/2' } }),
    ]), { status: 200 }));

    const result = await listIssues({ owner: 'test-org', repo: 'test-repo', labels: ['plan:overview', 'status:blocked'], state: 'all' });

    expect(result.success && result.data.map(i => i.number)).toEqual([1]);
    const url = new URL(fetchMock.mock.calls[0][0]);
    expect(url.pathname).toBe('/repos/test-org/test-repo/issues');
    expect(url.searchParams.get('labels')).toBe('plan:overview,status:blocked');
    expect(url.searchParams.get('state')).toBe('all');
    expect(url.searchParams.get('per_page')).toBe('100');
  });

  it('surfaces the GitHub message on failure', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ message: 'Not Found' }), { status: 404 }));

    const result = await listIssues({ owner: 'test-org', repo: 'missing' });

    expect(result).toEqual({ success: false, status: 404, error: 'Not Found' });
  });
});

describe('buildSearchQuery', () => {
  it('scopes to the repository, issues and labels', () => {
    expect(buildSearchQuery({ owner: 'test-org', repo: 'test-repo', text: '#42', labels: ['plan:phase'] }))
      .toBe('repo:test-org/test-repo is:issue label:"plan:phase" "#42"');
  });
});
