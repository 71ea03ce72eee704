import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('@modules/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { toPlanEntity, createGitHubPullRequestSource } from '@modules/tracker.js';
import type { GitHubIssue } from '@adapters/github/types.js';
import { _resetRateLimitForTesting } from '@adapters/github/rate-limit.js';

const fetchMock = vi.fn();

beforeEach(() => {
  _resetRateLimitForTesting();
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('toPlanEntity', () => {
  it('flattens labels and assignees and defaults a null body', () => {
    const issue: GitHubIssue = {
      id: 1,
      number: 42,
      title: 'Parent plan',
      body: null,
      state: 'open',
      user: { login: 'test-user', id: 1 },
      labels: [{ id: 1, name: 'plan:overview', color: '0052cc' }, { id: 2, name: 'status:planning', color: 'c5def5' }],
      assignees: [{ login: 'test-user', id: 1 }],
      html_url: 'https://github.com/test-org/test-repo/issues/42',
      created_at: '2024-05-01T12:00:00Z',
      updated_at: '2024-05-01T12:00:00Z',
      closed_at: null,
    };

    expect(toPlanEntity(issue)).toEqual({
      number: 42,
      title: 'Parent plan',
      body: '',
      labels: ['plan:overview', 'status:planning'],
      assignees: ['test-user'],
      state: 'open',
      url: 'https://github.com/test-org/test-repo/issues/42',
      createdAt: '2024-05-01T12:00:00Z',
      closedAt: null,
    });
  });
});

describe('createGitHubPullRequestSource', () => {
  const source = createGitHubPullRequestSource({ owner: 'conda-forge', repo: 'example-package-feedstock' });

  it('maps pull requests and reads checks on the head commit', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify([{
      id: 1,
      number: 12,
      title: 'example-package v1.4.0',
      state: 'open',
      user: { login: 'feedstock-bot', id: 2 },
      head: { ref: '1.4.0_h1', sha: 'abc123' },
      html_url: 'https://github.com/conda-forge/example-package-feedstock/pull/12',
      created_at: '2024-05-01T14:00:00Z',
      updated_at: '2024-05-01T14:00:00Z',
      merged_at: null,
      closed_at: null,
    }]), { status: 200 }));

    const prs = await source.listPullRequests('open');
    expect(prs).toEqual({
      success: true,
      data: [{
        number: 12,
        title: 'example-package v1.4.0',
        author: 'feedstock-bot',
        createdAt: '2024-05-01T14:00:00Z',
        url: 'https://github.com/conda-forge/example-package-feedstock/pull/12',
        mergedAt: null,
        headSha: 'abc123',
      }],
    });

    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({
      total_count: 1,
      check_runs: [{ id: 5, name: 'linux_64', status: 'completed', conclusion: 'success', html_url: null }],
    }), { status: 200 }));

    if (!prs.success) return;
    const checks = await source.getChecks(prs.data[0]);

    expect(checks).toEqual({ success: true, data: [{ name: 'linux_64', status: 'completed', conclusion: 'success' }] });
    expect(fetchMock.mock.calls[1][0]).toBe(
      'https://api.github.com/repos/conda-forge/example-package-feedstock/commits/abc123/check-runs?per_page=100'
    );
  });
});
