import { describe, it, expect } from 'vitest';
import { parseRemoteUrl, parseRepoSlug } from '@adapters/git/remote.js';
import { isValidBranchName } from '@adapters/git/branch.js';

describe('parseRemoteUrl', () => {
  it.each([
    ['git@github.com:test-org/test-repo.git', { owner: 'test-org', repo: 'test-repo' }],
    ['https://github.com/test-org/test-repo.git', { owner: 'test-org', repo: 'test-repo' }],
    ['https://github.com/test-org/test-repo\n', { owner: 'test-org', repo: 'test-repo' }],
    ['https://gitlab.com/test-org/test-repo', null],
    ['https://github.com/test-org', null],
  ])('%j', (url, expected) => {
    expect(parseRemoteUrl(url)).toEqual(expected);
  });
});

describe('parseRepoSlug', () => {
  it('accepts owner/repo only', () => {
    expect(parseRepoSlug('test-org/test-repo')).toEqual({ owner: 'test-org', repo: 'test-repo' });
    expect(parseRepoSlug('test-org')).toBeNull();
    expect(parseRepoSlug('a/b/c')).toBeNull();
  });
});

describe('isValidBranchName', () => {
  it('accepts derived plan branches and rejects unsafe names', () => {
    expect(isValidBranchName('42-add-fft-support')).toBe(true);
    expect(isValidBranchName('-rf')).toBe(false);
    expect(isValidBranchName('a..b')).toBe(false);
    expect(isValidBranchName('a b')).toBe(false);
  });
});
