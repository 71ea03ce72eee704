//NOTE(self): The collaborators every plan operation talks to, behind small interfaces
//NOTE(self): GitHub implementations live here; tests swap in the in-memory fakes from tracker.fake.ts

import type { GitHubIssue, GitHubComment, GitHubRepoRef, GitHubResult } from '@adapters/github/types.js';
import { createIssue } from '@adapters/github/create-issue.js';
import { createLabel, type CreateLabelOutcome } from '@adapters/github/create-label.js';
import { createIssueComment } from '@adapters/github/create-comment-issue.js';
import { listIssueComments } from '@adapters/github/list-issue-comments.js';
import { listIssues } from '@adapters/github/list-issues.js';
import { getIssue } from '@adapters/github/get-issue.js';
import { searchIssues } from '@adapters/github/search-issues.js';
import { listPullRequests } from '@adapters/github/list-pull-requests.js';
import { listCheckRuns } from '@adapters/github/list-check-runs.js';
import { createOrSwitchBranch, type BranchOutcome, type GitResult } from '@adapters/git/branch.js';
import type { LabelDefinition } from '@common/taxonomy.js';

// ─── Tracker ────────────────────────────────────────────────────────────────

export interface PlanEntity {
  number: number;
  title: string;
  body: string;
  labels: string[];
  assignees: string[];
  state: 'open' | 'closed';
  url: string;
  createdAt: string;
  closedAt: string | null;
}

export interface EntityComment {
  id: number;
  body: string;
  createdAt: string;
}

export interface NewEntity {
  title: string;
  body: string;
  labels: string[];
}

export type EntityState = 'open' | 'closed' | 'all';

export interface Tracker {
  readonly repo: GitHubRepoRef;
  createEntity(entity: NewEntity): Promise<GitHubResult<PlanEntity>>;
  createLabel(label: LabelDefinition): Promise<GitHubResult<CreateLabelOutcome>>;
  addComment(entityNumber: number, body: string): Promise<GitHubResult<EntityComment>>;
  listComments(entityNumber: number): Promise<GitHubResult<EntityComment[]>>;
  listEntities(labels: string[], state?: EntityState): Promise<GitHubResult<PlanEntity[]>>;
  searchEntities(text: string, labels?: string[]): Promise<GitHubResult<PlanEntity[]>>;
  getEntity(entityNumber: number): Promise<GitHubResult<PlanEntity>>;
}

export function toPlanEntity(issue: GitHubIssue): PlanEntity {
  return {
    number: issue.number,
    title: issue.title,
    body: issue.body ?? '',
    labels: issue.labels.map(l => l.name),
    assignees: issue.assignees.map(a => a.login),
    state: issue.state,
    url: issue.html_url,
    createdAt: issue.created_at,
    closedAt: issue.closed_at,
  };
}

function toEntityComment(comment: GitHubComment): EntityComment {
  return { id: comment.id, body: comment.body, createdAt: comment.created_at };
}

function mapResult<A, B>(result: GitHubResult<A>, fn: (value: A) => B): GitHubResult<B> {
  return result.success ? { success: true, data: fn(result.data) } : result;
}

export function createGitHubTracker(repo: GitHubRepoRef): Tracker {
  const { owner, repo: name } = repo;

  return {
    repo,

    async createEntity(entity) {
      const result = await createIssue({ owner, repo: name, ...entity });
      return mapResult(result, toPlanEntity);
    },

    createLabel(label) {
      return createLabel({
        owner,
        repo: name,
        name: label.name,
        color: label.color,
        description: label.description,
      });
    },

    async addComment(entityNumber, body) {
      const result = await createIssueComment({ owner, repo: name, issue_number: entityNumber, body });
      return mapResult(result, toEntityComment);
    },

    async listComments(entityNumber) {
      const result = await listIssueComments({ owner, repo: name, issue_number: entityNumber });
      return mapResult(result, comments => comments.map(toEntityComment));
    },

    async listEntities(labels, state = 'all') {
      const result = await listIssues({ owner, repo: name, labels, state, sort: 'created', direction: 'desc' });
      return mapResult(result, issues => issues.map(toPlanEntity));
    },

    async searchEntities(text, labels) {
      const result = await searchIssues({ owner, repo: name, text, labels });
      return mapResult(result, issues => issues.map(toPlanEntity));
    },

    async getEntity(entityNumber) {
      const result = await getIssue({ owner, repo: name, issue_number: entityNumber });
      return mapResult(result, toPlanEntity);
    },
  };
}

// ─── Version control ────────────────────────────────────────────────────────

export interface VersionControl {
  createOrSwitchBranch(name: string): Promise<GitResult<BranchOutcome>>;
}

export function createGitVersionControl(cwd?: string): VersionControl {
  return {
    createOrSwitchBranch: name => createOrSwitchBranch(name, cwd),
  };
}

// ─── Downstream repository ──────────────────────────────────────────────────

export interface DownstreamPullRequest {
  number: number;
  title: string;
  author: string;
  createdAt: string;
  url: string;
  mergedAt: string | null;
  headSha: string;
}

export interface CheckSummary {
  name: string;
  status: string;
  conclusion: string | null;
}

export interface PullRequestSource {
  readonly repo: GitHubRepoRef;
  listPullRequests(state: 'open' | 'closed'): Promise<GitHubResult<DownstreamPullRequest[]>>;
  getChecks(pullRequest: DownstreamPullRequest): Promise<GitHubResult<CheckSummary[]>>;
}

export function createGitHubPullRequestSource(repo: GitHubRepoRef): PullRequestSource {
  const { owner, repo: name } = repo;

  return {
    repo,

    async listPullRequests(state) {
      const result = await listPullRequests({ owner, repo: name, state, sort: 'created', direction: 'desc' });
      return mapResult(result, prs => prs.map(pr => ({
        number: pr.number,
        title: pr.title,
        author: pr.user.login,
        createdAt: pr.created_at,
        url: pr.html_url,
        mergedAt: pr.merged_at,
        headSha: pr.head.sha,
      })));
    },

    async getChecks(pullRequest) {
      const result = await listCheckRuns({ owner, repo: name, ref: pullRequest.headSha });
      return mapResult(result, runs => runs.map(run => ({
        name: run.name,
        status: run.status,
        conclusion: run.conclusion,
      })));
    },
  };
}
