//NOTE(self): In-memory stand-ins for the tracker, git and the downstream repository
//NOTE(self): Shared by the module tests — same interfaces, no network

import type { GitHubRepoRef, GitHubResult } from '@adapters/github/types.js';
import type { BranchOutcome, GitResult } from '@adapters/git/branch.js';
import type {
  Tracker,
  PlanEntity,
  EntityComment,
  NewEntity,
  EntityState,
  VersionControl,
  PullRequestSource,
  DownstreamPullRequest,
  CheckSummary,
} from '@modules/tracker.js';
import type { LabelDefinition } from '@common/taxonomy.js';

export interface FakeTrackerOptions {
  repo?: GitHubRepoRef;
  username?: string;
  now?: () => Date;
}

export class FakeTracker implements Tracker {
  readonly repo: GitHubRepoRef;
  readonly labels = new Map<string, LabelDefinition>();
  readonly entities = new Map<number, PlanEntity>();
  readonly comments = new Map<number, EntityComment[]>();
  readonly calls: string[] = [];

  //NOTE(self): Failure injection — titles or entity numbers that reject the next write
  readonly failCreateTitles = new Set<string>();
  readonly failCommentOn = new Set<number>();
  readonly failLabels = new Set<string>();

  private nextNumber = 1;
  private nextCommentId = 1000;
  private readonly username: string;
  private readonly now: () => Date;

  constructor(options: FakeTrackerOptions = {}) {
    this.repo = options.repo ?? { owner: 'test-org', repo: 'test-repo' };
    this.username = options.username ?? 'test-user';
    this.now = options.now ?? (() => new Date('2024-05-01T12:00:00Z'));
  }

  //NOTE(self): Seed an entity with a fixed number (advances the counter past it)
  seed(entity: Partial<PlanEntity> & { number: number; title: string }): PlanEntity {
    const seeded: PlanEntity = {
      body: '',
      labels: [],
      assignees: [this.username],
      state: 'open',
      url: `https://github.com/${this.repo.owner}/${this.repo.repo}/issues/${entity.number}`,
      createdAt: this.now().toISOString(),
      closedAt: null,
      ...entity,
    };
    this.entities.set(seeded.number, seeded);
    this.nextNumber = Math.max(this.nextNumber, seeded.number + 1);
    return seeded;
  }

  seedComment(entityNumber: number, body: string): EntityComment {
    const comment: EntityComment = { id: this.nextCommentId++, body, createdAt: this.now().toISOString() };
    this.comments.set(entityNumber, [...(this.comments.get(entityNumber) ?? []), comment]);
    return comment;
  }

  entitiesWithLabel(label: string): PlanEntity[] {
    return [...this.entities.values()].filter(e => e.labels.includes(label));
  }

  commentsOn(entityNumber: number): EntityComment[] {
    return this.comments.get(entityNumber) ?? [];
  }

  async createEntity(entity: NewEntity): Promise<GitHubResult<PlanEntity>> {
    this.calls.push(`createEntity:${entity.title}`);
    if (this.failCreateTitles.has(entity.title)) {
      return { success: false, status: 500, error: `Failed to create issue: ${entity.title}` };
    }
    return { success: true, data: this.seed({ number: this.nextNumber, ...entity }) };
  }

  async createLabel(label: LabelDefinition): Promise<GitHubResult<'created' | 'existing'>> {
    this.calls.push(`createLabel:${label.name}`);
    if (this.failLabels.has(label.name)) {
      return { success: false, status: 403, error: 'Resource not accessible by integration' };
    }
    if (this.labels.has(label.name)) {
      return { success: true, data: 'existing' };
    }
    this.labels.set(label.name, label);
    return { success: true, data: 'created' };
  }

  async addComment(entityNumber: number, body: string): Promise<GitHubResult<EntityComment>> {
    this.calls.push(`addComment:${entityNumber}`);
    if (this.failCommentOn.has(entityNumber) || !this.entities.has(entityNumber)) {
      return { success: false, status: 404, error: `Failed to create comment on #${entityNumber}` };
    }
    return { success: true, data: this.seedComment(entityNumber, body) };
  }

  async listComments(entityNumber: number): Promise<GitHubResult<EntityComment[]>> {
    this.calls.push(`listComments:${entityNumber}`);
    return { success: true, data: this.commentsOn(entityNumber) };
  }

  async listEntities(labels: string[], state: EntityState = 'all'): Promise<GitHubResult<PlanEntity[]>> {
    this.calls.push(`listEntities:${labels.join(',')}`);
    const matches = [...this.entities.values()]
      .filter(e => labels.every(l => e.labels.includes(l)))
      .filter(e => state === 'all' || e.state === state)
      .sort((a, b) => b.number - a.number);
    return { success: true, data: matches };
  }

  async searchEntities(text: string, labels: string[] = []): Promise<GitHubResult<PlanEntity[]>> {
    this.calls.push(`searchEntities:${text}`);
    const needle = text.toLowerCase();
    const matches = [...this.entities.values()]
      .filter(e => labels.every(l => e.labels.includes(l)))
      .filter(e =>
        e.title.toLowerCase().includes(needle) ||
        e.body.toLowerCase().includes(needle) ||
        this.commentsOn(e.number).some(c => c.body.toLowerCase().includes(needle))
      );
    return { success: true, data: matches };
  }

  async getEntity(entityNumber: number): Promise<GitHubResult<PlanEntity>> {
    this.calls.push(`getEntity:${entityNumber}`);
    const entity = this.entities.get(entityNumber);
    return entity
      ? { success: true, data: entity }
      : { success: false, status: 404, error: 'Not Found' };
  }
}

export class FakeVersionControl implements VersionControl {
  readonly branches = new Set<string>();
  current: string | null = null;
  fail = false;

  async createOrSwitchBranch(name: string): Promise<GitResult<BranchOutcome>> {
    if (this.fail) {
      return { success: false, error: 'fatal: not a git repository' };
    }
    const outcome: BranchOutcome = this.branches.has(name) ? 'switched' : 'created';
    this.branches.add(name);
    this.current = name;
    return { success: true, data: outcome };
  }
}

export class FakePullRequestSource implements PullRequestSource {
  readonly repo: GitHubRepoRef = { owner: 'downstream-org', repo: 'example-package-feedstock' };
  readonly open: DownstreamPullRequest[] = [];
  readonly closed: DownstreamPullRequest[] = [];
  readonly checks = new Map<number, CheckSummary[]>();
  readonly calls: string[] = [];

  addPullRequest(pr: Partial<DownstreamPullRequest> & { number: number; title: string }, state: 'open' | 'closed'): void {
    const full: DownstreamPullRequest = {
      author: 'feedstock-bot',
      createdAt: '2024-05-01T14:00:00Z',
      url: `https://github.com/${this.repo.owner}/${this.repo.repo}/pull/${pr.number}`,
      mergedAt: null,
      headSha: `sha-${pr.number}`,
      ...pr,
    };
    (state === 'open' ? this.open : this.closed).push(full);
  }

  async listPullRequests(state: 'open' | 'closed'): Promise<GitHubResult<DownstreamPullRequest[]>> {
    this.calls.push(`listPullRequests:${state}`);
    return { success: true, data: state === 'open' ? this.open : this.closed };
  }

  async getChecks(pullRequest: DownstreamPullRequest): Promise<GitHubResult<CheckSummary[]>> {
    this.calls.push(`getChecks:${pullRequest.number}`);
    return { success: true, data: this.checks.get(pullRequest.number) ?? [] };
  }
}
