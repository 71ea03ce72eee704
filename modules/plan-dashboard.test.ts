import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@modules/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import {
  deriveBadges,
  listOverviews,
  findPhases,
  summarize,
  recommend,
  buildDashboard,
  renderDashboard,
  selectDashboardMode,
} from '@modules/plan-dashboard.js';
import { createPhases, parseQuickPhases } from '@modules/plan-phases.js';
import { FakeTracker } from '@modules/tracker.fake.js';
import { setColorEnabled } from '@modules/ui.js';
import { ValidationError } from '@common/errors.js';

let tracker: FakeTracker;

beforeEach(() => {
  setColorEnabled(false);
  tracker = new FakeTracker();
});

function seedBlockedAndCompleted() {
  tracker.seed({ number: 1, title: 'Stuck plan', labels: ['plan:overview', 'status:blocked', 'priority:critical'] });
  tracker.seed({ number: 2, title: 'Done plan', labels: ['plan:overview', 'status:completed', 'priority:low', 'domain:docs'] });
}

describe('deriveBadges', () => {
  it('takes the status badge from status labels only', () => {
    expect(deriveBadges(['status:blocked', 'priority:critical'])).toEqual({
      status: 'BLOCKED',
      priority: 'CRITICAL',
      domain: 'UNKNOWN',
    });
  });

  it('applies the fixed precedence when a category has several labels', () => {
    const badges = deriveBadges(['status:planning', 'status:completed', 'priority:low', 'priority:high', 'domain:docs', 'domain:data']);
    expect(badges).toEqual({ status: 'COMPLETED', priority: 'HIGH', domain: 'DATA' });
  });

  it('renders UNKNOWN for every missing category', () => {
    expect(deriveBadges(['plan:overview'])).toEqual({ status: 'UNKNOWN', priority: 'UNKNOWN', domain: 'UNKNOWN' });
  });
});

describe('listOverviews', () => {
  it('filters by status when asked', async () => {
    seedBlockedAndCompleted();

    const blocked = await listOverviews(tracker, 'blocked');
    expect(blocked.map(p => p.number)).toEqual([1]);
    expect(tracker.calls).toContain('listEntities:plan:overview,status:blocked');
  });
});

describe('summarize', () => {
  it('counts totals and per-category values with one query per value', async () => {
    seedBlockedAndCompleted();

    const summary = await summarize(tracker);

    expect(summary.total).toBe(2);
    expect(summary.byStatus).toEqual({ planning: 0, 'in-progress': 0, blocked: 1, review: 0, completed: 1 });
    expect(summary.byPriority).toEqual({ critical: 1, high: 0, medium: 0, low: 1 });
    expect(summary.byDomain.docs).toBe(1);
    expect(tracker.calls.filter(c => c.startsWith('listEntities:'))).toHaveLength(16);
  });
});

describe('recommend', () => {
  it('flags exactly the blocked plan in a blocked + completed snapshot', async () => {
    seedBlockedAndCompleted();

    const recs = recommend(await listOverviews(tracker));

    expect(recs).toEqual([
      { kind: 'review-blockers', number: 1, title: 'Stuck plan', message: '#1 is blocked: review its blockers' },
    ]);
  });

  it('flags review, critical in-progress and planning plans', () => {
    const plan = (number: number, labels: string[]) => tracker.seed({ number, title: `Plan ${number}`, labels });
    const recs = recommend([
      plan(3, ['status:review']),
      plan(4, ['status:in-progress', 'priority:critical']),
      plan(5, ['status:in-progress', 'priority:high']),
      plan(6, ['status:planning']),
    ]);

    expect(recs.map(r => [r.kind, r.number])).toEqual([
      ['approve', 3],
      ['resource', 4],
      ['advance', 6],
    ]);
  });
});

describe('findPhases', () => {
  it('finds phases through the parent marker', async () => {
    tracker.seed({ number: 10, title: 'Plan', labels: ['plan:overview'] });
    await createPhases(tracker, 10, parseQuickPhases('Setup,Build'));

    const listing = await findPhases(tracker, 10);

    expect(listing.lookup).toBe('marker');
    expect(listing.phases.map(p => p.title)).toEqual(['Phase 1: Setup', 'Phase 2: Build']);
  });

  it('falls back to searching comments for #id', async () => {
    tracker.seed({ number: 5, title: 'Plan', labels: ['plan:overview'] });
    tracker.seed({ number: 6, title: 'Phase 1: Legacy', labels: ['plan:phase'] });
    tracker.seedComment(6, 'Part of #5');
    tracker.seed({ number: 7, title: 'Phase 1: Other', labels: ['plan:phase'] });
    tracker.seedComment(7, 'Part of #50');

    const listing = await findPhases(tracker, 5);

    expect(listing.lookup).toBe('search');
    expect(listing.phases.map(p => p.number)).toEqual([6]);
  });

  it('reports a miss without failing', async () => {
    tracker.seed({ number: 5, title: 'Plan', labels: ['plan:overview'] });

    expect(await findPhases(tracker, 5)).toEqual({ phases: [], lookup: 'none' });
  });
});

describe('buildDashboard', () => {
  it('summary mode skips the overview list and recommendations', async () => {
    seedBlockedAndCompleted();

    const dashboard = await buildDashboard(tracker, 'summary');

    expect(dashboard.overviews).toEqual([]);
    expect(dashboard.recommendations).toBeNull();
    expect(dashboard.summary?.total).toBe(2);
  });

  it('detailed mode attaches phases to each overview', async () => {
    tracker.seed({ number: 10, title: 'Plan', labels: ['plan:overview', 'status:planning'] });
    await createPhases(tracker, 10, parseQuickPhases('Setup'));

    const dashboard = await buildDashboard(tracker, 'detailed');

    expect(dashboard.overviews).toHaveLength(1);
    expect(dashboard.overviews[0].phases?.phases.map(p => p.number)).toEqual([11]);
    expect(dashboard.summary?.total).toBe(1);
    expect(dashboard.recommendations?.map(r => r.kind)).toEqual(['advance']);
  });

  it('restricts the overview list and recommendations to the status filter', async () => {
    seedBlockedAndCompleted();

    const dashboard = await buildDashboard(tracker, 'full', 'completed');

    expect(dashboard.overviews.map(r => r.plan.number)).toEqual([2]);
    expect(dashboard.recommendations).toEqual([]);
  });

  it('applies the status filter to the summary counts', async () => {
    seedBlockedAndCompleted();

    const dashboard = await buildDashboard(tracker, 'full', 'blocked');

    expect(dashboard.summary?.total).toBe(1);
    expect(dashboard.summary?.byStatus).toEqual({ planning: 0, 'in-progress': 0, blocked: 1, review: 0, completed: 0 });
    expect(dashboard.summary?.byPriority).toEqual({ critical: 1, high: 0, medium: 0, low: 0 });
    expect(dashboard.summary?.byDomain.docs).toBe(0);
  });
});

describe('renderDashboard', () => {
  it('renders badges, summary counts and recommendations', async () => {
    seedBlockedAndCompleted();

    const lines = renderDashboard(await buildDashboard(tracker, 'full'));

    expect(lines.slice(0, 3)).toEqual([
      'Plan overviews',
      '  #2 [COMPLETED] [LOW] [DOCS] Done plan',
      '  #1 [BLOCKED] [CRITICAL] [UNKNOWN] Stuck plan',
    ]);
    expect(lines).toContain('  total=2');
    expect(lines).toContain('  status: planning=0, in-progress=0, blocked=1, review=0, completed=1');
    expect(lines[lines.length - 1]).toBe('  ▸ #1 is blocked: review its blockers');
  });
});

describe('selectDashboardMode', () => {
  it('defaults to full and rejects two modes', () => {
    expect(selectDashboardMode(new Set())).toBe('full');
    expect(selectDashboardMode(new Set(['detailed']))).toBe('detailed');
    expect(() => selectDashboardMode(new Set(['summary', 'detailed']))).toThrow(ValidationError);
  });
});
