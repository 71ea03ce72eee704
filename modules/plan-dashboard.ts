//NOTE(self): Status Dashboard
//NOTE(self): Read-only and stateless: every call re-queries the tracker, nothing is cached between runs
//NOTE(self): One page per query (up to 100 issues) — larger trackers are undercounted

import type { Tracker, PlanEntity } from '@modules/tracker.js';
import { logger } from '@modules/logger.js';
import { readParentMarker, mentionsIssue } from '@modules/references.js';
import {
  PRIORITIES,
  STATUSES,
  DOMAINS,
  labelName,
  categoryValues,
  type Status,
  type LabelCategory,
} from '@common/taxonomy.js';
import { TrackerError, ValidationError } from '@common/errors.js';
import { truncate } from '@common/strings.js';
import { SYM, paint, type AnsiColor } from '@modules/ui.js';

// ─── Badges ─────────────────────────────────────────────────────────────────

//NOTE(self): Fixed precedence per category; the first present value wins
export const BADGE_PRECEDENCE: Record<Exclude<LabelCategory, 'plan-type'>, readonly string[]> = {
  status: ['completed', 'in-progress', 'blocked', 'review', 'planning'],
  priority: ['critical', 'high', 'medium', 'low'],
  domain: ['physics', 'data', 'plotting', 'testing', 'infrastructure', 'docs'],
};

export const UNKNOWN_BADGE = 'UNKNOWN';

export interface Badges {
  status: string;
  priority: string;
  domain: string;
}

export function badgeFor(labels: readonly string[], category: keyof typeof BADGE_PRECEDENCE): string {
  const present = categoryValues(labels, category);
  const winner = BADGE_PRECEDENCE[category].find(value => present.includes(value));
  return winner ? winner.toUpperCase() : UNKNOWN_BADGE;
}

export function deriveBadges(labels: readonly string[]): Badges {
  return {
    status: badgeFor(labels, 'status'),
    priority: badgeFor(labels, 'priority'),
    domain: badgeFor(labels, 'domain'),
  };
}

// ─── Queries ────────────────────────────────────────────────────────────────

async function query(tracker: Tracker, labels: string[]): Promise<PlanEntity[]> {
  const result = await tracker.listEntities(labels, 'all');
  if (!result.success) {
    throw new TrackerError(`Could not list issues labeled ${labels.join(', ')}: ${result.error}`);
  }
  return result.data;
}

export async function listOverviews(tracker: Tracker, statusFilter?: Status): Promise<PlanEntity[]> {
  const labels = [labelName('plan-type', 'overview')];
  if (statusFilter) {
    labels.push(labelName('status', statusFilter));
  }
  return query(tracker, labels);
}

export type PhaseLookup = 'marker' | 'search' | 'none';

export interface PhaseListing {
  phases: PlanEntity[];
  lookup: PhaseLookup;
}

//NOTE(self): Structured parent marker first, then a text search for `#<id>` in phase titles and comments
export async function findPhases(tracker: Tracker, overviewNumber: number): Promise<PhaseListing> {
  const phaseLabel = labelName('plan-type', 'phase');
  const all = await query(tracker, [phaseLabel]);

  const byMarker = all.filter(phase => readParentMarker(phase.body) === overviewNumber);
  if (byMarker.length > 0) {
    return { phases: sortByNumber(byMarker), lookup: 'marker' };
  }

  const searched = await tracker.searchEntities(`#${overviewNumber}`, [phaseLabel]);
  if (!searched.success) {
    throw new TrackerError(`Phase search for #${overviewNumber} failed: ${searched.error}`);
  }

  //NOTE(self): Search engines tokenize `#12` loosely; keep only real mentions
  const matched: PlanEntity[] = [];
  for (const phase of searched.data) {
    if (mentionsIssue(phase.title, overviewNumber) || mentionsIssue(phase.body, overviewNumber)) {
      matched.push(phase);
      continue;
    }
    const comments = await tracker.listComments(phase.number);
    if (comments.success && comments.data.some(c => mentionsIssue(c.body, overviewNumber))) {
      matched.push(phase);
    }
  }

  if (matched.length === 0) {
    logger.info('No linked phases found', { overview: overviewNumber });
    return { phases: [], lookup: 'none' };
  }
  return { phases: sortByNumber(matched), lookup: 'search' };
}

function sortByNumber(entities: PlanEntity[]): PlanEntity[] {
  return [...entities].sort((a, b) => a.number - b.number);
}

// ─── Summary ────────────────────────────────────────────────────────────────

export interface DashboardSummary {
  total: number;
  byStatus: Record<string, number>;
  byPriority: Record<string, number>;
  byDomain: Record<string, number>;
}

//NOTE(self): No group-by on the tracker, so one filtered query per category value
//NOTE(self): A status filter is added to every query, the total included
export async function summarize(tracker: Tracker, statusFilter?: Status): Promise<DashboardSummary> {
  const base = [labelName('plan-type', 'overview')];
  if (statusFilter) {
    base.push(labelName('status', statusFilter));
  }
  const total = (await query(tracker, base)).length;

  const countEach = async (category: 'status' | 'priority' | 'domain', values: readonly string[]) => {
    const counts: Record<string, number> = {};
    for (const value of values) {
      const label = labelName(category, value);
      const labels = base.includes(label) ? base : [...base, label];
      counts[value] = (await query(tracker, labels)).length;
    }
    return counts;
  };

  return {
    total,
    byStatus: await countEach('status', STATUSES),
    byPriority: await countEach('priority', PRIORITIES),
    byDomain: await countEach('domain', DOMAINS),
  };
}

// ─── Recommendations ────────────────────────────────────────────────────────

export type RecommendationKind = 'review-blockers' | 'approve' | 'resource' | 'advance';

export interface Recommendation {
  kind: RecommendationKind;
  number: number;
  title: string;
  message: string;
}

export function recommend(overviews: readonly PlanEntity[]): Recommendation[] {
  const recommendations: Recommendation[] = [];

  for (const plan of overviews) {
    const statuses = categoryValues(plan.labels, 'status');
    const priorities = categoryValues(plan.labels, 'priority');
    const add = (kind: RecommendationKind, message: string) =>
      recommendations.push({ kind, number: plan.number, title: plan.title, message });

    if (statuses.includes('blocked')) {
      add('review-blockers', `#${plan.number} is blocked: review its blockers`);
    }
    if (statuses.includes('review')) {
      add('approve', `#${plan.number} is awaiting review: approve or send back`);
    }
    if (priorities.includes('critical') && statuses.includes('in-progress')) {
      add('resource', `#${plan.number} is critical and in progress: check it is resourced`);
    }
    if (statuses.includes('planning')) {
      add('advance', `#${plan.number} is still planning: advance it to in-progress`);
    }
  }

  return recommendations;
}

// ─── Dashboard ──────────────────────────────────────────────────────────────

export type DashboardMode = 'full' | 'summary' | 'detailed' | 'recommendations';

const MODE_FLAGS: readonly DashboardMode[] = ['summary', 'detailed', 'recommendations'];

//NOTE(self): No mode flag means full; two mode flags are a usage error
export function selectDashboardMode(flags: ReadonlySet<string>): DashboardMode {
  const chosen = MODE_FLAGS.filter(mode => flags.has(mode));
  if (chosen.length > 1) {
    throw new ValidationError(`Choose one of --${chosen.join(', --')}`);
  }
  return chosen.length === 1 ? chosen[0] : 'full';
}

export interface OverviewRow {
  plan: PlanEntity;
  badges: Badges;
  phases?: PhaseListing;
}

export interface Dashboard {
  mode: DashboardMode;
  statusFilter: Status | null;
  overviews: OverviewRow[];
  summary: DashboardSummary | null;
  recommendations: Recommendation[] | null;
}

export async function buildDashboard(
  tracker: Tracker,
  mode: DashboardMode = 'full',
  statusFilter: Status | null = null
): Promise<Dashboard> {
  const plans = await listOverviews(tracker, statusFilter ?? undefined);

  const overviews: OverviewRow[] = [];
  if (mode === 'full' || mode === 'detailed') {
    for (const plan of plans) {
      const row: OverviewRow = { plan, badges: deriveBadges(plan.labels) };
      if (mode === 'detailed') {
        row.phases = await findPhases(tracker, plan.number);
      }
      overviews.push(row);
    }
  }

  //NOTE(self): detailed is full plus the phase listing
  const withSummary = mode === 'full' || mode === 'detailed' || mode === 'summary';
  const withRecommendations = mode === 'full' || mode === 'detailed' || mode === 'recommendations';
  const summary = withSummary ? await summarize(tracker, statusFilter ?? undefined) : null;
  const recommendations = withRecommendations ? recommend(plans) : null;

  return { mode, statusFilter, overviews, summary, recommendations };
}

// ─── Rendering ──────────────────────────────────────────────────────────────

const STATUS_COLOR: Record<string, AnsiColor> = {
  COMPLETED: 'green',
  'IN-PROGRESS': 'blue',
  BLOCKED: 'red',
  REVIEW: 'yellow',
  PLANNING: 'cyan',
};

const TITLE_WIDTH = 72;

function formatCounts(counts: Record<string, number>): string {
  return Object.entries(counts)
    .map(([value, count]) => `${value}=${count}`)
    .join(', ');
}

export function renderDashboard(dashboard: Dashboard): string[] {
  const lines: string[] = [];
  const filter = dashboard.statusFilter ? ` (status: ${dashboard.statusFilter})` : '';

  if (dashboard.mode === 'full' || dashboard.mode === 'detailed') {
    lines.push(`Plan overviews${filter}`);
    if (dashboard.overviews.length === 0) {
      lines.push('  (no plan overviews found)');
    }
    for (const { plan, badges, phases } of dashboard.overviews) {
      const status = paint(STATUS_COLOR[badges.status] ?? 'gray', `[${badges.status}]`);
      lines.push(`  #${plan.number} ${status} [${badges.priority}] [${badges.domain}] ${truncate(plan.title, TITLE_WIDTH)}`);

      if (phases) {
        if (phases.phases.length === 0) {
          lines.push('      no linked phases found');
        }
        for (const phase of phases.phases) {
          const done = phase.state === 'closed' ? SYM.check : SYM.ring;
          lines.push(`      ${done} #${phase.number} ${phase.title}`);
        }
      }
    }
  }

  if (dashboard.summary) {
    const { total, byStatus, byPriority, byDomain } = dashboard.summary;
    lines.push('', 'Summary', `  total=${total}`);
    lines.push(`  status: ${formatCounts(byStatus)}`);
    lines.push(`  priority: ${formatCounts(byPriority)}`);
    lines.push(`  domain: ${formatCounts(byDomain)}`);
  }

  if (dashboard.recommendations) {
    lines.push('', 'Recommendations');
    if (dashboard.recommendations.length === 0) {
      lines.push('  nothing to flag');
    }
    for (const rec of dashboard.recommendations) {
      lines.push(`  ${SYM.arrowRight} ${rec.message}`);
    }
  }

  return lines;
}
