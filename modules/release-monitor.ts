//NOTE(self): Release Monitor
//NOTE(self): Polls one tracking issue and the downstream feedstock for a PR carrying its version
//NOTE(self): Exit codes: 0 merged (or pre-release), 1 still waiting, 2 action needed or bad input

import type { Tracker, PullRequestSource, DownstreamPullRequest, CheckSummary, PlanEntity } from '@modules/tracker.js';
import { logger } from '@modules/logger.js';
import { TrackingFieldsSchema, parseOrThrow, type TrackingFields } from '@common/schemas.js';
import { parseIsoTimestamp, hoursBetween, formatDuration } from '@common/time.js';
import {
  RELEASE_EARLIEST_EXPECTED_HOURS,
  RELEASE_LATEST_TYPICAL_HOURS,
  RELEASE_CRITICAL_HOURS,
  DEFAULT_SHA256,
  EXIT_OK,
  EXIT_PENDING,
  EXIT_ACTION_NEEDED,
} from '@common/config.js';
import { ValidationError, TrackerError, isPlanTrackerError, describeError } from '@common/errors.js';

export type ExitCode = typeof EXIT_OK | typeof EXIT_PENDING | typeof EXIT_ACTION_NEEDED;

// ─── Extraction ─────────────────────────────────────────────────────────────

const VERSION_FIELD = /\*\*Version\*\*:\s*`([^`]+)`/;
const SHA256_FIELD = /\*\*SHA256\*\*:\s*`([^`]+)`/;
const SOURCE_URL_FIELD = /\*\*PyPI URL\*\*:\s*(\S+)/;

export function defaultSourceUrl(packageName: string, version: string): string {
  return `https://pypi.org/project/${packageName}/${version}/`;
}

export function extractTrackingFields(body: string, packageName: string): TrackingFields {
  const version = body.match(VERSION_FIELD)?.[1]?.trim() ?? '';
  if (!version) {
    throw new ValidationError('Tracking issue has no Version field (expected **Version**: `x.y.z`)');
  }

  return parseOrThrow(TrackingFieldsSchema, {
    version,
    sha256: body.match(SHA256_FIELD)?.[1] ?? DEFAULT_SHA256,
    sourceUrl: body.match(SOURCE_URL_FIELD)?.[1] ?? defaultSourceUrl(packageName, version),
  });
}

//NOTE(self): 1.2.0rc1, 1.2.0a3, 1.2.0b2, 1.2.0.dev4 (and the hyphen / dot spellings)
const PRE_RELEASE = /(?:[.-]?(?:rc|a|b|alpha|beta)|\.dev)\d+$/i;

export function isReleaseCandidate(version: string): boolean {
  return PRE_RELEASE.test(version.trim());
}

// ─── Elapsed Time ───────────────────────────────────────────────────────────

export type ElapsedClass = 'early' | 'typical' | 'late' | 'critical';

export interface ElapsedStatus {
  hours: number;
  class: ElapsedClass;
  message: string;
}

export function classifyElapsed(hours: number): ElapsedStatus {
  const elapsed = formatDuration(hours);

  if (hours <= RELEASE_EARLIEST_EXPECTED_HOURS) {
    return { hours, class: 'early', message: `${elapsed} since release: before the earliest expected update (${RELEASE_EARLIEST_EXPECTED_HOURS}h)` };
  }
  if (hours <= RELEASE_LATEST_TYPICAL_HOURS) {
    return { hours, class: 'typical', message: `${elapsed} since release: within the typical window (${RELEASE_EARLIEST_EXPECTED_HOURS}-${RELEASE_LATEST_TYPICAL_HOURS}h)` };
  }
  if (hours <= RELEASE_CRITICAL_HOURS) {
    return { hours, class: 'late', message: `${elapsed} since release: later than typical, still inside ${RELEASE_CRITICAL_HOURS}h` };
  }
  return { hours, class: 'critical', message: `${elapsed} since release: past ${RELEASE_CRITICAL_HOURS}h, manual intervention recommended` };
}

// ─── Downstream ─────────────────────────────────────────────────────────────

export function matchesVersion(pr: DownstreamPullRequest, version: string): boolean {
  return pr.title.toLowerCase().includes(version.toLowerCase());
}

export interface PullRequestStatus {
  pullRequest: DownstreamPullRequest;
  checks: CheckSummary[] | null;
  checksError?: string;
}

export type MonitorState = 'pre-release' | 'merged' | 'open' | 'waiting' | 'action-needed' | 'error';

export interface MonitorReport {
  exitCode: ExitCode;
  state: MonitorState;
  message: string;
  fields?: TrackingFields;
  elapsed?: ElapsedStatus;
  merged?: DownstreamPullRequest;
  open?: PullRequestStatus[];
}

export interface MonitorOptions {
  tracker: Tracker;
  downstream: PullRequestSource;
  trackingNumber: number;
  packageName: string;
  now?: () => Date;
}

async function listDownstream(downstream: PullRequestSource, state: 'open' | 'closed'): Promise<DownstreamPullRequest[]> {
  const result = await downstream.listPullRequests(state);
  if (!result.success) {
    throw new TrackerError(`Could not list ${state} PRs on ${downstream.repo.owner}/${downstream.repo.repo}: ${result.error}`);
  }
  return result.data;
}

export function summarizeChecks(checks: CheckSummary[]): string {
  if (checks.length === 0) return 'no checks reported yet';

  const pending = checks.filter(c => c.status !== 'completed').length;
  const failed = checks.filter(c => c.conclusion === 'failure' || c.conclusion === 'timed_out' || c.conclusion === 'cancelled').length;
  const passed = checks.filter(c => c.conclusion === 'success' || c.conclusion === 'neutral' || c.conclusion === 'skipped').length;

  return `${passed} passed, ${failed} failed, ${pending} pending`;
}

async function readTrackingIssue(tracker: Tracker, trackingNumber: number): Promise<PlanEntity> {
  const result = await tracker.getEntity(trackingNumber);
  if (!result.success) {
    throw new TrackerError(`Tracking issue #${trackingNumber} is not readable: ${result.error}`);
  }
  return result.data;
}

async function monitor(options: MonitorOptions): Promise<MonitorReport> {
  const { tracker, downstream, trackingNumber, packageName } = options;
  const now = options.now ? options.now() : new Date();

  const issue = await readTrackingIssue(tracker, trackingNumber);
  const fields = extractTrackingFields(issue.body, packageName);

  const createdAt = parseIsoTimestamp(issue.createdAt);
  if (!createdAt) {
    throw new ValidationError(`Tracking issue #${trackingNumber} has an unreadable creation time "${issue.createdAt}"`);
  }
  const elapsed = classifyElapsed(hoursBetween(createdAt, now));

  if (isReleaseCandidate(fields.version)) {
    return {
      exitCode: EXIT_OK,
      state: 'pre-release',
      message: `${fields.version} is a pre-release; downstream feedstocks do not pick up pre-releases`,
      fields,
      elapsed,
    };
  }

  const merged = (await listDownstream(downstream, 'closed'))
    .find(pr => pr.mergedAt !== null && matchesVersion(pr, fields.version));
  if (merged) {
    return {
      exitCode: EXIT_OK,
      state: 'merged',
      message: `Downstream PR #${merged.number} for ${fields.version} is merged`,
      fields,
      elapsed,
      merged,
    };
  }

  const open = (await listDownstream(downstream, 'open')).filter(pr => matchesVersion(pr, fields.version));
  if (open.length > 0) {
    const statuses: PullRequestStatus[] = [];
    for (const pullRequest of open) {
      const checks = await downstream.getChecks(pullRequest);
      statuses.push(checks.success
        ? { pullRequest, checks: checks.data }
        : { pullRequest, checks: null, checksError: checks.error });
    }
    return {
      exitCode: EXIT_PENDING,
      state: 'open',
      message: `${open.length} open downstream PR(s) for ${fields.version}, pipeline in progress`,
      fields,
      elapsed,
      open: statuses,
    };
  }

  if (elapsed.class !== 'critical') {
    return {
      exitCode: EXIT_PENDING,
      state: 'waiting',
      message: `No downstream PR for ${fields.version} yet, still within the normal window`,
      fields,
      elapsed,
    };
  }

  return {
    exitCode: EXIT_ACTION_NEEDED,
    state: 'action-needed',
    message: `No downstream PR for ${fields.version} after ${formatDuration(elapsed.hours)}, manual intervention recommended`,
    fields,
    elapsed,
  };
}

//NOTE(self): Never throws for expected failures — prerequisite, validation and tracker errors become exit 2
export async function runReleaseMonitor(options: MonitorOptions): Promise<MonitorReport> {
  try {
    const report = await monitor(options);
    logger.info('Release monitor finished', { state: report.state, exitCode: report.exitCode });
    return report;
  } catch (error) {
    if (!isPlanTrackerError(error)) {
      throw error;
    }
    logger.error('Release monitor failed', { code: error.code, error: describeError(error) });
    return { exitCode: EXIT_ACTION_NEEDED, state: 'error', message: error.message };
  }
}
