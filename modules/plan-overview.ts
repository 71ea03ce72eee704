//NOTE(self): Plan Overview Manager
//NOTE(self): validate → body (generator, else template) → create overview issue → branch
//NOTE(self): Issue creation failure is fatal and the branch step never runs

import type { Tracker, VersionControl, PlanEntity } from '@modules/tracker.js';
import type { BodyGenerator } from '@modules/body-generator.js';
import type { BranchOutcome } from '@adapters/git/branch.js';
import { logger } from '@modules/logger.js';
import { PlanInputSchema, parseOrThrow, type PlanInput, type RawPlanInput } from '@common/schemas.js';
import { labelName } from '@common/taxonomy.js';
import { createBranchName } from '@common/strings.js';
import { TrackerError, describeError } from '@common/errors.js';

export type BodySource = 'generator' | 'template';

export interface PlanOverviewOptions {
  tracker: Tracker;
  //NOTE(self): Omit to skip the branch step
  vcs?: VersionControl;
  generator?: BodyGenerator | null;
  now?: () => Date;
}

export interface PlanOverviewResult {
  input: PlanInput;
  entity: PlanEntity;
  branch: string;
  branchOutcome: BranchOutcome | 'skipped' | 'failed';
  bodySource: BodySource;
  branchError?: string;
}

export function overviewLabels(input: PlanInput): string[] {
  return [
    labelName('plan-type', 'overview'),
    labelName('status', 'planning'),
    labelName('priority', input.priority),
    labelName('domain', input.domain),
  ];
}

export function renderTemplateBody(input: PlanInput, now: Date = new Date()): string {
  return [
    '## Plan Metadata',
    `- **Priority**: ${input.priority}`,
    `- **Domain**: ${input.domain}`,
    `- **Created**: ${now.toISOString().slice(0, 10)}`,
    '',
    '## 🎯 Objective',
    input.title,
    '',
    '## 🧠 Context',
    '_To be filled in._',
    '',
    '## 📋 Implementation Plan',
    'Phases are linked as comments on this issue.',
    '',
    '## ✅ Acceptance Criteria',
    '- [ ] All phases completed',
    '- [ ] Closeout recorded',
  ].join('\n');
}

async function resolveBody(
  input: PlanInput,
  generator: BodyGenerator | null | undefined,
  now: Date
): Promise<{ body: string; source: BodySource }> {
  if (!generator) {
    return { body: renderTemplateBody(input, now), source: 'template' };
  }

  try {
    const body = await generator.generate(input);
    return { body, source: 'generator' };
  } catch (error) {
    logger.warn('Body generator failed, using template', {
      generator: generator.name,
      error: describeError(error),
    });
    return { body: renderTemplateBody(input, now), source: 'template' };
  }
}

export async function createPlanOverview(
  raw: RawPlanInput,
  options: PlanOverviewOptions
): Promise<PlanOverviewResult> {
  const { tracker, vcs, generator } = options;
  const now = options.now ? options.now() : new Date();

  //NOTE(self): Throws ValidationError before anything is written
  const input = parseOrThrow(PlanInputSchema, raw);

  const { body, source } = await resolveBody(input, generator, now);

  const created = await tracker.createEntity({
    title: input.title,
    body,
    labels: overviewLabels(input),
  });

  if (!created.success) {
    throw new TrackerError(`Failed to create plan overview: ${created.error}`);
  }

  const entity = created.data;
  const branch = createBranchName(entity.number, input.title);
  logger.info('Plan overview created', { number: entity.number, url: entity.url, bodySource: source });

  if (!vcs) {
    return { input, entity, branch, branchOutcome: 'skipped', bodySource: source };
  }

  const switched = await vcs.createOrSwitchBranch(branch);
  if (!switched.success) {
    logger.warn('Branch step failed after plan creation', { branch, error: switched.error });
    return { input, entity, branch, branchOutcome: 'failed', bodySource: source, branchError: switched.error };
  }

  return { input, entity, branch, branchOutcome: switched.data, bodySource: source };
}
