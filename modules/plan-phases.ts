//NOTE(self): Phase Linker
//NOTE(self): Phases and the closeout hang off a validated plan overview through soft references:
//NOTE(self): a comment on the parent naming the child, a reciprocal comment on the child naming the parent,
//NOTE(self): and a parent marker in the child body
//NOTE(self): Ordinals count within one invocation only; a second run for the same plan starts again at 1

import type { Tracker, PlanEntity } from '@modules/tracker.js';
import { runSteps, type Step, type SequenceReport } from '@modules/steps.js';
import { logger } from '@modules/logger.js';
import {
  parentMarker,
  readParentMarker,
  hasReference,
  parentLinkComment,
  childLinkComment,
} from '@modules/references.js';
import { PhaseSpecSchema, formatZodError, parseOrThrow, type PhaseSpec } from '@common/schemas.js';
import { labelName } from '@common/taxonomy.js';
import {
  BATCH_FIELD_DELIMITER,
  BATCH_COMMENT_PREFIX,
  QUICK_NAME_DELIMITER,
  QUICK_PHASE_DURATION,
  QUICK_PHASE_DEPENDENCIES,
  INTERACTIVE_TERMINATORS,
} from '@common/config.js';
import { ValidationError, TrackerError, describeError } from '@common/errors.js';

export type ChildKind = 'phase' | 'closeout';

// ─── Input Modes ────────────────────────────────────────────────────────────

//NOTE(self): "Setup,Build,Test" → three phases with placeholder duration and dependencies
export function parseQuickPhases(text: string): PhaseSpec[] {
  return text
    .split(QUICK_NAME_DELIMITER)
    .map(name => name.trim())
    .filter(name => name.length > 0)
    .map(name => ({ name, duration: QUICK_PHASE_DURATION, dependencies: QUICK_PHASE_DEPENDENCIES }));
}

//NOTE(self): One `name|duration|dependencies` record per line
//NOTE(self): Blank lines, `#` lines and records without a name are skipped
export function parseBatchRecords(text: string): PhaseSpec[] {
  const specs: PhaseSpec[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith(BATCH_COMMENT_PREFIX)) continue;

    const [name = '', duration = '', dependencies = ''] = line.split(BATCH_FIELD_DELIMITER);
    const parsed = PhaseSpecSchema.safeParse({ name, duration, dependencies });
    if (!parsed.success) {
      logger.debug('Skipping batch record', { line, reason: formatZodError(parsed.error) });
      continue;
    }
    specs.push(parsed.data);
  }

  return specs;
}

// ─── Parent Validation ──────────────────────────────────────────────────────

export async function validateParentPlan(tracker: Tracker, parentNumber: number): Promise<PlanEntity> {
  const result = await tracker.getEntity(parentNumber);

  if (!result.success) {
    if (result.status === 404) {
      throw new ValidationError(`#${parentNumber} is not a valid plan (issue not found)`);
    }
    throw new TrackerError(`Could not read #${parentNumber}: ${result.error}`);
  }

  if (!result.data.labels.includes(labelName('plan-type', 'overview'))) {
    throw new ValidationError(`#${parentNumber} is not a valid plan (missing ${labelName('plan-type', 'overview')})`);
  }

  return result.data;
}

// ─── Bodies ─────────────────────────────────────────────────────────────────

export function phaseTitle(ordinal: number, name: string): string {
  return `Phase ${ordinal}: ${name}`;
}

export function closeoutTitle(parent: PlanEntity): string {
  return `Closeout: ${parent.title}`;
}

export function renderPhaseBody(spec: PhaseSpec, parent: PlanEntity): string {
  return [
    `**Parent plan**: #${parent.number} ${parent.title}`,
    `**Estimated duration**: ${spec.duration}`,
    `**Dependencies**: ${spec.dependencies}`,
    '',
    '## Tasks',
    '- [ ] _To be filled in._',
    '',
    parentMarker(parent.number),
  ].join('\n');
}

export function renderCloseoutBody(parent: PlanEntity): string {
  return [
    `**Parent plan**: #${parent.number} ${parent.title}`,
    '',
    '## Outcome',
    '_To be filled in._',
    '',
    '## Lessons Learned',
    '_To be filled in._',
    '',
    parentMarker(parent.number),
  ].join('\n');
}

// ─── Linking ────────────────────────────────────────────────────────────────

async function commentsContain(tracker: Tracker, entityNumber: number, marker: (text: string) => boolean): Promise<boolean> {
  const comments = await tracker.listComments(entityNumber);
  if (!comments.success) {
    throw new TrackerError(`Could not read comments on #${entityNumber}: ${comments.error}`);
  }
  return comments.data.some(c => marker(c.body));
}

async function comment(tracker: Tracker, entityNumber: number, body: string): Promise<void> {
  const result = await tracker.addComment(entityNumber, body);
  if (!result.success) {
    throw new TrackerError(result.error);
  }
}

//NOTE(self): The two cross-link steps, each skipped when its marker is already there
export function linkSteps(
  tracker: Tracker,
  kind: ChildKind,
  parent: PlanEntity,
  child: () => PlanEntity
): Step[] {
  return [
    {
      name: 'comment on parent',
      isDone: () => commentsContain(tracker, parent.number, text => hasReference(text, kind, child().number)),
      run: () => comment(tracker, parent.number, childLinkComment(kind, child().number, child().title)),
    },
    {
      name: 'comment on child',
      isDone: () => commentsContain(tracker, child().number, text => hasReference(text, 'parent', parent.number)),
      run: () => comment(tracker, child().number, parentLinkComment(parent.number, parent.title)),
    },
  ];
}

export interface ChildOutcome {
  kind: ChildKind;
  title: string;
  ordinal: number | null;
  entity: PlanEntity | null;
  sequence: SequenceReport;
  //NOTE(self): Created and linked both ways
  ok: boolean;
  //NOTE(self): Already existed; only the links were checked
  reused?: boolean;
}

async function createLinkedChild(
  tracker: Tracker,
  kind: ChildKind,
  parent: PlanEntity,
  title: string,
  body: string,
  ordinal: number | null
): Promise<ChildOutcome> {
  let entity: PlanEntity | null = null;

  const requireEntity = (): PlanEntity => {
    if (!entity) {
      throw new Error(`${kind} issue was not created`);
    }
    return entity;
  };

  const sequence = await runSteps([
    {
      name: `create ${kind}`,
      run: async () => {
        const created = await tracker.createEntity({
          title,
          body,
          labels: [labelName('plan-type', kind), labelName('status', 'planning')],
        });
        if (!created.success) {
          throw new TrackerError(created.error);
        }
        entity = created.data;
      },
    },
    ...linkSteps(tracker, kind, parent, requireEntity),
  ]);

  if (sequence.ok) {
    logger.info(`${kind} created and linked`, { parent: parent.number, title });
  } else {
    logger.warn(`${kind} incomplete`, { parent: parent.number, title, error: sequence.error });
  }

  return { kind, title, ordinal, entity, sequence, ok: sequence.ok };
}

export function createPhase(tracker: Tracker, parent: PlanEntity, spec: PhaseSpec, ordinal: number): Promise<ChildOutcome> {
  return createLinkedChild(tracker, 'phase', parent, phaseTitle(ordinal, spec.name), renderPhaseBody(spec, parent), ordinal);
}

export async function findCloseout(tracker: Tracker, parentNumber: number): Promise<PlanEntity | null> {
  const result = await tracker.listEntities([labelName('plan-type', 'closeout')], 'all');
  if (!result.success) {
    throw new TrackerError(`Could not list closeouts: ${result.error}`);
  }
  return result.data.find(entity => readParentMarker(entity.body) === parentNumber) ?? null;
}

//NOTE(self): A plan has at most one closeout; a second run only repairs its links
export async function createCloseout(tracker: Tracker, parentNumber: number): Promise<ChildOutcome> {
  const parent = await validateParentPlan(tracker, parentNumber);

  const existing = await findCloseout(tracker, parent.number);
  if (existing) {
    logger.info('closeout already exists, checking links', { parent: parent.number, closeout: existing.number });
    const sequence = await runSteps(linkSteps(tracker, 'closeout', parent, () => existing));
    return { kind: 'closeout', title: existing.title, ordinal: null, entity: existing, sequence, ok: sequence.ok, reused: true };
  }

  return createLinkedChild(tracker, 'closeout', parent, closeoutTitle(parent), renderCloseoutBody(parent), null);
}

//NOTE(self): Finish the links for a child whose creation succeeded but whose comments did not
export async function relinkChild(tracker: Tracker, parentNumber: number, childNumber: number): Promise<ChildOutcome> {
  const parent = await validateParentPlan(tracker, parentNumber);

  const fetched = await tracker.getEntity(childNumber);
  if (!fetched.success) {
    throw new TrackerError(`Could not read #${childNumber}: ${fetched.error}`);
  }
  const child = fetched.data;
  const kind: ChildKind = child.labels.includes(labelName('plan-type', 'closeout')) ? 'closeout' : 'phase';

  const sequence = await runSteps(linkSteps(tracker, kind, parent, () => child));
  return { kind, title: child.title, ordinal: null, entity: child, sequence, ok: sequence.ok };
}

// ─── Batch / Quick ──────────────────────────────────────────────────────────

export interface PhaseRunReport {
  parent: PlanEntity;
  outcomes: ChildOutcome[];
  attempted: number;
  succeeded: number;
}

export function formatRunSummary(report: Pick<PhaseRunReport, 'attempted' | 'succeeded'>): string {
  return `${report.succeeded} of ${report.attempted} attempted succeeded.`;
}

function toReport(parent: PlanEntity, outcomes: ChildOutcome[]): PhaseRunReport {
  return {
    parent,
    outcomes,
    attempted: outcomes.length,
    succeeded: outcomes.filter(o => o.ok).length,
  };
}

//NOTE(self): A failed phase is logged and the loop moves on; its ordinal is still consumed
export async function createPhases(
  tracker: Tracker,
  parentNumber: number,
  specs: PhaseSpec[],
  onOutcome?: (outcome: ChildOutcome) => void
): Promise<PhaseRunReport> {
  const parent = await validateParentPlan(tracker, parentNumber);
  const outcomes: ChildOutcome[] = [];

  for (const [index, spec] of specs.entries()) {
    const outcome = await createPhase(tracker, parent, spec, index + 1);
    outcomes.push(outcome);
    onOutcome?.(outcome);
  }

  return toReport(parent, outcomes);
}

// ─── Interactive ────────────────────────────────────────────────────────────

export type Ask = (question: string) => Promise<string>;

export function isTerminator(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === '' || INTERACTIVE_TERMINATORS.includes(normalized);
}

export async function runInteractive(
  tracker: Tracker,
  parentNumber: number,
  ask: Ask,
  onOutcome?: (outcome: ChildOutcome) => void
): Promise<PhaseRunReport> {
  const parent = await validateParentPlan(tracker, parentNumber);
  const outcomes: ChildOutcome[] = [];

  for (let ordinal = 1; ; ordinal++) {
    const name = await ask(`Phase ${ordinal} name (empty or "done" to finish): `);
    if (isTerminator(name)) break;

    const duration = await ask('Estimated duration: ');
    const dependencies = await ask('Dependencies: ');

    try {
      const spec = parseOrThrow(PhaseSpecSchema, { name, duration, dependencies });
      const outcome = await createPhase(tracker, parent, spec, ordinal);
      outcomes.push(outcome);
      onOutcome?.(outcome);
    } catch (error) {
      logger.error('Phase creation failed', { name, error: describeError(error) });
    }
  }

  return toReport(parent, outcomes);
}
