//NOTE(self): Create phases under a plan overview and cross-link them
//NOTE(self): Usage:
//NOTE(self):   npm run plan:phases -- <plan-number>                       (interactive)
//NOTE(self):   npm run plan:phases -- <plan-number> --batch phases.txt    (name|duration|dependencies per line)
//NOTE(self):   npm run plan:phases -- <plan-number> --quick "Setup,Build,Test"
//NOTE(self):   npm run plan:phases -- <plan-number> --relink <child-number>

import { readFileSync } from 'fs';
import { startup, runMain, parseCliArgs, parseIssueNumber, createAsk } from '@modules/cli.js';
import { requireGitHub } from '@modules/config.js';
import { createGitHubTracker } from '@modules/tracker.js';
import {
  createPhases,
  runInteractive,
  relinkChild,
  parseBatchRecords,
  parseQuickPhases,
  formatRunSummary,
  type ChildOutcome,
  type PhaseRunReport,
} from '@modules/plan-phases.js';
import { ui } from '@modules/ui.js';
import { EXIT_OK, EXIT_PENDING } from '@common/config.js';
import { ValidationError, describeError } from '@common/errors.js';
import { pluralize } from '@common/strings.js';

function printOutcome(outcome: ChildOutcome): void {
  if (outcome.ok && outcome.entity) {
    ui.success(`#${outcome.entity.number} ${outcome.title}`, outcome.entity.url);
    return;
  }
  const created = outcome.entity ? ` (created as #${outcome.entity.number}, links incomplete)` : '';
  ui.error(`${outcome.title}${created}`, outcome.sequence.error);
}

function readBatchFile(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ValidationError(`Cannot read batch file ${path}: ${describeError(error)}`);
  }
}

function finish(report: PhaseRunReport): number {
  ui.line();
  ui.line(formatRunSummary(report));
  return report.succeeded === report.attempted ? EXIT_OK : EXIT_PENDING;
}

async function main(): Promise<number> {
  const config = startup();
  const { repo } = await requireGitHub(config);
  const tracker = createGitHubTracker(repo);

  const args = parseCliArgs(process.argv.slice(2), ['batch', 'quick', 'relink']);
  const parentNumber = parseIssueNumber(args.positionals[0], 'plan number');

  const relink = args.options.get('relink');
  if (relink !== undefined) {
    const outcome = await relinkChild(tracker, parentNumber, parseIssueNumber(relink, 'child issue number'));
    printOutcome(outcome);
    return outcome.ok ? EXIT_OK : EXIT_PENDING;
  }

  const batch = args.options.get('batch');
  const quick = args.options.get('quick');

  if (batch !== undefined || quick !== undefined) {
    const specs = batch !== undefined ? parseBatchRecords(readBatchFile(batch)) : parseQuickPhases(quick ?? '');
    if (specs.length === 0) {
      throw new ValidationError('No phases to create');
    }
    ui.header(`Creating ${pluralize(specs.length, 'phase')} under #${parentNumber}`);
    return finish(await createPhases(tracker, parentNumber, specs, printOutcome));
  }

  ui.header(`Interactive phase entry for #${parentNumber}`);
  const prompt = createAsk();
  try {
    return finish(await runInteractive(tracker, parentNumber, prompt.ask, printOutcome));
  } finally {
    prompt.close();
  }
}

runMain(main);
