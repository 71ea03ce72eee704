//NOTE(self): Create the closeout record for a plan overview
//NOTE(self): Usage: npm run plan:closeout -- <plan-number>

import { startup, runMain, parseCliArgs, parseIssueNumber } from '@modules/cli.js';
import { requireGitHub } from '@modules/config.js';
import { createGitHubTracker } from '@modules/tracker.js';
import { createCloseout } from '@modules/plan-phases.js';
import { ui } from '@modules/ui.js';
import { EXIT_OK, EXIT_ACTION_NEEDED } from '@common/config.js';

async function main(): Promise<number> {
  const config = startup();
  const { repo } = await requireGitHub(config);

  const args = parseCliArgs(process.argv.slice(2));
  const parentNumber = parseIssueNumber(args.positionals[0], 'plan number');

  const outcome = await createCloseout(createGitHubTracker(repo), parentNumber);

  if (outcome.ok && outcome.entity) {
    const verb = outcome.reused ? 'Already exists' : 'Created';
    ui.success(`${verb} #${outcome.entity.number}: ${outcome.title}`, outcome.entity.url);
    return EXIT_OK;
  }

  ui.error(`Closeout for #${parentNumber} incomplete`, outcome.sequence.error);
  if (outcome.entity) {
    ui.info(`Repair the links with: npm run plan:phases -- ${parentNumber} --relink ${outcome.entity.number}`);
  }
  return EXIT_ACTION_NEEDED;
}

runMain(main);
