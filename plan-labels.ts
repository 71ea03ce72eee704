//NOTE(self): Provision the plan label taxonomy in the configured repository
//NOTE(self): Usage: npm run plan:labels

import { startup, runMain } from '@modules/cli.js';
import { requireGitHub } from '@modules/config.js';
import { createGitHubTracker } from '@modules/tracker.js';
import { provisionLabels } from '@modules/label-taxonomy.js';
import { ui } from '@modules/ui.js';
import { EXIT_OK, EXIT_ACTION_NEEDED } from '@common/config.js';

async function main(): Promise<number> {
  const config = startup();
  const { repo } = await requireGitHub(config);

  ui.header(`Label taxonomy · ${repo.owner}/${repo.repo}`);
  const report = await provisionLabels(createGitHubTracker(repo));

  for (const entry of report.entries) {
    if (entry.outcome === 'created') ui.success(entry.label, 'created');
    else if (entry.outcome === 'existing') ui.info(entry.label, 'already exists');
    else ui.error(entry.label, entry.error);
  }

  ui.line();
  ui.line(`created=${report.created} existing=${report.existing} failed=${report.failed}`);

  if (report.abortedAt) {
    ui.error(`Stopped at ${report.abortedAt}. Labels created so far are kept; re-run to finish.`);
    return EXIT_ACTION_NEEDED;
  }
  return EXIT_OK;
}

runMain(main);
