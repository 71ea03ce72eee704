//NOTE(self): Plan status dashboard
//NOTE(self): Usage: npm run plan:status -- [--summary | --detailed | --recommendations] [--status blocked]

import { startup, runMain, parseCliArgs } from '@modules/cli.js';
import { requireGitHub } from '@modules/config.js';
import { createGitHubTracker } from '@modules/tracker.js';
import { buildDashboard, renderDashboard, selectDashboardMode } from '@modules/plan-dashboard.js';
import { ui } from '@modules/ui.js';
import { StatusSchema, parseOrThrow } from '@common/schemas.js';
import { EXIT_OK } from '@common/config.js';

async function main(): Promise<number> {
  const config = startup();
  const { repo } = await requireGitHub(config);

  const args = parseCliArgs(process.argv.slice(2), ['status']);
  const mode = selectDashboardMode(args.flags);
  const rawStatus = args.options.get('status');
  const status = rawStatus === undefined ? null : parseOrThrow(StatusSchema, rawStatus);

  const dashboard = await buildDashboard(createGitHubTracker(repo), mode, status);

  ui.header(`Plans · ${repo.owner}/${repo.repo}`);
  for (const line of renderDashboard(dashboard)) {
    ui.line(line);
  }
  return EXIT_OK;
}

runMain(main);
