//NOTE(self): Create a plan overview issue and its working branch
//NOTE(self): Usage: npm run plan:create -- "<title>" [--priority high] [--domain physics] [--no-branch] [--no-generator]

import { startup, runMain, parseCliArgs } from '@modules/cli.js';
import { requireGitHub } from '@modules/config.js';
import { createGitHubTracker, createGitVersionControl } from '@modules/tracker.js';
import { createAnthropicBodyGenerator } from '@modules/body-generator.js';
import { createPlanOverview } from '@modules/plan-overview.js';
import { ui } from '@modules/ui.js';
import { EXIT_OK, EXIT_PENDING } from '@common/config.js';

async function main(): Promise<number> {
  const config = startup();
  const { repo } = await requireGitHub(config);

  const args = parseCliArgs(process.argv.slice(2), ['priority', 'domain']);

  const result = await createPlanOverview(
    {
      title: args.positionals.join(' '),
      priority: args.options.get('priority'),
      domain: args.options.get('domain'),
    },
    {
      tracker: createGitHubTracker(repo),
      vcs: args.flags.has('no-branch') ? undefined : createGitVersionControl(),
      generator: args.flags.has('no-generator') ? null : createAnthropicBodyGenerator(config),
    }
  );

  ui.success(`Created plan #${result.entity.number}: ${result.entity.title}`, result.entity.url);
  ui.bullet(`priority: ${result.input.priority}, domain: ${result.input.domain}`);
  ui.bullet(`body: ${result.bodySource}`);

  switch (result.branchOutcome) {
    case 'created':
      ui.success(`Created branch ${result.branch}`);
      break;
    case 'switched':
      ui.info(`Switched to existing branch ${result.branch}`);
      break;
    case 'skipped':
      ui.info(`Branch step skipped; branch name would be ${result.branch}`);
      break;
    case 'failed':
      ui.warn(`Could not create branch ${result.branch}`, result.branchError);
      return EXIT_PENDING;
  }

  return EXIT_OK;
}

runMain(main);
