//NOTE(self): Follow a release through the downstream feedstock
//NOTE(self): Usage: npm run release:monitor -- <tracking-issue-number>
//NOTE(self): Exit 0 merged or pre-release, 1 waiting, 2 action needed or bad input

import { startup, runMain, parseCliArgs, parseIssueNumber } from '@modules/cli.js';
import { requireGitHub } from '@modules/config.js';
import { createGitHubTracker, createGitHubPullRequestSource } from '@modules/tracker.js';
import { runReleaseMonitor, summarizeChecks, type MonitorReport } from '@modules/release-monitor.js';
import { ui } from '@modules/ui.js';

function printReport(report: MonitorReport): void {
  if (report.fields) {
    ui.bullet(`version: ${report.fields.version}`);
    ui.bullet(`sha256: ${report.fields.sha256}`);
    ui.bullet(`source: ${report.fields.sourceUrl}`);
  }
  if (report.elapsed) {
    ui.bullet(report.elapsed.message);
  }

  for (const status of report.open ?? []) {
    const { pullRequest } = status;
    ui.info(`#${pullRequest.number} ${pullRequest.title} by ${pullRequest.author}`, pullRequest.url);
    ui.bullet(status.checks ? summarizeChecks(status.checks) : `checks unavailable: ${status.checksError ?? 'unknown error'}`);
  }

  ui.line();
  if (report.exitCode === 0) ui.success(report.message, report.merged?.url);
  else if (report.exitCode === 1) ui.warn(report.message);
  else ui.error(report.message);
}

async function main(): Promise<number> {
  const config = startup();
  const { repo } = await requireGitHub(config);

  const args = parseCliArgs(process.argv.slice(2));
  const trackingNumber = parseIssueNumber(args.positionals[0], 'tracking issue number');

  ui.header(`Release monitor · ${config.release.package} → ${config.release.downstream.owner}/${config.release.downstream.repo}`);

  const report = await runReleaseMonitor({
    tracker: createGitHubTracker(repo),
    downstream: createGitHubPullRequestSource(config.release.downstream),
    trackingNumber,
    packageName: config.release.package,
  });

  printReport(report);
  return report.exitCode;
}

runMain(main);
