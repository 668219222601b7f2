/**
 * hcg-setup runs
 *
 * Recent runs of the build workflow.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { SetupError } from '../errors';
import { ShellCommandRunner } from '../exec/command-runner';
import { prepareSearchPath } from '../exec/search-path';
import { formatElapsed, getRunUrl, type WorkflowRun } from '../github';
import { configureLogger, logFullError } from '../logger';
import { fetchRecentRuns, resolveRepo } from '../services/github.service';
import { displaySetupError } from '../summary';

function runIcon(run: WorkflowRun): string {
  if (run.conclusion === 'success') return chalk.green('✓');
  if (run.conclusion === 'failure') return chalk.red('✗');
  if (run.status === 'in_progress') return chalk.yellow('●');
  return chalk.gray('○');
}

export function formatRunLines(run: WorkflowRun, repo: string, now: Date = new Date()): string[] {
  return [
    `  ${runIcon(run)} ${run.title}  ${chalk.gray(run.branch)}  ${chalk.gray(formatElapsed(run.createdAt, now))}`,
    chalk.gray(`      ${getRunUrl(repo, run.id)}`),
  ];
}

export const runsCommand = new Command('runs')
  .description('List recent build workflow runs')
  .option('-n, --limit <count>', 'Number of runs to show', '5')
  .option('--repo <owner/name>', 'GitHub repository (defaults to the origin remote)')
  .option('-C, --cwd <dir>', 'Unity project root (defaults to the current directory)')
  .option('--json', 'Output as JSON')
  .action(async (options: { limit: string; repo?: string; cwd?: string; json?: boolean }) => {
    const projectRoot = path.resolve(options.cwd ?? process.cwd());
    configureLogger(projectRoot);

    const limit = parseInt(options.limit, 10);
    if (Number.isNaN(limit) || limit < 1) {
      console.log(chalk.red(`\n  --limit must be a positive number, got "${options.limit}"\n`));
      process.exit(1);
    }

    const runner = new ShellCommandRunner({ cwd: projectRoot, searchPath: prepareSearchPath() });

    try {
      const repo = await resolveRepo(runner, options.repo);
      const runs = await fetchRecentRuns(runner, repo, limit);

      if (options.json) {
        console.log(JSON.stringify(runs.map((run) => ({ ...run, url: getRunUrl(repo, run.id) })), null, 2));
        return;
      }

      console.log(chalk.bold(`\n  Recent runs of build.yml (${repo})\n`));
      if (runs.length === 0) {
        console.log(chalk.gray('  No workflow runs found. Start one with: hcg-setup build\n'));
        return;
      }

      const now = new Date();
      for (const run of runs) {
        for (const line of formatRunLines(run, repo, now)) {
          console.log(line);
        }
      }
      console.log('');
    } catch (error) {
      if (error instanceof SetupError) {
        logFullError('runs', error);
        displaySetupError(error);
        process.exit(1);
      }
      throw error;
    }
  });
