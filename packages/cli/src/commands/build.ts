/**
 * hcg-setup build
 *
 * Dispatch the generated build.yml workflow with the GitHub CLI.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { SetupError } from '../errors';
import { ShellCommandRunner } from '../exec/command-runner';
import { prepareSearchPath } from '../exec/search-path';
import { BUILD_TARGETS, DISTRIBUTIONS, getWorkflowUrl, toBuildTarget, toDistribution } from '../github';
import { configureLogger, logFullError } from '../logger';
import { resolveRepository, triggerBuild } from '../services/github.service';
import { displayOutcome, displaySetupError } from '../summary';

interface BuildOptions {
  cwd?: string;
  repo?: string;
  ref?: string;
  platform: string;
  distribution: string;
  defines?: string;
}

export const buildCommand = new Command('build')
  .description('Trigger the build workflow on GitHub Actions')
  .addOption(new Option('-p, --platform <target>', 'Platform to build').choices(BUILD_TARGETS).default('iOS'))
  .addOption(
    new Option('-d, --distribution <target>', 'Distribution target').choices(DISTRIBUTIONS).default('None')
  )
  .option('--defines <defines>', 'Extra script defines, semicolon-separated (e.g. DEV_MODE;EXTRA_LOGGING)')
  .option('--repo <owner/name>', 'GitHub repository (defaults to the origin remote)')
  .option('--ref <branch>', 'Branch to build (defaults to the current branch)')
  .option('-C, --cwd <dir>', 'Unity project root (defaults to the current directory)')
  .action(async (options: BuildOptions) => {
    const projectRoot = path.resolve(options.cwd ?? process.cwd());
    configureLogger(projectRoot);

    const buildTarget = toBuildTarget(options.platform);
    const distribution = toDistribution(options.distribution);
    if (!buildTarget || !distribution) {
      console.log(chalk.red('\n  Unknown platform or distribution.\n'));
      process.exit(1);
    }

    const runner = new ShellCommandRunner({ cwd: projectRoot, searchPath: prepareSearchPath() });

    try {
      const { repo, ref } = await resolveRepository(runner, options);
      console.log(chalk.bold(`\n  Build ${repo}@${ref}\n`));

      const spinner = ora('Dispatching build.yml...').start();
      const outcome = await triggerBuild(runner, {
        repo,
        ref,
        buildTarget,
        distribution,
        scriptDefines: options.defines,
      }).finally(() => spinner.stop());

      displayOutcome(outcome, true);
      if (outcome.status !== 'succeeded') {
        if (outcome.fix) {
          console.log(chalk.gray(`\n  Retry manually: ${outcome.fix}\n`));
        }
        process.exit(1);
      }

      console.log(chalk.gray(`\n  Runs: ${getWorkflowUrl(repo)}\n`));
    } catch (error) {
      if (error instanceof SetupError) {
        logFullError('build', error);
        displaySetupError(error);
        process.exit(1);
      }
      throw error;
    }
  });
