/**
 * hcg-setup configs [GameName]
 *
 * Download GoogleService-Info.plist and google-services.json again. The
 * Firebase project comes from an already downloaded config, or from the
 * game name when there is none yet.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import { slugify } from '../config';
import { ShellCommandRunner } from '../exec/command-runner';
import { prepareSearchPath } from '../exec/search-path';
import { getFirebaseConsoleUrl } from '../gcp/firebase';
import { configureLogger } from '../logger';
import { downloadFirebaseConfigs } from '../services/provisioning.service';
import { firebaseProjectIdFromReport, inspectProject } from '../services/status.service';
import { displayOutcome } from '../summary';

export const configsCommand = new Command('configs')
  .description('Download the Firebase config files for the project again')
  .argument('[gameName]', 'Game name, used when no config has been downloaded yet')
  .option('-C, --cwd <dir>', 'Unity project root (defaults to the current directory)')
  .option('--verbose', 'Show command output for failed downloads')
  .action(async (gameName: string | undefined, options: { cwd?: string; verbose?: boolean }) => {
    const projectRoot = path.resolve(options.cwd ?? process.cwd());
    configureLogger(projectRoot);

    const report = await inspectProject(projectRoot);
    const projectId = firebaseProjectIdFromReport(report) ?? (gameName ? slugify(gameName) : null);

    if (!projectId) {
      console.log(chalk.red('\n  No Firebase config found and no game name given.'));
      console.log(chalk.gray('  Usage: hcg-setup configs <GameName>\n'));
      process.exit(1);
    }

    console.log(chalk.bold(`\n  Firebase configs for ${projectId}\n`));

    const runner = new ShellCommandRunner({ cwd: projectRoot, searchPath: prepareSearchPath() });
    const spinner = ora('Downloading...').start();
    const outcomes = await downloadFirebaseConfigs(projectId, projectRoot, runner, ['ios', 'android'], (m) => {
      spinner.text = m;
    });
    spinner.stop();

    for (const outcome of outcomes) {
      displayOutcome(outcome, options.verbose);
    }

    console.log(chalk.gray(`\n  Console: ${getFirebaseConsoleUrl(projectId)}\n`));
  });
