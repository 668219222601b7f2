/**
 * hcg-setup [setup] <GameName>
 *
 * Bootstrap Firebase and CI/CD for the Unity project in the current
 * directory: tooling checks, bundle IDs, Firebase project and apps, config
 * downloads, CI service account, boilerplate files and Gemfile.lock.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
  resolveSetupConfig,
  SUBCOMMAND_NAMES,
  type SetupCommandOptions,
  type SetupConfig,
} from '../config';
import { SetupError } from '../errors';
import { ShellCommandRunner, type CommandRunner } from '../exec/command-runner';
import { prepareSearchPath } from '../exec/search-path';
import { isValidProjectId } from '../gcp/firebase';
import { configureLogger, createCommandLogger, getLogPath, logFullError } from '../logger';
import { generateBoilerplate, generateLockfile, writeBoilerplateFiles } from '../scaffold/boilerplate';
import { checkPrerequisites } from '../services/prerequisites.service';
import { provisionFirebase } from '../services/provisioning.service';
import { displayOutcome, displaySetupError, renderSummary } from '../summary';
import type { StepOutcome } from '../types';
import { readBundleIds, type BundleIds } from '../unity/project-settings';

const log = createCommandLogger('setup');

export const USAGE = [
  'Usage: hcg-setup <GameName>',
  'Run from the root of your Unity project.',
  `A game named ${SUBCOMMAND_NAMES.join(', ')} needs the explicit form: hcg-setup setup <GameName>`,
].join('\n');

export interface SetupReporter {
  info(message: string): void;
  warn(message: string): void;
  /** A long-running step started */
  progress(message: string): void;
  outcomes(outcomes: StepOutcome[]): void;
}

export interface SetupResult {
  bundleIds: BundleIds;
  writtenFiles: string[];
  outcomes: StepOutcome[];
  summary: string;
}

/**
 * Run every setup step in order. Throws SetupError on fatal conditions.
 */
export async function runSetup(
  config: SetupConfig,
  runner: CommandRunner,
  reporter: SetupReporter
): Promise<SetupResult> {
  const { gameName, projectId, projectRoot } = config;
  const outcomes: StepOutcome[] = [];
  log.info('Starting setup', config);

  reporter.info(`Setting up CI/CD for ${gameName}...`);

  const validation = isValidProjectId(projectId);
  if (!validation.valid) {
    reporter.warn(`Project ID "${projectId}" may be rejected by Firebase: ${validation.error}`);
  }

  // Prerequisites
  if (config.skipFirebase) {
    outcomes.push({ step: 'Firebase', status: 'skipped', message: 'Skipped with --skip-firebase' });
  } else {
    const prerequisites = await checkPrerequisites(runner, { onLog: (m) => reporter.info(m) });
    reporter.outcomes(prerequisites);
    outcomes.push(...prerequisites);
  }

  // Bundle IDs
  const bundleIds = await readBundleIds(projectRoot, (m) => reporter.warn(m));
  reporter.info(`iOS bundle ID: ${bundleIds.ios ?? 'None'}`);
  reporter.info(`Android bundle ID: ${bundleIds.android ?? 'None'}`);

  // Firebase
  if (!config.skipFirebase) {
    const provisioning = await provisionFirebase(
      { gameName, projectId, bundleIds, projectRoot },
      runner,
      (m) => reporter.progress(m)
    );
    reporter.outcomes(provisioning);
    outcomes.push(...provisioning);
  }

  // Boilerplate
  reporter.info('Generating CI/CD files...');
  const writtenFiles = await writeBoilerplateFiles(
    generateBoilerplate(gameName),
    projectRoot,
    (file) => reporter.info(`  Created ${file}`)
  );

  reporter.progress('Generating Gemfile.lock...');
  const lock = await generateLockfile(runner);
  reporter.outcomes([lock]);
  outcomes.push(lock);

  const summary = renderSummary({ writtenFiles, outcomes });
  log.info('Setup finished', { outcomes: outcomes.map((o) => `${o.step}: ${o.status}`) });

  return { bundleIds, writtenFiles, outcomes, summary };
}

/**
 * Terminal reporter: gray progress lines, an ora spinner for running steps
 */
export function createConsoleReporter(verbose: boolean): SetupReporter {
  let spinner: Ora | null = null;

  const stopSpinner = () => {
    if (spinner) {
      spinner.stop();
      spinner = null;
    }
  };

  return {
    info(message) {
      stopSpinner();
      console.log(chalk.gray(`  ${message}`));
    },
    warn(message) {
      stopSpinner();
      for (const line of message.split('\n')) {
        console.log(chalk.yellow(`  ${line}`));
      }
    },
    progress(message) {
      if (spinner) {
        spinner.text = message;
      } else {
        spinner = ora(message).start();
      }
    },
    outcomes(outcomes) {
      stopSpinner();
      for (const outcome of outcomes) {
        displayOutcome(outcome, verbose);
      }
    },
  };
}

export const setupCommand = new Command('setup')
  .description('Create the Firebase project and CI/CD files for a Unity game')
  .argument('[gameName]', 'Display name of the game, e.g. "Space Game"')
  .option('-C, --cwd <dir>', 'Unity project root (defaults to the current directory)')
  .option('--skip-firebase', 'Only write the CI/CD files')
  .option('--verbose', 'Show command output for failed steps')
  .action(async (gameName: string | undefined, options: SetupCommandOptions) => {
    if (!gameName) {
      console.log(USAGE);
      process.exit(1);
    }

    const config = resolveSetupConfig(gameName, options);
    configureLogger(config.projectRoot);

    console.log(chalk.bold('\n  hcg-setup\n'));

    const runner = new ShellCommandRunner({
      cwd: config.projectRoot,
      searchPath: prepareSearchPath(),
    });

    try {
      const result = await runSetup(config, runner, createConsoleReporter(config.verbose));
      console.log('');
      console.log(chalk.green(result.summary));
      console.log(chalk.gray(`  Debug log: ${getLogPath()}\n`));
    } catch (error) {
      if (error instanceof SetupError) {
        logFullError('setup', error);
        displaySetupError(error);
        process.exit(1);
      }
      throw error;
    }
  });
