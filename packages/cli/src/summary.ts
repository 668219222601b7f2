/**
 * End-of-run report
 *
 * renderSummary is plain text built only from its input, so the checklist
 * can be asserted without running any step.
 */

import chalk from 'chalk';
import * as path from 'path';
import {
  ANDROID_CONFIG_FILENAME,
  CI_SERVICE_ACCOUNT,
  CI_SERVICE_ACCOUNT_ROLE,
  CI_SERVICE_ACCOUNT_ROLE_TITLE,
  FIREBASE_CONFIG_DIR,
  IOS_CONFIG_FILENAME,
  REQUIRED_GITHUB_SECRETS,
} from './config';
import type { SetupError } from './errors';
import type { StepOutcome } from './types';

export interface SummaryInput {
  writtenFiles: string[];
  outcomes: StepOutcome[];
}

const CONFIG_ARTIFACTS = [IOS_CONFIG_FILENAME, ANDROID_CONFIG_FILENAME].map((file) =>
  path.join(FIREBASE_CONFIG_DIR, file)
);

function producedArtifacts(outcomes: StepOutcome[]): string[] {
  return outcomes.flatMap((o) => (o.status === 'succeeded' && o.artifact ? [o.artifact] : []));
}

export function renderSummary(input: SummaryInput): string {
  const { writtenFiles, outcomes } = input;
  const produced = producedArtifacts(outcomes);
  const lines: string[] = [];

  lines.push('Done! Files created:');
  for (const file of [...writtenFiles, ...produced]) {
    lines.push(`  ${file}`);
  }

  const attention = outcomes.filter((o) => o.status !== 'succeeded');
  if (attention.length > 0) {
    lines.push('');
    lines.push('Steps that did not complete:');
    for (const outcome of attention) {
      lines.push(`  [${outcome.status}] ${outcome.step}: ${outcome.message}`);
    }
  }

  const manual: string[][] = [];

  manual.push([
    'Ensure these GitHub secrets are set (org-level or repo-level):',
    ...REQUIRED_GITHUB_SECRETS.map((group) => `   - ${group.join(', ')}`),
  ]);

  const missingConfigs = CONFIG_ARTIFACTS.filter((artifact) => !produced.includes(artifact));
  if (missingConfigs.length > 0) {
    manual.push([
      `Download from Firebase Console into ${FIREBASE_CONFIG_DIR}: ${missingConfigs
        .map((artifact) => path.basename(artifact))
        .join(', ')}`,
    ]);
  }

  for (const outcome of attention) {
    if (outcome.fix && !outcome.step.startsWith('Grant CI service account')) {
      manual.push([`${outcome.step}: ${outcome.fix.split('\n')[0]}`]);
    }
  }

  manual.push([
    `If service account wasn't added, add ${CI_SERVICE_ACCOUNT}`,
    `   with "${CI_SERVICE_ACCOUNT_ROLE_TITLE}" role (${CI_SERVICE_ACCOUNT_ROLE}) in Google Cloud Console IAM.`,
  ]);

  lines.push('');
  lines.push('Remaining manual steps:');
  manual.forEach((entry, index) => {
    const [first, ...rest] = entry;
    lines.push(`  ${index + 1}. ${first}`);
    for (const line of rest) {
      lines.push(`  ${line}`);
    }
  });

  return lines.join('\n') + '\n';
}

/**
 * Print one outcome line, with the captured output when verbose
 */
export function displayOutcome(outcome: StepOutcome, verbose?: boolean): void {
  const icon =
    outcome.status === 'succeeded' ? chalk.green('✓') :
    outcome.status === 'skipped' ? chalk.gray('-') :
    chalk.yellow('⚠');

  const color =
    outcome.status === 'succeeded' ? chalk.white :
    outcome.status === 'skipped' ? chalk.gray :
    chalk.yellow;

  console.log(`  ${icon} ${color(outcome.step)} ${chalk.gray(outcome.message)}`);

  if (verbose && outcome.status === 'failed' && outcome.output) {
    for (const line of outcome.output.split('\n')) {
      console.log(chalk.gray(`      ${line}`));
    }
  }
}

/**
 * Print a fatal error with its hints
 */
export function displaySetupError(error: SetupError): void {
  console.log(chalk.red(`\n  Error: ${error.message}`));
  for (const hint of error.hints) {
    console.log(chalk.gray(`    ${hint}`));
  }
  console.log('');
}
