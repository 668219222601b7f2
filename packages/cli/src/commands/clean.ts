/**
 * hcg-setup clean
 *
 * Remove the generated CI/CD files (build.yml, Fastfile, Matchfile, Gemfile
 * and Gemfile.lock). Firebase configs and the Firebase project are left alone.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import * as path from 'path';
import { configureLogger } from '../logger';
import { boilerplateRemovalPaths, removeBoilerplateFiles } from '../scaffold/boilerplate';

export const cleanCommand = new Command('clean')
  .description('Remove the generated CI/CD files')
  .option('-C, --cwd <dir>', 'Unity project root (defaults to the current directory)')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (options: { cwd?: string; yes?: boolean }) => {
    const projectRoot = path.resolve(options.cwd ?? process.cwd());
    configureLogger(projectRoot);

    if (!options.yes) {
      console.log(chalk.yellow('\n  This will delete:'));
      for (const file of boilerplateRemovalPaths()) {
        console.log(chalk.gray(`    ${file}`));
      }
      console.log('');

      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        {
          type: 'confirm',
          name: 'confirm',
          message: 'Remove CI/CD boilerplate?',
          default: false,
        },
      ]);

      if (!confirm) {
        console.log(chalk.gray('\n  Cancelled.\n'));
        return;
      }
    }

    const removed = await removeBoilerplateFiles(projectRoot);
    if (removed.length === 0) {
      console.log(chalk.gray('\n  Nothing to remove.\n'));
      return;
    }

    console.log('');
    for (const file of removed) {
      console.log(chalk.green(`  ✓ Removed ${file}`));
    }
    console.log('');
  });
