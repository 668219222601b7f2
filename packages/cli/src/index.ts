/**
 * @hcg-devops/cli
 *
 * CLI entry point. `hcg-setup "My Game"` runs the setup command.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  setupCommand,
  statusCommand,
  configsCommand,
  cleanCommand,
  buildCommand,
  runsCommand,
} from './commands';
import { SUBCOMMAND_NAMES } from './config';
import { logFullError } from './logger';

const program = new Command();

program
  .name('hcg-setup')
  .description('Bootstrap Firebase and CI/CD for a Unity game project')
  .version('0.1.0');

program.addCommand(setupCommand, { isDefault: true });
program.addCommand(statusCommand);
program.addCommand(configsCommand);
program.addCommand(cleanCommand);
program.addCommand(buildCommand);
program.addCommand(runsCommand);

program.addHelpText(
  'after',
  `\nA game named ${SUBCOMMAND_NAMES.join(', ')} needs the explicit form: hcg-setup setup <GameName>`
);

program.parseAsync().catch((error: unknown) => {
  logFullError('cli', error);
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
