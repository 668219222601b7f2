/**
 * hcg-setup status
 *
 * Show which Firebase configs and CI/CD files are present in the project.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { inspectProject, type ComponentStatus, type StatusReport } from '../services/status.service';

function shortenUrl(url: string | null): string {
  if (!url) return '—';
  return url.replace('https://github.com/', '');
}

function statusLine(status: ComponentStatus, label: string, detail?: string | null): string {
  const icon = status === 'present' ? chalk.green('✓') : chalk.red('✗');
  const name = label.padEnd(16);
  return detail ? `  ${icon} ${name}${chalk.gray(detail)}` : `  ${icon} ${name}`;
}

export function formatStatusReport(report: StatusReport): string[] {
  const lines: string[] = [];

  lines.push(chalk.bold('  Project Info'));
  if (report.project) {
    lines.push(`    Product Name       ${report.project.productName ?? '—'}`);
    lines.push(`    Company Name       ${report.project.companyName ?? '—'}`);
    lines.push(`    iOS Bundle ID      ${report.project.iosBundleId ?? '—'}`);
    lines.push(`    Android Bundle ID  ${report.project.androidBundleId ?? '—'}`);
  } else {
    lines.push(chalk.yellow('    ProjectSettings.asset not found'));
  }

  const { firebaseIos, firebaseAndroid, workflow, fastfile, matchfile, gemfile, gitignore } = report;

  lines.push('');
  lines.push(chalk.bold('  Firebase'));
  lines.push(
    statusLine(
      firebaseIos.status,
      'iOS Config',
      firebaseIos.status === 'present' ? `project: ${firebaseIos.projectId ?? '—'}` : null
    )
  );
  lines.push(
    statusLine(
      firebaseAndroid.status,
      'Android Config',
      firebaseAndroid.status === 'present' ? `project: ${firebaseAndroid.projectId ?? '—'}` : null
    )
  );

  lines.push('');
  lines.push(chalk.bold('  CI/CD Boilerplate'));
  lines.push(
    statusLine(
      workflow.status,
      'build.yml',
      workflow.status === 'present' ? `game_name: ${workflow.gameName ?? '—'}` : null
    )
  );
  lines.push(statusLine(fastfile.status, 'Fastfile'));
  lines.push(
    statusLine(
      matchfile.status,
      'Matchfile',
      matchfile.status === 'present' ? `repo: ${shortenUrl(matchfile.certRepoUrl)}` : null
    )
  );
  lines.push(
    statusLine(
      gemfile.status,
      'Gemfile',
      gemfile.status === 'present' ? (gemfile.hasLockFile ? '(lock: present)' : '(lock: missing)') : null
    )
  );
  lines.push(statusLine(gitignore.status, '.gitignore'));

  return lines;
}

export const statusCommand = new Command('status')
  .description('Show Firebase config and CI/CD file status for the project')
  .option('-C, --cwd <dir>', 'Unity project root (defaults to the current directory)')
  .option('--json', 'Output as JSON')
  .action(async (options: { cwd?: string; json?: boolean }) => {
    const projectRoot = path.resolve(options.cwd ?? process.cwd());
    const report = await inspectProject(projectRoot);

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    console.log(chalk.bold('\n  hcg-setup status\n'));
    for (const line of formatStatusReport(report)) {
      console.log(line);
    }
    console.log('');
  });
