/**
 * Boilerplate generation, writing and removal
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { BOILERPLATE_PATHS, GEMFILE_LOCK_PATH } from '../config';
import type { CommandRunner } from '../exec/command-runner';
import { createCommandLogger } from '../logger';
import { buildWorkflow, fastfile, gemfile, matchfile } from '../templates';
import type { GeneratedFile, StepOutcome } from '../types';

const log = createCommandLogger('boilerplate');

/**
 * The fixed CI/CD file set. Only the workflow depends on the game name.
 */
export function generateBoilerplate(gameName: string): GeneratedFile[] {
  return [
    { path: BOILERPLATE_PATHS.workflow, content: buildWorkflow(gameName) },
    { path: BOILERPLATE_PATHS.fastfile, content: fastfile() },
    { path: BOILERPLATE_PATHS.matchfile, content: matchfile() },
    { path: BOILERPLATE_PATHS.gemfile, content: gemfile() },
  ];
}

/**
 * Write files under targetDir, replacing whatever is there
 */
export async function writeBoilerplateFiles(
  files: GeneratedFile[],
  targetDir: string,
  onWrite: (filePath: string) => void = () => {}
): Promise<string[]> {
  const written: string[] = [];

  for (const file of files) {
    const fullPath = path.join(targetDir, file.path);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, file.content, 'utf-8');

    log.info(`Wrote ${file.path}`);
    written.push(file.path);
    onWrite(file.path);
  }

  return written;
}

/**
 * Resolve the Gemfile into Gemfile.lock with bundler, when it is installed
 */
export async function generateLockfile(runner: CommandRunner): Promise<StepOutcome> {
  const step = 'Generate Gemfile.lock';

  if (!(await runner.exists('bundle'))) {
    log.warn('bundler not found');
    return {
      step,
      status: 'failed',
      message: "bundler not found. Run 'bundle lock' manually to generate Gemfile.lock.",
      fix: 'bundle lock',
    };
  }

  const result = await runner.attempt('bundle lock');
  if (result.ok) {
    return { step, status: 'succeeded', message: 'Resolved gems', artifact: GEMFILE_LOCK_PATH, output: result.output };
  }

  log.warn('bundle lock failed', result.output);
  return {
    step,
    status: 'failed',
    message: 'bundle lock failed. Run it manually.',
    fix: 'bundle lock',
    output: result.output,
  };
}

/**
 * Every file this tool writes into a project, in removal order
 */
export function boilerplateRemovalPaths(): string[] {
  return [...Object.values(BOILERPLATE_PATHS), GEMFILE_LOCK_PATH];
}

/**
 * Delete the generated CI/CD files that exist
 */
export async function removeBoilerplateFiles(targetDir: string): Promise<string[]> {
  const removed: string[] = [];

  for (const relativePath of boilerplateRemovalPaths()) {
    const fullPath = path.join(targetDir, relativePath);
    const exists = await fs.stat(fullPath).then(() => true).catch(() => false);
    if (!exists) {
      continue;
    }

    await fs.unlink(fullPath);
    log.info(`Removed ${relativePath}`);
    removed.push(relativePath);
  }

  return removed;
}
