/**
 * Local tooling checks run before provisioning
 *
 * Node.js >= 20 (the Firebase CLI needs it), the Firebase CLI itself, and a
 * logged-in Firebase account. Missing tooling that cannot be installed stops
 * the run; everything else is reported as an outcome.
 */

import { MIN_NODE_MAJOR } from '../config';
import { CommandFailedError, SetupError } from '../errors';
import type { CommandRunner } from '../exec/command-runner';
import { checkFirebaseAuth, isFirebaseInstalled, loginToFirebase } from '../gcp/firebase';
import { createCommandLogger } from '../logger';
import type { StepOutcome } from '../types';

const log = createCommandLogger('prerequisites');

export interface PrerequisiteOptions {
  onLog?: (message: string) => void;
  platform?: NodeJS.Platform;
}

export function parseNodeMajor(version: string): number | null {
  const match = version.trim().match(/^v(\d+)/);
  return match ? parseInt(match[1], 10) : null;
}

async function readNodeVersion(runner: CommandRunner): Promise<string | null> {
  const version = await runner.run('node --version', { capture: true, check: false });
  return version ? version : null;
}

export async function checkNodeVersion(
  runner: CommandRunner,
  onLog: (message: string) => void = () => {}
): Promise<StepOutcome> {
  const step = 'Node.js';

  if (!(await runner.exists('node'))) {
    return { step, status: 'skipped', message: 'node not found on PATH' };
  }

  const version = await readNodeVersion(runner);
  const major = version ? parseNodeMajor(version) : null;
  if (version === null || major === null) {
    return { step, status: 'skipped', message: 'Could not read the Node.js version' };
  }

  if (major >= MIN_NODE_MAJOR) {
    return { step, status: 'succeeded', message: `Version ${version}` };
  }

  onLog(`Node.js ${version} is too old for Firebase CLI (need >= v${MIN_NODE_MAJOR}).`);
  if (!(await runner.exists('brew'))) {
    throw new SetupError(`Please upgrade Node.js to >= v${MIN_NODE_MAJOR}.`, [
      `Installed: ${version}`,
      'Download a current release from https://nodejs.org',
    ]);
  }

  onLog('Upgrading Node.js via Homebrew...');
  await runner.run('brew upgrade node || brew install node', { check: false });

  const upgraded = await readNodeVersion(runner);
  const upgradedMajor = upgraded ? parseNodeMajor(upgraded) : null;
  if (upgraded !== null && upgradedMajor !== null && upgradedMajor >= MIN_NODE_MAJOR) {
    return { step, status: 'succeeded', message: `Upgraded from ${version} to ${upgraded}` };
  }

  return {
    step,
    status: 'failed',
    message: `Still on ${upgraded ?? version} after the Homebrew upgrade`,
    fix: 'brew upgrade node',
  };
}

async function installOrFail(runner: CommandRunner, commandLine: string): Promise<void> {
  try {
    await runner.run(commandLine);
  } catch (error) {
    if (error instanceof CommandFailedError) {
      log.error('Firebase CLI install failed', error);
      throw new SetupError(`Installing the Firebase CLI failed: ${commandLine}`, [
        'Install it manually: npm install -g firebase-tools',
        'https://firebase.google.com/docs/cli',
      ]);
    }
    throw error;
  }
}

export async function checkFirebaseCli(
  runner: CommandRunner,
  options: PrerequisiteOptions = {}
): Promise<StepOutcome> {
  const step = 'Firebase CLI';
  const onLog = options.onLog ?? (() => {});
  const platform = options.platform ?? process.platform;

  if (await isFirebaseInstalled(runner)) {
    return { step, status: 'succeeded', message: 'Installed' };
  }

  if (await runner.exists('npm')) {
    onLog('Installing Firebase CLI via npm...');
    await installOrFail(runner, 'npm install -g firebase-tools');
    return { step, status: 'succeeded', message: 'Installed via npm' };
  }

  if (platform === 'darwin' && (await runner.exists('brew'))) {
    onLog('Installing Firebase CLI via Homebrew...');
    await installOrFail(runner, 'brew install firebase-cli');
    return { step, status: 'succeeded', message: 'Installed via Homebrew' };
  }

  throw new SetupError('Install Firebase CLI manually:', [
    'npm install -g firebase-tools',
    'https://firebase.google.com/docs/cli',
  ]);
}

export async function checkFirebaseLogin(
  runner: CommandRunner,
  onLog: (message: string) => void = () => {}
): Promise<StepOutcome> {
  const step = 'Firebase login';

  if (await checkFirebaseAuth(runner)) {
    return { step, status: 'succeeded', message: 'Logged in' };
  }

  onLog('You need to log in to Firebase.');
  await loginToFirebase(runner);

  if (await checkFirebaseAuth(runner)) {
    return { step, status: 'succeeded', message: 'Logged in' };
  }
  return {
    step,
    status: 'failed',
    message: 'Not logged in; Firebase steps will fail',
    fix: 'firebase login',
  };
}

/**
 * Node.js, Firebase CLI, then login, in that order
 */
export async function checkPrerequisites(
  runner: CommandRunner,
  options: PrerequisiteOptions = {}
): Promise<StepOutcome[]> {
  const onLog = options.onLog ?? (() => {});
  const outcomes: StepOutcome[] = [];

  outcomes.push(await checkNodeVersion(runner, onLog));
  outcomes.push(await checkFirebaseCli(runner, options));
  outcomes.push(await checkFirebaseLogin(runner, onLog));

  for (const outcome of outcomes) {
    log.info(`${outcome.step}: ${outcome.status} - ${outcome.message}`);
  }
  return outcomes;
}
