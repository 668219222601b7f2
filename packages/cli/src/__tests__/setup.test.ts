import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { runSetup, type SetupReporter } from '../commands/setup';
import { resolveSetupConfig } from '../config';
import { SetupError } from '../errors';
import type { StepOutcome } from '../types';
import { FakeCommandRunner } from './fake-runner';

const SETTINGS = 'PlayerSettings:\n  applicationIdentifier:\n    iPhone: com.x.mygame\n    Android: com.x.mygame\n';

async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `hcg-setup-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tempDir, { recursive: true });
  return tempDir;
}

async function cleanupTempDir(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

function recordingReporter() {
  const info: string[] = [];
  const warnings: string[] = [];
  const shown: StepOutcome[] = [];
  const reporter: SetupReporter = {
    info: (m) => info.push(m),
    warn: (m) => warnings.push(m),
    progress: (m) => info.push(m),
    outcomes: (o) => shown.push(...o),
  };
  return { reporter, info, warnings, shown };
}

function readyRunner(): FakeCommandRunner {
  return new FakeCommandRunner({
    tools: ['node', 'firebase', 'gcloud', 'bundle'],
    capture: { 'node --version': 'v22.0.0', 'firebase projects:list': 'hcg-my-game' },
  });
}

describe('runSetup', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    await fs.mkdir(path.join(tempDir, 'ProjectSettings'));
    await fs.writeFile(path.join(tempDir, 'ProjectSettings', 'ProjectSettings.asset'), SETTINGS);
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should provision Firebase and write the CI/CD files', async () => {
    const runner = readyRunner();
    const { reporter, shown } = recordingReporter();

    const result = await runSetup(resolveSetupConfig('My Game', { cwd: tempDir }), runner, reporter);

    expect(result.bundleIds).toEqual({ ios: 'com.x.mygame', android: 'com.x.mygame' });
    expect(runner.calls).toContain('firebase projects:create "hcg-my-game" --display-name "My Game"');
    expect(runner.calls[runner.calls.length - 1]).toBe('bundle lock');
    expect(result.outcomes.map((o) => o.step)).toEqual([
      'Node.js',
      'Firebase CLI',
      'Firebase login',
      'Create Firebase project',
      'Register iOS app',
      'Register Android app',
      'Download GoogleService-Info.plist',
      'Download google-services.json',
      'Grant CI service account',
      'Generate Gemfile.lock',
    ]);
    expect(shown).toEqual(result.outcomes);

    const workflow = await fs.readFile(path.join(tempDir, '.github', 'workflows', 'build.yml'), 'utf-8');
    expect(workflow.split('\n')[0]).toBe('name: My Game Build');
  });

  it('should end the summary with the service account step', async () => {
    const { reporter } = recordingReporter();

    const result = await runSetup(resolveSetupConfig('My Game', { cwd: tempDir }), readyRunner(), reporter);
    const lines = result.summary.trimEnd().split('\n');

    expect(lines[0]).toBe('Done! Files created:');
    expect(lines).not.toContain('Steps that did not complete:');
    expect(lines[lines.length - 2]).toBe(
      "  2. If service account wasn't added, add ci-distribution@hcgamesfirebase.iam.gserviceaccount.com"
    );
    expect(lines[lines.length - 1]).toBe(
      '     with "Firebase App Distribution Admin" role (roles/firebaseappdistro.admin) in Google Cloud Console IAM.'
    );
  });

  it('should only write files with --skip-firebase', async () => {
    const runner = new FakeCommandRunner({ tools: ['bundle'] });
    const { reporter } = recordingReporter();

    const result = await runSetup(
      resolveSetupConfig('My Game', { cwd: tempDir, skipFirebase: true }),
      runner,
      reporter
    );

    expect(runner.calls).toEqual(['bundle lock']);
    expect(result.outcomes[0]).toEqual({
      step: 'Firebase',
      status: 'skipped',
      message: 'Skipped with --skip-firebase',
    });
    expect(result.writtenFiles).toHaveLength(4);
  });

  it('should warn about a name Firebase may reject', async () => {
    const { reporter, warnings } = recordingReporter();

    await runSetup(resolveSetupConfig("Tom's Game", { cwd: tempDir, skipFirebase: true }), new FakeCommandRunner(), reporter);

    expect(warnings[0]).toBe(
      `Project ID "hcg-tom's-game" may be rejected by Firebase: Project ID can only contain lowercase letters, digits, and hyphens`
    );
  });

  it('should stop before writing anything without ProjectSettings.asset', async () => {
    await fs.rm(path.join(tempDir, 'ProjectSettings'), { recursive: true });
    const { reporter } = recordingReporter();

    await expect(
      runSetup(resolveSetupConfig('My Game', { cwd: tempDir, skipFirebase: true }), new FakeCommandRunner(), reporter)
    ).rejects.toBeInstanceOf(SetupError);

    const exists = await fs.stat(path.join(tempDir, 'Gemfile')).then(() => true).catch(() => false);
    expect(exists).toBe(false);
  });
});
