import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { downloadFirebaseConfigs, provisionFirebase, type ProvisionInput } from '../services/provisioning.service';
import { FakeCommandRunner } from './fake-runner';

const SERVICE_ACCOUNT = 'ci-distribution@hcgamesfirebase.iam.gserviceaccount.com';

async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `hcg-provision-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
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

describe('provisionFirebase', () => {
  let tempDir: string;
  let input: ProvisionInput;

  beforeEach(async () => {
    tempDir = await createTempDir();
    input = {
      gameName: 'Space Game',
      projectId: 'hcg-space-game',
      bundleIds: { ios: 'com.test.space', android: 'com.test.space' },
      projectRoot: tempDir,
    };
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should run every Firebase and IAM command in order', async () => {
    const runner = new FakeCommandRunner({ tools: ['gcloud'] });
    const settingsDir = path.join(tempDir, 'Assets', 'Settings');

    await provisionFirebase(input, runner);

    expect(runner.calls).toEqual([
      'firebase projects:create "hcg-space-game" --display-name "Space Game"',
      'firebase apps:create ios --bundle-id "com.test.space" --project "hcg-space-game"',
      'firebase apps:create android --package-name "com.test.space" --project "hcg-space-game"',
      `firebase apps:sdkconfig ios --project "hcg-space-game" --out "${path.join(settingsDir, 'GoogleService-Info.plist')}"`,
      `firebase apps:sdkconfig android --project "hcg-space-game" --out "${path.join(settingsDir, 'google-services.json')}"`,
      `gcloud projects add-iam-policy-binding hcg-space-game --member="serviceAccount:${SERVICE_ACCOUNT}" --role="roles/firebaseappdistro.admin" --quiet`,
    ]);
  });

  it('should report one outcome per step', async () => {
    const runner = new FakeCommandRunner({ tools: ['gcloud'] });

    const outcomes = await provisionFirebase(input, runner);

    expect(outcomes.map((o) => o.step)).toEqual([
      'Create Firebase project',
      'Register iOS app',
      'Register Android app',
      'Download GoogleService-Info.plist',
      'Download google-services.json',
      'Grant CI service account',
    ]);
    expect(outcomes.every((o) => o.status === 'succeeded')).toBe(true);
    expect(outcomes[3].artifact).toBe(path.join('Assets', 'Settings', 'GoogleService-Info.plist'));
    expect(outcomes[5].message).toBe(`Granted roles/firebaseappdistro.admin to ${SERVICE_ACCOUNT}`);
  });

  it('should create Assets/Settings before downloading', async () => {
    await provisionFirebase(input, new FakeCommandRunner({ tools: ['gcloud'] }));

    const stats = await fs.stat(path.join(tempDir, 'Assets', 'Settings'));
    expect(stats.isDirectory()).toBe(true);
  });

  it('should skip registration and download for a missing Android ID', async () => {
    const runner = new FakeCommandRunner({ tools: ['gcloud'] });

    const outcomes = await provisionFirebase(
      { ...input, bundleIds: { ios: 'com.test.space', android: null } },
      runner
    );

    expect(runner.calls.some((c) => c.includes('android'))).toBe(false);
    expect(outcomes[2]).toMatchObject({
      step: 'Register Android app',
      status: 'skipped',
      message: 'No Android bundle ID in ProjectSettings.asset',
    });
    expect(outcomes[4]).toEqual({
      step: 'Download google-services.json',
      status: 'skipped',
      message: 'No Android app was registered',
    });
  });

  it('should still create the project without any bundle IDs', async () => {
    const runner = new FakeCommandRunner({ tools: ['gcloud'] });

    const outcomes = await provisionFirebase({ ...input, bundleIds: { ios: null, android: null } }, runner);

    expect(runner.calls[0]).toBe('firebase projects:create "hcg-space-game" --display-name "Space Game"');
    expect(outcomes.map((o) => o.status)).toEqual([
      'succeeded',
      'skipped',
      'skipped',
      'skipped',
      'skipped',
      'succeeded',
    ]);
  });

  it('should treat an existing project as success', async () => {
    const runner = new FakeCommandRunner({
      tools: ['gcloud'],
      fail: ['firebase projects:create'],
      output: { 'firebase projects:create': 'Error: Failed to create project. ALREADY_EXISTS' },
    });

    const outcomes = await provisionFirebase(input, runner);

    expect(outcomes[0].status).toBe('succeeded');
    expect(outcomes[0].message).toBe('Created hcg-space-game (already existed)');
    expect(outcomes[1].status).toBe('succeeded');
  });

  it('should continue after a failed step and keep the fix', async () => {
    const runner = new FakeCommandRunner({
      tools: ['gcloud'],
      fail: ['firebase apps:create ios'],
      output: { 'firebase apps:create ios': 'Error: PERMISSION_DENIED' },
    });

    const outcomes = await provisionFirebase(input, runner);

    expect(outcomes[1]).toMatchObject({
      step: 'Register iOS app',
      status: 'failed',
      message: 'Permission denied. Make sure you have Firebase Admin permissions on the project.',
      fix: 'firebase apps:create ios --bundle-id "com.test.space" --project "hcg-space-game"',
    });
    expect(outcomes[2].status).toBe('succeeded');
    expect(outcomes).toHaveLength(6);
  });

  it('should give manual IAM instructions without gcloud', async () => {
    const runner = new FakeCommandRunner();

    const outcomes = await provisionFirebase(input, runner);
    const iam = outcomes[5];

    expect(runner.calls.some((c) => c.startsWith('gcloud'))).toBe(false);
    expect(iam.status).toBe('failed');
    expect(iam.message).toBe(
      `gcloud not found. Add ${SERVICE_ACCOUNT} manually in Firebase Console with Firebase App Distribution Admin role.`
    );
    expect(iam.fix).toBe(
      `Add ${SERVICE_ACCOUNT} with the "Firebase App Distribution Admin" role (roles/firebaseappdistro.admin) ` +
        'in Google Cloud Console IAM: https://console.cloud.google.com/iam-admin/iam?project=hcg-space-game'
    );
  });

  it('should put the gcloud command first in the IAM fix when the grant fails', async () => {
    const runner = new FakeCommandRunner({
      tools: ['gcloud'],
      fail: ['gcloud'],
      output: { gcloud: 'ERROR: (gcloud.projects.add-iam-policy-binding) PERMISSION_DENIED' },
    });

    const outcomes = await provisionFirebase(input, runner);

    expect(outcomes[5].status).toBe('failed');
    expect(outcomes[5].fix?.split('\n')[0]).toBe(
      `gcloud projects add-iam-policy-binding hcg-space-game --member="serviceAccount:${SERVICE_ACCOUNT}" --role="roles/firebaseappdistro.admin" --quiet`
    );
  });
});

describe('downloadFirebaseConfigs', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should download only the requested platforms', async () => {
    const runner = new FakeCommandRunner();

    const outcomes = await downloadFirebaseConfigs('hcg-game', tempDir, runner, ['android']);

    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].startsWith('firebase apps:sdkconfig android --project "hcg-game"')).toBe(true);
    expect(outcomes).toEqual([
      {
        step: 'Download google-services.json',
        status: 'succeeded',
        message: `Saved ${path.join('Assets', 'Settings', 'google-services.json')}`,
        artifact: path.join('Assets', 'Settings', 'google-services.json'),
        output: '',
      },
    ]);
  });

  it('should give a relative sdkconfig command as the fix', async () => {
    const runner = new FakeCommandRunner({ fail: ['firebase apps:sdkconfig'] });

    const [outcome] = await downloadFirebaseConfigs('hcg-game', tempDir, runner, ['ios']);

    expect(outcome.status).toBe('failed');
    expect(outcome.message).toBe('Command failed with no output.');
    expect(outcome.fix).toBe(
      `firebase apps:sdkconfig ios --project "hcg-game" --out "${path.join('Assets', 'Settings', 'GoogleService-Info.plist')}"`
    );
  });
});
