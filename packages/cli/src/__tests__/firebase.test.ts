import { describe, it, expect } from 'vitest';
import {
  checkFirebaseAuth,
  createAppCommand,
  createProjectCommand,
  describeFirebaseFailure,
  getFirebaseConsoleUrl,
  sdkConfigCommand,
} from '../gcp/firebase';
import { addIamPolicyBindingCommand, getIamConsoleUrl } from '../gcp/iam';
import { FakeCommandRunner } from './fake-runner';

describe('firebase commands', () => {
  it('should build the project create command', () => {
    expect(createProjectCommand('hcg-space-game', 'Space Game')).toBe(
      'firebase projects:create "hcg-space-game" --display-name "Space Game"'
    );
  });

  it('should use --bundle-id for iOS and --package-name for Android', () => {
    expect(createAppCommand('ios', 'com.test.game', 'hcg-game')).toBe(
      'firebase apps:create ios --bundle-id "com.test.game" --project "hcg-game"'
    );
    expect(createAppCommand('android', 'com.test.game', 'hcg-game')).toBe(
      'firebase apps:create android --package-name "com.test.game" --project "hcg-game"'
    );
  });

  it('should build the sdkconfig command', () => {
    expect(sdkConfigCommand('ios', 'hcg-game', 'Assets/Settings/GoogleService-Info.plist')).toBe(
      'firebase apps:sdkconfig ios --project "hcg-game" --out "Assets/Settings/GoogleService-Info.plist"'
    );
  });

  it('should build console URLs', () => {
    expect(getFirebaseConsoleUrl('hcg-game')).toBe(
      'https://console.firebase.google.com/project/hcg-game/overview'
    );
    expect(getIamConsoleUrl('hcg-game')).toBe(
      'https://console.cloud.google.com/iam-admin/iam?project=hcg-game'
    );
  });
});

describe('addIamPolicyBindingCommand', () => {
  it('should quote member and role', () => {
    expect(addIamPolicyBindingCommand('hcg-game', 'ci@test.iam.gserviceaccount.com', 'roles/viewer')).toBe(
      'gcloud projects add-iam-policy-binding hcg-game --member="serviceAccount:ci@test.iam.gserviceaccount.com" --role="roles/viewer" --quiet'
    );
  });
});

describe('describeFirebaseFailure', () => {
  it('should recognise existing resources', () => {
    expect(describeFirebaseFailure('Error: HTTP Error: 409, Requested entity already exists')).toBe(
      'Already exists.'
    );
    expect(describeFirebaseFailure('status: ALREADY_EXISTS')).toBe('Already exists.');
  });

  it('should recognise permission and lookup errors', () => {
    expect(describeFirebaseFailure('Error: PERMISSION_DENIED')).toBe(
      'Permission denied. Make sure you have Firebase Admin permissions on the project.'
    );
    expect(describeFirebaseFailure('Error: NOT_FOUND')).toBe('Project or app not found.');
  });

  it('should recognise a missing login', () => {
    expect(describeFirebaseFailure('Error: Failed to authenticate, have you run firebase login?')).toBe(
      'Not logged in to Firebase.'
    );
  });

  it('should fall back to the first non-empty line', () => {
    expect(describeFirebaseFailure('\nError: Quota exceeded\nsecond line')).toBe('Quota exceeded');
    expect(describeFirebaseFailure('')).toBe('Command failed with no output.');
  });
});

describe('checkFirebaseAuth', () => {
  it('should be true when projects can be listed', async () => {
    const runner = new FakeCommandRunner({ capture: { 'firebase projects:list': 'hcg-game' } });

    expect(await checkFirebaseAuth(runner)).toBe(true);
    expect(runner.calls).toEqual(['firebase projects:list']);
  });

  it('should be false when listing fails', async () => {
    const runner = new FakeCommandRunner({ capture: { 'firebase projects:list': null } });

    expect(await checkFirebaseAuth(runner)).toBe(false);
  });
});
