/**
 * Firebase project and app management through the firebase CLI
 */

import type { AttemptResult, CommandRunner } from '../exec/command-runner';

export type FirebasePlatform = 'ios' | 'android';

/**
 * Check if Firebase CLI is installed
 */
export async function isFirebaseInstalled(runner: CommandRunner): Promise<boolean> {
  return runner.exists('firebase');
}

/**
 * Check if Firebase CLI is authenticated.
 * Listing projects fails when there is no logged-in account.
 */
export async function checkFirebaseAuth(runner: CommandRunner): Promise<boolean> {
  const result = await runner.run('firebase projects:list', { capture: true, check: true });
  return result !== null;
}

/**
 * Interactive login; output and prompts go to the terminal
 */
export async function loginToFirebase(runner: CommandRunner): Promise<void> {
  await runner.run('firebase login', { check: false });
}

export function createProjectCommand(projectId: string, displayName: string): string {
  return `firebase projects:create "${projectId}" --display-name "${displayName}"`;
}

export function createAppCommand(
  platform: FirebasePlatform,
  appId: string,
  projectId: string
): string {
  const idFlag = platform === 'ios' ? '--bundle-id' : '--package-name';
  return `firebase apps:create ${platform} ${idFlag} "${appId}" --project "${projectId}"`;
}

export function sdkConfigCommand(
  platform: FirebasePlatform,
  projectId: string,
  outPath: string
): string {
  return `firebase apps:sdkconfig ${platform} --project "${projectId}" --out "${outPath}"`;
}

/**
 * Create a Firebase project
 */
export async function createFirebaseProject(
  runner: CommandRunner,
  projectId: string,
  displayName: string
): Promise<AttemptResult> {
  return runner.attempt(createProjectCommand(projectId, displayName));
}

/**
 * Register an iOS or Android app in a Firebase project
 */
export async function createFirebaseApp(
  runner: CommandRunner,
  platform: FirebasePlatform,
  appId: string,
  projectId: string
): Promise<AttemptResult> {
  return runner.attempt(createAppCommand(platform, appId, projectId));
}

/**
 * Download GoogleService-Info.plist or google-services.json
 */
export async function downloadSdkConfig(
  runner: CommandRunner,
  platform: FirebasePlatform,
  projectId: string,
  outPath: string
): Promise<AttemptResult> {
  return runner.attempt(sdkConfigCommand(platform, projectId, outPath));
}

/**
 * Turn firebase CLI output into a one-line reason
 */
export function describeFirebaseFailure(output: string): string {
  if (output.includes('already exists') || output.includes('ALREADY_EXISTS')) {
    return 'Already exists.';
  }
  if (output.includes('PERMISSION_DENIED')) {
    return 'Permission denied. Make sure you have Firebase Admin permissions on the project.';
  }
  if (output.includes('NOT_FOUND')) {
    return 'Project or app not found.';
  }
  if (output.includes('Failed to authenticate') || output.includes('firebase login')) {
    return 'Not logged in to Firebase.';
  }

  const firstLine = output
    .split('\n')
    .map((line) => line.replace(/^Error:\s*/, '').trim())
    .find((line) => line.length > 0);
  return firstLine ?? 'Command failed with no output.';
}

/**
 * Get the Firebase console URL for the project
 */
export function getFirebaseConsoleUrl(projectId: string): string {
  return `https://console.firebase.google.com/project/${projectId}/overview`;
}

/**
 * Validate a project ID against Google Cloud naming rules
 */
export function isValidProjectId(projectId: string): { valid: boolean; error?: string } {
  if (!projectId) {
    return { valid: false, error: 'Project ID is required' };
  }

  if (projectId.length < 6 || projectId.length > 30) {
    return { valid: false, error: 'Project ID must be 6-30 characters' };
  }

  if (!/^[a-z]/.test(projectId)) {
    return { valid: false, error: 'Project ID must start with a lowercase letter' };
  }

  if (!/[a-z0-9]$/.test(projectId)) {
    return { valid: false, error: 'Project ID must end with a letter or digit' };
  }

  if (!/^[a-z][a-z0-9-]*[a-z0-9]$/.test(projectId)) {
    return {
      valid: false,
      error: 'Project ID can only contain lowercase letters, digits, and hyphens',
    };
  }

  return { valid: true };
}
