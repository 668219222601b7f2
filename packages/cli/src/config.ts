/**
 * Fixed settings for hcg-setup and the per-run configuration built from
 * command-line options.
 */

import * as path from 'path';

/** Prefix for every Firebase project this tool creates */
export const PROJECT_NAMESPACE = 'hcg';

export const CI_SERVICE_ACCOUNT = 'ci-distribution@hcgamesfirebase.iam.gserviceaccount.com';
export const CI_SERVICE_ACCOUNT_ROLE = 'roles/firebaseappdistro.admin';
export const CI_SERVICE_ACCOUNT_ROLE_TITLE = 'Firebase App Distribution Admin';

export const MIN_NODE_MAJOR = 20;

/** Unity project paths, relative to the project root */
export const PROJECT_SETTINGS_PATH = path.join('ProjectSettings', 'ProjectSettings.asset');
export const FIREBASE_CONFIG_DIR = path.join('Assets', 'Settings');
export const IOS_CONFIG_FILENAME = 'GoogleService-Info.plist';
export const ANDROID_CONFIG_FILENAME = 'google-services.json';

export const BOILERPLATE_PATHS = {
  workflow: '.github/workflows/build.yml',
  fastfile: 'fastlane/Fastfile',
  matchfile: 'fastlane/Matchfile',
  gemfile: 'Gemfile',
} as const;

export const GEMFILE_LOCK_PATH = 'Gemfile.lock';

/** Names that select a subcommand instead of being read as a game name */
export const SUBCOMMAND_NAMES = ['setup', 'status', 'configs', 'clean', 'build', 'runs'] as const;

/** Secrets the reusable build workflow expects, grouped as shown in the summary */
export const REQUIRED_GITHUB_SECRETS: string[][] = [
  ['UNITY_LICENSE'],
  ['MATCH_PASSWORD', 'MATCH_KEYCHAIN_PASSWORD', 'MATCH_GIT_BASIC_AUTHORIZATION'],
  [
    'APP_STORE_CONNECT_API_KEY_KEY_ID',
    'APP_STORE_CONNECT_API_KEY_ISSUER_ID',
    'APP_STORE_CONNECT_API_KEY_KEY',
  ],
  [
    'ANDROID_KEYSTORE_NAME',
    'ANDROID_KEYSTORE_BASE64',
    'ANDROID_KEYSTORE_PASS',
    'ANDROID_KEYALIAS_NAME',
    'ANDROID_KEYALIAS_PASS',
  ],
  ['FIREBASE_SERVICE_ACCOUNT_JSON'],
];

export interface SetupConfig {
  gameName: string;
  projectId: string;
  projectRoot: string;
  skipFirebase: boolean;
  verbose: boolean;
}

export interface SetupCommandOptions {
  cwd?: string;
  skipFirebase?: boolean;
  verbose?: boolean;
}

/**
 * Derive the Firebase project ID for a game name.
 * Does not validate; see isValidProjectId in gcp/firebase.
 */
export function slugify(gameName: string): string {
  return `${PROJECT_NAMESPACE}-${gameName.toLowerCase().replaceAll(' ', '-')}`;
}

export function resolveSetupConfig(gameName: string, options: SetupCommandOptions = {}): SetupConfig {
  return {
    gameName,
    projectId: slugify(gameName),
    projectRoot: path.resolve(options.cwd ?? process.cwd()),
    skipFirebase: options.skipFirebase ?? false,
    verbose: options.verbose ?? false,
  };
}
