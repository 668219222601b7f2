/**
 * Inspect what setup has already produced in a Unity project
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ANDROID_CONFIG_FILENAME,
  BOILERPLATE_PATHS,
  FIREBASE_CONFIG_DIR,
  GEMFILE_LOCK_PATH,
  IOS_CONFIG_FILENAME,
  PROJECT_SETTINGS_PATH,
} from '../config';
import {
  escapeRegExp,
  extractBundleIds,
  extractPlayerSettingValue,
} from '../unity/project-settings';

export type ComponentStatus = 'present' | 'missing';

export interface ProjectInfo {
  productName: string | null;
  companyName: string | null;
  iosBundleId: string | null;
  androidBundleId: string | null;
}

export interface StatusReport {
  project: ProjectInfo | null;
  firebaseIos: { status: ComponentStatus; projectId: string | null; bundleId: string | null };
  firebaseAndroid: { status: ComponentStatus; projectId: string | null; packageName: string | null };
  workflow: { status: ComponentStatus; gameName: string | null };
  fastfile: { status: ComponentStatus };
  matchfile: { status: ComponentStatus; certRepoUrl: string | null };
  gemfile: { status: ComponentStatus; hasLockFile: boolean };
  gitignore: { status: ComponentStatus };
}

export function extractPlistValue(content: string, key: string): string | null {
  const match = content.match(
    new RegExp(`<key>${escapeRegExp(key)}</key>\\s*<string>([^<]+)</string>`)
  );
  return match ? match[1] : null;
}

export function extractJsonValue(content: string, key: string): string | null {
  const match = content.match(new RegExp(`"${escapeRegExp(key)}"\\s*:\\s*"([^"]+)"`));
  return match ? match[1] : null;
}

export function extractWorkflowGameName(content: string): string | null {
  const match = content.match(/game_name:\s*"([^"]+)"/);
  return match ? match[1] : null;
}

export function extractMatchGitUrl(content: string): string | null {
  const match = content.match(/git_url\("([^"]+)"\)/);
  return match ? match[1] : null;
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
}

function statusOf(content: string | null): ComponentStatus {
  return content === null ? 'missing' : 'present';
}

export async function inspectProject(projectRoot: string): Promise<StatusReport> {
  const read = (relativePath: string) => readIfExists(path.join(projectRoot, relativePath));

  const settings = await read(PROJECT_SETTINGS_PATH);
  const plist = await read(path.join(FIREBASE_CONFIG_DIR, IOS_CONFIG_FILENAME));
  const googleServices = await read(path.join(FIREBASE_CONFIG_DIR, ANDROID_CONFIG_FILENAME));
  const workflow = await read(BOILERPLATE_PATHS.workflow);
  const fastfile = await read(BOILERPLATE_PATHS.fastfile);
  const matchfile = await read(BOILERPLATE_PATHS.matchfile);
  const gemfile = await read(BOILERPLATE_PATHS.gemfile);
  const gemfileLock = await read(GEMFILE_LOCK_PATH);
  const gitignore = await read('.gitignore');

  let project: ProjectInfo | null = null;
  if (settings !== null) {
    const ids = extractBundleIds(settings);
    project = {
      productName: extractPlayerSettingValue(settings, 'productName'),
      companyName: extractPlayerSettingValue(settings, 'companyName'),
      iosBundleId: ids.ios,
      androidBundleId: ids.android,
    };
  }

  return {
    project,
    firebaseIos: {
      status: statusOf(plist),
      projectId: plist === null ? null : extractPlistValue(plist, 'PROJECT_ID'),
      bundleId: plist === null ? null : extractPlistValue(plist, 'BUNDLE_ID'),
    },
    firebaseAndroid: {
      status: statusOf(googleServices),
      projectId: googleServices === null ? null : extractJsonValue(googleServices, 'project_id'),
      packageName: googleServices === null ? null : extractJsonValue(googleServices, 'package_name'),
    },
    workflow: {
      status: statusOf(workflow),
      gameName: workflow === null ? null : extractWorkflowGameName(workflow),
    },
    fastfile: { status: statusOf(fastfile) },
    matchfile: {
      status: statusOf(matchfile),
      certRepoUrl: matchfile === null ? null : extractMatchGitUrl(matchfile),
    },
    gemfile: { status: statusOf(gemfile), hasLockFile: gemfileLock !== null },
    gitignore: { status: statusOf(gitignore) },
  };
}

/**
 * Project ID recorded in a downloaded Firebase config, iOS first
 */
export function firebaseProjectIdFromReport(report: StatusReport): string | null {
  return report.firebaseIos.projectId ?? report.firebaseAndroid.projectId;
}
