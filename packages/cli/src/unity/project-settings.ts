/**
 * Reads app identifiers out of Unity's ProjectSettings.asset
 *
 * The asset is Unity-flavoured YAML (custom tags, stripped documents). Only
 * a few fields are needed, so they are matched by pattern rather than parsed.
 * A document with several applicationIdentifier blocks, or a platform key
 * reused elsewhere after the block, can match the wrong value.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { PROJECT_SETTINGS_PATH } from '../config';
import { SetupError } from '../errors';
import { createCommandLogger } from '../logger';

const log = createCommandLogger('settings');

export interface BundleIds {
  ios: string | null;
  android: string | null;
}

export type PlatformKey = 'iPhone' | 'Android';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * First `<platform>: <id>` after an `applicationIdentifier:` marker, or null
 */
export function extractApplicationIdentifier(document: string, platform: PlatformKey): string | null {
  const pattern = new RegExp(`applicationIdentifier:[\\s\\S]*?${platform}:\\s*([\\w.]+)`);
  const match = document.match(pattern);
  return match ? match[1].trim() : null;
}

export function extractBundleIds(document: string): BundleIds {
  return {
    ios: extractApplicationIdentifier(document, 'iPhone'),
    android: extractApplicationIdentifier(document, 'Android'),
  };
}

/**
 * Single-line scalar such as `productName: Space Game`, or null
 */
export function extractPlayerSettingValue(document: string, key: string): string | null {
  const match = document.match(new RegExp(`^[ \\t]*${escapeRegExp(key)}:[ \\t]*(.*?)[ \\t]*$`, 'm'));
  if (!match || match[1] === '') {
    return null;
  }
  return match[1];
}

export async function readProjectSettings(projectRoot: string): Promise<string> {
  const settingsPath = path.join(projectRoot, PROJECT_SETTINGS_PATH);
  try {
    return await fs.readFile(settingsPath, 'utf-8');
  } catch (error) {
    log.error(`Could not read ${settingsPath}`, error);
    throw new SetupError(`${PROJECT_SETTINGS_PATH} not found.`, [
      'Run this from the root of a Unity project, or pass --cwd <project-root>.',
    ]);
  }
}

/**
 * Bundle IDs from the project's settings. Missing IDs are reported, not fatal.
 */
export async function readBundleIds(
  projectRoot: string,
  onWarn: (message: string) => void = console.warn
): Promise<BundleIds> {
  const ids = extractBundleIds(await readProjectSettings(projectRoot));

  if (!ids.ios || !ids.android) {
    const lines = [
      `Could not parse all bundle IDs from ${PROJECT_SETTINGS_PATH}`,
      `  iOS: ${ids.ios ?? 'NOT FOUND'}`,
      `  Android: ${ids.android ?? 'NOT FOUND'}`,
    ];
    log.warn(lines.join('\n'));
    onWarn(lines.join('\n'));
  }

  return ids;
}
