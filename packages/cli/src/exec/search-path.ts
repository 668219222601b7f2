/**
 * Executable search path handed to every external command.
 *
 * Editors and GUI shells often start with a PATH that misses Homebrew and
 * npm global installs, and macOS puts the system Node ahead of Homebrew's.
 * The path is rebuilt as a value instead of being written to process.env.
 */

import * as path from 'path';
import { homedir } from 'os';

export interface SearchPathRules {
  /** Always first, in this order, wherever they appeared before */
  priority: string[];
  /** Appended when missing */
  extra: string[];
}

export interface SearchPath {
  /** PATH string, joined with the platform delimiter */
  value: string;
  /** Directories in lookup order */
  dirs: string[];
}

export function defaultSearchPathRules(): SearchPathRules {
  return {
    priority: ['/opt/homebrew/bin', '/opt/homebrew/sbin'],
    extra: ['/usr/local/bin', path.join(homedir(), '.npm-global', 'bin')],
  };
}

/**
 * Rebuild a PATH string: priority ++ remaining ++ (extra not already present).
 * Applying it to its own output returns the same string.
 */
export function buildSearchPath(
  current: string,
  rules: SearchPathRules,
  delimiter: string = path.delimiter
): string {
  const remaining = current
    .split(delimiter)
    .filter((dir) => dir !== '' && !rules.priority.includes(dir));

  for (const dir of rules.extra) {
    if (!remaining.includes(dir) && !rules.priority.includes(dir)) {
      remaining.push(dir);
    }
  }

  return [...rules.priority, ...remaining].join(delimiter);
}

/**
 * Build the search path for this run from the inherited PATH
 */
export function prepareSearchPath(
  env: NodeJS.ProcessEnv = process.env,
  rules: SearchPathRules = defaultSearchPathRules()
): SearchPath {
  const value = buildSearchPath(env.PATH ?? '', rules);
  return { value, dirs: value.split(path.delimiter) };
}
