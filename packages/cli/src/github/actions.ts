/**
 * GitHub Actions through the gh and git CLIs
 */

import type { AttemptResult, CommandRunner } from '../exec/command-runner';

export const WORKFLOW_FILE = 'build.yml';

export const BUILD_TARGETS = ['iOS', 'Android', 'Both'] as const;
export const DISTRIBUTIONS = ['None', 'TestFlight', 'Firebase'] as const;

export type BuildTarget = (typeof BUILD_TARGETS)[number];
export type Distribution = (typeof DISTRIBUTIONS)[number];

export const RUN_FIELDS = [
  'databaseId',
  'displayTitle',
  'status',
  'conclusion',
  'createdAt',
  'headBranch',
] as const;

export function toBuildTarget(value: string): BuildTarget | null {
  return BUILD_TARGETS.find((target) => target === value) ?? null;
}

export function toDistribution(value: string): Distribution | null {
  return DISTRIBUTIONS.find((distribution) => distribution === value) ?? null;
}

export interface WorkflowDispatch {
  repo: string;
  ref: string;
  buildTarget: BuildTarget;
  distribution: Distribution;
  /** Semicolon-separated, sent only when non-empty */
  scriptDefines?: string;
}

export interface WorkflowRun {
  id: number;
  title: string;
  status: string;
  conclusion: string;
  createdAt: string;
  branch: string;
}

export function isGhInstalled(runner: CommandRunner): Promise<boolean> {
  return runner.exists('gh');
}

/**
 * owner/name from an https or ssh GitHub remote URL
 */
export function parseRepoSlug(remoteUrl: string): string | null {
  const match = remoteUrl.trim().match(/github\.com[:/](.+?)(?:\.git)?$/);
  return match ? match[1] : null;
}

export async function getOriginRemote(runner: CommandRunner): Promise<string | null> {
  const url = await runner.run('git remote get-url origin', { capture: true, check: true });
  return url ? url : null;
}

export async function getCurrentBranch(runner: CommandRunner): Promise<string | null> {
  const branch = await runner.run('git branch --show-current', { capture: true, check: true });
  return branch ? branch : null;
}

export function workflowRunCommand(dispatch: WorkflowDispatch): string {
  let command =
    `gh workflow run ${WORKFLOW_FILE} --repo "${dispatch.repo}" --ref "${dispatch.ref}"` +
    ` -f buildTarget=${dispatch.buildTarget}` +
    ` -f distribution=${dispatch.distribution}`;

  if (dispatch.scriptDefines) {
    command += ` -f scriptDefines="${dispatch.scriptDefines}"`;
  }
  return command;
}

export function runListCommand(repo: string, limit: number): string {
  return (
    `gh run list --workflow=${WORKFLOW_FILE} --repo "${repo}" --limit ${limit} ` +
    `--json ${RUN_FIELDS.join(',')}`
  );
}

/**
 * Dispatch the build workflow
 */
export function dispatchWorkflow(runner: CommandRunner, dispatch: WorkflowDispatch): Promise<AttemptResult> {
  return runner.attempt(workflowRunCommand(dispatch));
}

function readString(entry: object, key: string): string {
  const value = Reflect.get(entry, key);
  return typeof value === 'string' ? value : '';
}

/**
 * Parse `gh run list --json` output. Entries without a numeric databaseId are dropped.
 */
export function parseWorkflowRuns(json: string): WorkflowRun[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    return [];
  }

  const entries: unknown[] = parsed;
  const runs: WorkflowRun[] = [];
  for (const entry of entries) {
    if (!entry || typeof entry !== 'object') continue;
    const id = Reflect.get(entry, 'databaseId');
    if (typeof id !== 'number') continue;

    runs.push({
      id,
      title: readString(entry, 'displayTitle'),
      status: readString(entry, 'status'),
      conclusion: readString(entry, 'conclusion'),
      createdAt: readString(entry, 'createdAt'),
      branch: readString(entry, 'headBranch'),
    });
  }
  return runs;
}

/**
 * Recent runs of the build workflow, or null when gh fails
 */
export async function listWorkflowRuns(
  runner: CommandRunner,
  repo: string,
  limit: number
): Promise<WorkflowRun[] | null> {
  const output = await runner.run(runListCommand(repo, limit), { capture: true, check: true });
  if (output === null) {
    return null;
  }
  return output === '' ? [] : parseWorkflowRuns(output);
}

export function getRunUrl(repo: string, runId: number): string {
  return `https://github.com/${repo}/actions/runs/${runId}`;
}

export function getWorkflowUrl(repo: string): string {
  return `https://github.com/${repo}/actions/workflows/${WORKFLOW_FILE}`;
}

/**
 * Short age of an ISO timestamp: just now, 5m ago, 3h ago, 2d ago
 */
export function formatElapsed(iso: string, now: Date = new Date()): string {
  if (!iso) return '';
  const time = Date.parse(iso);
  if (Number.isNaN(time)) return iso;

  const minutes = (now.getTime() - time) / (60 * 1000);
  if (minutes < 1) return 'just now';
  if (minutes < 60) return `${Math.floor(minutes)}m ago`;
  if (minutes < 60 * 24) return `${Math.floor(minutes / 60)}h ago`;
  return `${Math.floor(minutes / (60 * 24))}d ago`;
}
