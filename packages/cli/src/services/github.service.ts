/**
 * Build workflow dispatch and run history for the project's GitHub repository
 */

import { SetupError } from '../errors';
import type { CommandRunner } from '../exec/command-runner';
import {
  dispatchWorkflow,
  getCurrentBranch,
  getOriginRemote,
  isGhInstalled,
  listWorkflowRuns,
  parseRepoSlug,
  runListCommand,
  workflowRunCommand,
  type WorkflowDispatch,
  type WorkflowRun,
} from '../github';
import { createCommandLogger } from '../logger';
import type { StepOutcome } from '../types';

const log = createCommandLogger('github');

const DEFAULT_REF = 'main';

const GH_MISSING_HINTS = ['Install the GitHub CLI: brew install gh', 'https://cli.github.com'];

export interface RepositoryTarget {
  repo: string;
  ref: string;
}

/**
 * owner/name from --repo, else from the origin remote
 */
export async function resolveRepo(runner: CommandRunner, repo?: string): Promise<string> {
  if (repo) {
    return repo;
  }

  const remote = await getOriginRemote(runner);
  const slug = remote ? parseRepoSlug(remote) : null;
  if (!slug) {
    log.warn('No GitHub origin remote', { remote });
    throw new SetupError('Could not detect the GitHub repository.', [
      'Add a GitHub "origin" remote, or pass --repo <owner/name>.',
    ]);
  }
  return slug;
}

/**
 * Branch from --ref, else the checked-out branch, else main
 */
export async function resolveRef(runner: CommandRunner, ref?: string): Promise<string> {
  if (ref) {
    return ref;
  }
  return (await getCurrentBranch(runner)) ?? DEFAULT_REF;
}

export async function resolveRepository(
  runner: CommandRunner,
  overrides: { repo?: string; ref?: string } = {}
): Promise<RepositoryTarget> {
  const repo = await resolveRepo(runner, overrides.repo);
  const ref = await resolveRef(runner, overrides.ref);
  return { repo, ref };
}

async function requireGh(runner: CommandRunner): Promise<void> {
  if (!(await isGhInstalled(runner))) {
    throw new SetupError('GitHub CLI (gh) not found.', GH_MISSING_HINTS);
  }
}

function firstLine(output: string): string | null {
  return output
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line.length > 0) ?? null;
}

export async function triggerBuild(runner: CommandRunner, dispatch: WorkflowDispatch): Promise<StepOutcome> {
  await requireGh(runner);

  const step = 'Trigger build';
  const result = await dispatchWorkflow(runner, dispatch);
  const outcome: StepOutcome = result.ok
    ? {
        step,
        status: 'succeeded',
        message: `Dispatched ${dispatch.buildTarget} build (${dispatch.distribution}) on ${dispatch.repo}@${dispatch.ref}`,
        output: result.output,
      }
    : {
        step,
        status: 'failed',
        message: firstLine(result.output) ?? 'gh workflow run failed.',
        fix: workflowRunCommand(dispatch),
        output: result.output,
      };

  log.info(`${outcome.step}: ${outcome.status} - ${outcome.message}`);
  return outcome;
}

export async function fetchRecentRuns(
  runner: CommandRunner,
  repo: string,
  limit: number
): Promise<WorkflowRun[]> {
  await requireGh(runner);

  let runs: WorkflowRun[] | null;
  try {
    runs = await listWorkflowRuns(runner, repo, limit);
  } catch (error) {
    if (error instanceof SyntaxError) {
      log.error('Unreadable gh run list output', error);
      throw new SetupError('Could not read the workflow run list from gh.', [runListCommand(repo, limit)]);
    }
    throw error;
  }

  if (runs === null) {
    throw new SetupError('Could not list workflow runs.', [
      runListCommand(repo, limit),
      'Check that you are logged in: gh auth status',
    ]);
  }
  return runs;
}
