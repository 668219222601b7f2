/**
 * GCP IAM permission utilities
 */

import type { AttemptResult, CommandRunner } from '../exec/command-runner';

export function isGcloudInstalled(runner: CommandRunner): Promise<boolean> {
  return runner.exists('gcloud');
}

export function addIamPolicyBindingCommand(
  projectId: string,
  serviceAccount: string,
  role: string
): string {
  return (
    `gcloud projects add-iam-policy-binding ${projectId} ` +
    `--member="serviceAccount:${serviceAccount}" ` +
    `--role="${role}" --quiet`
  );
}

/**
 * Grant an IAM role to a service account on a project
 */
export async function grantIamRole(
  runner: CommandRunner,
  projectId: string,
  serviceAccount: string,
  role: string
): Promise<AttemptResult> {
  return runner.attempt(addIamPolicyBindingCommand(projectId, serviceAccount, role));
}

export function getIamConsoleUrl(projectId: string): string {
  return `https://console.cloud.google.com/iam-admin/iam?project=${projectId}`;
}
