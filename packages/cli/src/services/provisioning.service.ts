/**
 * Firebase provisioning for a game project
 *
 * Creates the project, registers the mobile apps, downloads their config
 * files and grants the CI service account access. Every step is attempted
 * once and reported; none of them stops the steps after it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ANDROID_CONFIG_FILENAME,
  CI_SERVICE_ACCOUNT,
  CI_SERVICE_ACCOUNT_ROLE,
  CI_SERVICE_ACCOUNT_ROLE_TITLE,
  FIREBASE_CONFIG_DIR,
  IOS_CONFIG_FILENAME,
} from '../config';
import type { AttemptResult, CommandRunner } from '../exec/command-runner';
import {
  addIamPolicyBindingCommand,
  createAppCommand,
  createFirebaseApp,
  createFirebaseProject,
  createProjectCommand,
  describeFirebaseFailure,
  downloadSdkConfig,
  getIamConsoleUrl,
  grantIamRole,
  isGcloudInstalled,
  sdkConfigCommand,
  type FirebasePlatform,
} from '../gcp';
import { createCommandLogger } from '../logger';
import type { StepOutcome } from '../types';
import type { BundleIds } from '../unity/project-settings';

const log = createCommandLogger('provision');

export interface ProvisionInput {
  gameName: string;
  projectId: string;
  bundleIds: BundleIds;
  projectRoot: string;
}

interface PlatformSpec {
  platform: FirebasePlatform;
  label: string;
  appId: string | null;
  configFile: string;
}

function platforms(bundleIds: BundleIds): PlatformSpec[] {
  return [
    { platform: 'ios', label: 'iOS', appId: bundleIds.ios, configFile: IOS_CONFIG_FILENAME },
    {
      platform: 'android',
      label: 'Android',
      appId: bundleIds.android,
      configFile: ANDROID_CONFIG_FILENAME,
    },
  ];
}

function fromAttempt(
  step: string,
  result: AttemptResult,
  success: string,
  fix: string,
  artifact?: string
): StepOutcome {
  if (result.ok) {
    return { step, status: 'succeeded', message: success, artifact, output: result.output };
  }

  const reason = describeFirebaseFailure(result.output);
  // Re-running setup against an existing project is expected
  if (reason === 'Already exists.') {
    return { step, status: 'succeeded', message: `${success} (already existed)`, output: result.output };
  }
  return { step, status: 'failed', message: reason, fix, output: result.output };
}

function record(outcome: StepOutcome): StepOutcome {
  const logFn = outcome.status === 'failed' ? log.warn : log.info;
  logFn(`${outcome.step}: ${outcome.status} - ${outcome.message}`);
  return outcome;
}

/**
 * Download the SDK config for each platform into Assets/Settings
 */
export async function downloadFirebaseConfigs(
  projectId: string,
  projectRoot: string,
  runner: CommandRunner,
  platformsToDownload: FirebasePlatform[] = ['ios', 'android'],
  onLog: (message: string) => void = () => {}
): Promise<StepOutcome[]> {
  const outcomes: StepOutcome[] = [];
  const configDir = path.join(projectRoot, FIREBASE_CONFIG_DIR);
  let configDirReady = true;

  try {
    await fs.mkdir(configDir, { recursive: true });
  } catch (error) {
    log.error(`Could not create ${configDir}`, error);
    configDirReady = false;
  }

  for (const platform of platformsToDownload) {
    const configFile = platform === 'ios' ? IOS_CONFIG_FILENAME : ANDROID_CONFIG_FILENAME;
    const step = `Download ${configFile}`;
    const relativePath = path.join(FIREBASE_CONFIG_DIR, configFile);

    if (!configDirReady) {
      outcomes.push(
        record({
          step,
          status: 'failed',
          message: `Could not create ${FIREBASE_CONFIG_DIR}`,
          fix: `Download ${configFile} from the Firebase Console into ${FIREBASE_CONFIG_DIR}`,
        })
      );
      continue;
    }

    onLog(`Downloading ${configFile}...`);
    outcomes.push(
      record(
        fromAttempt(
          step,
          await downloadSdkConfig(runner, platform, projectId, path.join(configDir, configFile)),
          `Saved ${relativePath}`,
          sdkConfigCommand(platform, projectId, relativePath),
          relativePath
        )
      )
    );
  }

  return outcomes;
}

export async function provisionFirebase(
  input: ProvisionInput,
  runner: CommandRunner,
  onLog: (message: string) => void = () => {}
): Promise<StepOutcome[]> {
  const { gameName, projectId, bundleIds, projectRoot } = input;
  const outcomes: StepOutcome[] = [];
  const specs = platforms(bundleIds);

  // 1. Project
  onLog(`Creating Firebase project: ${projectId}...`);
  outcomes.push(
    record(
      fromAttempt(
        'Create Firebase project',
        await createFirebaseProject(runner, projectId, gameName),
        `Created ${projectId}`,
        createProjectCommand(projectId, gameName)
      )
    )
  );

  // 2-3. Apps
  for (const spec of specs) {
    const step = `Register ${spec.label} app`;
    if (!spec.appId) {
      outcomes.push(
        record({
          step,
          status: 'skipped',
          message: `No ${spec.label} bundle ID in ProjectSettings.asset`,
          fix: `Set the ${spec.label} application identifier in Unity Player Settings and run setup again`,
        })
      );
      continue;
    }

    onLog(`Registering ${spec.label} app (${spec.appId})...`);
    outcomes.push(
      record(
        fromAttempt(
          step,
          await createFirebaseApp(runner, spec.platform, spec.appId, projectId),
          `Registered ${spec.appId}`,
          createAppCommand(spec.platform, spec.appId, projectId)
        )
      )
    );
  }

  // 4. Config files, only for platforms that have an app
  for (const spec of specs) {
    if (!spec.appId) {
      outcomes.push(
        record({
          step: `Download ${spec.configFile}`,
          status: 'skipped',
          message: `No ${spec.label} app was registered`,
        })
      );
      continue;
    }
    outcomes.push(...(await downloadFirebaseConfigs(projectId, projectRoot, runner, [spec.platform], onLog)));
  }

  // 5. CI service account
  const iamStep = 'Grant CI service account';
  const manualFix =
    `Add ${CI_SERVICE_ACCOUNT} with the "${CI_SERVICE_ACCOUNT_ROLE_TITLE}" role ` +
    `(${CI_SERVICE_ACCOUNT_ROLE}) in Google Cloud Console IAM: ${getIamConsoleUrl(projectId)}`;

  if (await isGcloudInstalled(runner)) {
    onLog('Adding CI service account to Firebase project...');
    const result = await grantIamRole(runner, projectId, CI_SERVICE_ACCOUNT, CI_SERVICE_ACCOUNT_ROLE);
    outcomes.push(
      record(
        result.ok
          ? {
              step: iamStep,
              status: 'succeeded',
              message: `Granted ${CI_SERVICE_ACCOUNT_ROLE} to ${CI_SERVICE_ACCOUNT}`,
              output: result.output,
            }
          : {
              step: iamStep,
              status: 'failed',
              message: describeFirebaseFailure(result.output),
              fix: `${addIamPolicyBindingCommand(projectId, CI_SERVICE_ACCOUNT, CI_SERVICE_ACCOUNT_ROLE)}\n${manualFix}`,
              output: result.output,
            }
      )
    );
  } else {
    outcomes.push(
      record({
        step: iamStep,
        status: 'failed',
        message: `gcloud not found. Add ${CI_SERVICE_ACCOUNT} manually in Firebase Console with ${CI_SERVICE_ACCOUNT_ROLE_TITLE} role.`,
        fix: manualFix,
      })
    );
  }

  return outcomes;
}
