/**
 * CI/CD boilerplate for Unity game repositories
 *
 * The workflow delegates to the shared reusable build workflow, and the
 * Fastfile imports its lanes from the same toolkit repository.
 */

const TOOLKIT_REPO = 'Homecooked-Games-Git/devops-toolkit';
const CERTIFICATES_REPO_URL = 'https://github.com/oguztecimer/ios-certificates.git';

export function buildWorkflow(gameName: string): string {
  return `name: ${gameName} Build

on:
  workflow_dispatch:
    inputs:
      buildTarget:
        description: "Platform to build"
        required: true
        default: "iOS"
        type: choice
        options:
          - Android
          - iOS
          - Both
      distribution:
        description: "Distribution target"
        required: true
        default: "None"
        type: choice
        options:
          - None
          - TestFlight
          - Firebase
      scriptDefines:
        description: "Extra script defines (semicolon-separated, e.g. DEV_MODE;EXTRA_LOGGING)"
        required: false
        type: string
        default: ""

concurrency:
  group: \${{ github.workflow }}-\${{ github.ref }}
  cancel-in-progress: true

jobs:
  build-ios:
    if: >-
      inputs.buildTarget == 'iOS' ||
      inputs.buildTarget == 'Both'
    uses: ${TOOLKIT_REPO}/.github/workflows/unity-build.yml@main
    with:
      game_name: "${gameName}"
      build_target: "iOS"
      distribution: \${{ inputs.distribution }}
      script_defines: \${{ inputs.scriptDefines }}
    secrets: inherit

  build-android:
    if: >-
      inputs.buildTarget == 'Android' ||
      inputs.buildTarget == 'Both'
    uses: ${TOOLKIT_REPO}/.github/workflows/unity-build.yml@main
    with:
      game_name: "${gameName}"
      build_target: "Android"
      distribution: \${{ inputs.distribution }}
      script_defines: \${{ inputs.scriptDefines }}
    secrets: inherit
`;
}

export function fastfile(): string {
  return `import_from_git(
  url: "https://github.com/${TOOLKIT_REPO}.git",
  branch: ENV["FL_DEVOPS_TOOLKIT_REF"] || "main",
  path: "fastlane/Fastfile"
)
`;
}

export function matchfile(): string {
  return `git_url("${CERTIFICATES_REPO_URL}")
storage_mode("git")
type("appstore")
`;
}

export function gemfile(): string {
  return `source "https://rubygems.org"

gem "fastlane"
gem "cocoapods"
gem "fastlane-plugin-firebase_app_distribution"
`;
}
