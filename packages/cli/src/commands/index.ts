/**
 * hcg-setup commands
 *
 * - setup   - Firebase + CI/CD bootstrap (default)
 * - status  - What is already in place
 * - configs - Download Firebase configs again
 * - clean   - Remove generated CI/CD files
 * - build   - Trigger the build workflow
 * - runs    - Recent build workflow runs
 */

export { setupCommand } from './setup';
export { statusCommand } from './status';
export { configsCommand } from './configs';
export { cleanCommand } from './clean';
export { buildCommand } from './build';
export { runsCommand } from './runs';
