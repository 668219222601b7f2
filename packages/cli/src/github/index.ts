/**
 * GitHub utilities for hcg-setup
 */

export {
  WORKFLOW_FILE,
  BUILD_TARGETS,
  DISTRIBUTIONS,
  toBuildTarget,
  toDistribution,
  isGhInstalled,
  parseRepoSlug,
  getOriginRemote,
  getCurrentBranch,
  workflowRunCommand,
  runListCommand,
  dispatchWorkflow,
  parseWorkflowRuns,
  listWorkflowRuns,
  getRunUrl,
  getWorkflowUrl,
  formatElapsed,
  type BuildTarget,
  type Distribution,
  type WorkflowDispatch,
  type WorkflowRun,
} from './actions';
