/**
 * Shared types for hcg-setup
 */

export type StepStatus = 'succeeded' | 'failed' | 'skipped';

/**
 * Result of one best-effort step. Steps never throw; they report.
 */
export interface StepOutcome {
  step: string;
  status: StepStatus;
  message: string;
  /** Manual remedy shown in the summary */
  fix?: string;
  /** Project-relative path of the file the step produced */
  artifact?: string;
  /** Captured command output, shown with --verbose */
  output?: string;
}

export interface GeneratedFile {
  path: string;
  content: string;
}
