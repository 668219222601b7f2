/**
 * Error types for hcg-setup
 *
 * Only conditions that stop a run are errors. Everything else is reported
 * as a step outcome and surfaces in the final summary.
 */

/**
 * A condition that ends the run with exit code 1
 */
export class SetupError extends Error {
  hints: string[];

  constructor(message: string, hints: string[] = []) {
    super(message);
    this.name = 'SetupError';
    this.hints = hints;
  }
}

/**
 * A command run with `check: true` exited non-zero
 */
export class CommandFailedError extends Error {
  commandLine: string;
  exitCode: number | null;

  constructor(commandLine: string, exitCode: number | null) {
    super(`Command failed (exit ${exitCode ?? 'signal'}): ${commandLine}`);
    this.name = 'CommandFailedError';
    this.commandLine = commandLine;
    this.exitCode = exitCode;
  }
}
