/**
 * Shell command execution for hcg-setup
 *
 * Every external tool (node, brew, npm, firebase, gcloud, bundle) is reached
 * through a CommandRunner so the search path is applied consistently and the
 * orchestration code can be exercised with a fake.
 */

import { exec, spawn } from 'child_process';
import { promisify } from 'util';
import * as fs from 'fs/promises';
import * as path from 'path';
import { CommandFailedError } from '../errors';
import { createCommandLogger, logOutput } from '../logger';
import type { SearchPath } from './search-path';

const execAsync = promisify(exec);
const log = createCommandLogger('exec');

const MAX_BUFFER = 10 * 1024 * 1024;

export interface RunOptions {
  /** Return trimmed stdout instead of streaming to the terminal */
  capture?: boolean;
  /** Treat a non-zero exit as failure (default true) */
  check?: boolean;
}

export interface AttemptResult {
  ok: boolean;
  /** Trimmed stdout followed by stderr */
  output: string;
}

export interface CommandRunner {
  readonly searchPath: SearchPath;
  /**
   * capture: stdout (trimmed), or null when check is set and the command failed.
   * no capture: output goes to the terminal; a failure rejects when check is set,
   * otherwise resolves to null.
   */
  run(commandLine: string, options?: RunOptions): Promise<string | null>;
  /** Best-effort run with piped output. Never rejects. */
  attempt(commandLine: string): Promise<AttemptResult>;
  /** Whether an executable resolves on the search path */
  exists(tool: string): Promise<boolean>;
}

export interface ShellCommandRunnerOptions {
  cwd: string;
  searchPath: SearchPath;
  env?: NodeJS.ProcessEnv;
}

function readProperty(error: unknown, key: string): unknown {
  if (error && typeof error === 'object') {
    return Reflect.get(error, key);
  }
  return undefined;
}

function readOutput(error: unknown, key: 'stdout' | 'stderr'): string {
  const value = readProperty(error, key);
  return typeof value === 'string' ? value : '';
}

function readExitCode(error: unknown): number | null {
  const code = readProperty(error, 'code');
  return typeof code === 'number' ? code : null;
}

export class ShellCommandRunner implements CommandRunner {
  readonly searchPath: SearchPath;
  private readonly cwd: string;
  private readonly baseEnv: NodeJS.ProcessEnv;

  constructor(options: ShellCommandRunnerOptions) {
    this.cwd = options.cwd;
    this.searchPath = options.searchPath;
    this.baseEnv = options.env ?? process.env;
  }

  private get env(): NodeJS.ProcessEnv {
    return { ...this.baseEnv, PATH: this.searchPath.value };
  }

  async run(commandLine: string, options: RunOptions = {}): Promise<string | null> {
    const capture = options.capture ?? false;
    const check = options.check ?? true;
    log.command(commandLine, { capture, check });

    if (capture) {
      try {
        const { stdout, stderr } = await execAsync(commandLine, {
          cwd: this.cwd,
          env: this.env,
          maxBuffer: MAX_BUFFER,
        });
        logOutput('stdout', stdout);
        logOutput('stderr', stderr);
        return stdout.trim();
      } catch (error) {
        const stdout = readOutput(error, 'stdout');
        logOutput('stdout', stdout);
        logOutput('stderr', readOutput(error, 'stderr'));
        log.debug(`Exited with ${readExitCode(error) ?? 'no exit code'}`);
        return check ? null : stdout.trim();
      }
    }

    let exitCode: number | null;
    try {
      exitCode = await this.spawnInherited(commandLine);
    } catch (error) {
      log.error(`Could not start: ${commandLine}`, error);
      if (check) {
        throw new CommandFailedError(commandLine, null);
      }
      return null;
    }

    if (exitCode !== 0) {
      log.warn(`Exited with ${exitCode ?? 'signal'}: ${commandLine}`);
      if (check) {
        throw new CommandFailedError(commandLine, exitCode);
      }
    }
    return null;
  }

  async attempt(commandLine: string): Promise<AttemptResult> {
    log.command(commandLine, { attempt: true });

    try {
      const { stdout, stderr } = await execAsync(`${commandLine} 2>&1`, {
        cwd: this.cwd,
        env: this.env,
        maxBuffer: MAX_BUFFER,
      });
      logOutput('stdout', stdout);
      return { ok: true, output: [stdout.trim(), stderr.trim()].filter(Boolean).join('\n') };
    } catch (error) {
      const output = [readOutput(error, 'stdout').trim(), readOutput(error, 'stderr').trim()]
        .filter(Boolean)
        .join('\n');
      logOutput('stderr', output);
      log.warn(`Exited with ${readExitCode(error) ?? 'no exit code'}: ${commandLine}`);
      return { ok: false, output: output || String(error) };
    }
  }

  async exists(tool: string): Promise<boolean> {
    const extensions =
      process.platform === 'win32'
        ? ['', ...(this.baseEnv.PATHEXT ?? '.COM;.EXE;.BAT;.CMD').split(';')]
        : [''];

    for (const dir of this.searchPath.dirs) {
      for (const ext of extensions) {
        if (await isExecutable(path.join(dir, tool + ext))) {
          return true;
        }
      }
    }
    return false;
  }

  private spawnInherited(commandLine: string): Promise<number | null> {
    return new Promise((resolve, reject) => {
      const child = spawn(commandLine, {
        cwd: this.cwd,
        env: this.env,
        shell: true,
        stdio: 'inherit',
      });
      child.on('error', reject);
      child.on('close', (code) => resolve(code));
    });
  }
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      return false;
    }
    await fs.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
