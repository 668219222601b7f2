/**
 * Debug logger for hcg-setup
 * Writes debug output to .hcg/debug.log
 */

import * as fs from 'fs';
import * as path from 'path';
import { homedir, tmpdir } from 'os';

const HCG_DIR = '.hcg';
const DEBUG_LOG_FILE = 'debug.log';
const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB

let projectRoot = process.cwd();
let logFilePath: string | null = null;
let sessionStarted = false;

/**
 * Point the logger at a project root. Resets the resolved log path.
 */
export function configureLogger(root: string): void {
  projectRoot = root;
  logFilePath = null;
  sessionStarted = false;
}

function ensureDir(dir: string): boolean {
  try {
    fs.mkdirSync(dir, { recursive: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Get the debug log file path. Never throws.
 */
export function getLogPath(): string {
  if (!logFilePath) {
    // Project-local .hcg first, fall back to the home directory
    const localDir = path.join(projectRoot, HCG_DIR);
    const homeDir = path.join(homedir(), HCG_DIR);

    if (fs.existsSync(localDir)) {
      logFilePath = path.join(localDir, DEBUG_LOG_FILE);
    } else if (ensureDir(homeDir)) {
      logFilePath = path.join(homeDir, DEBUG_LOG_FILE);
    } else {
      // Home directory not writable
      const tempDir = path.join(tmpdir(), HCG_DIR);
      ensureDir(tempDir);
      logFilePath = path.join(tempDir, DEBUG_LOG_FILE);
    }
  }
  return logFilePath;
}

function initSession(): void {
  if (sessionStarted) return;
  sessionStarted = true;

  try {
    const logPath = getLogPath();
    if (fs.existsSync(logPath) && fs.statSync(logPath).size > MAX_LOG_SIZE) {
      const backupPath = logPath + '.old';
      if (fs.existsSync(backupPath)) {
        fs.unlinkSync(backupPath);
      }
      fs.renameSync(logPath, backupPath);
    }

    const separator = '='.repeat(80);
    fs.appendFileSync(
      logPath,
      `\n${separator}\n[${new Date().toISOString()}] hcg-setup session started (${projectRoot})\n${separator}\n`
    );
  } catch {
    // Logging must never stop a setup run
  }
}

/**
 * Format a log entry
 */
export function formatEntry(level: string, message: string, data?: unknown): string {
  let entry = `[${new Date().toISOString()}] [${level}] ${message}`;

  if (data !== undefined) {
    try {
      if (data instanceof Error) {
        entry += `\n  Error: ${data.message}`;
        if (data.stack) {
          entry += `\n  Stack: ${data.stack}`;
        }
      } else if (typeof data === 'object') {
        entry += `\n  Data: ${JSON.stringify(data, null, 2).split('\n').join('\n  ')}`;
      } else {
        entry += `\n  Data: ${String(data)}`;
      }
    } catch {
      entry += `\n  Data: [Could not serialize]`;
    }
  }

  return entry + '\n';
}

function writeLog(level: string, message: string, data?: unknown): void {
  initSession();

  try {
    fs.appendFileSync(getLogPath(), formatEntry(level, message, data));
  } catch {
    // Silently fail - don't interrupt CLI operation
  }
}

export function logInfo(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function logWarn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function logError(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

export function logDebug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

/**
 * Log command execution
 */
export function logCommand(command: string, args?: Record<string, unknown>): void {
  writeLog('CMD', `Executing: ${command}`, args);
}

/**
 * Log command output (stdout/stderr)
 */
export function logOutput(type: 'stdout' | 'stderr', output: string): void {
  if (output.trim()) {
    writeLog(type.toUpperCase(), output.trim());
  }
}

/**
 * Log a full error with context for debugging
 */
export function logFullError(
  context: string,
  error: unknown,
  additionalData?: Record<string, unknown>
): void {
  const errorData: Record<string, unknown> = {
    context,
    ...additionalData,
  };

  if (error instanceof Error) {
    errorData.errorMessage = error.message;
    errorData.errorStack = error.stack;
    errorData.errorName = error.name;
  } else {
    errorData.rawError = String(error);
  }

  writeLog('ERROR', `Error in ${context}`, errorData);
}

export interface CommandLogger {
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
  debug: (message: string, data?: unknown) => void;
  command: (cmd: string, args?: Record<string, unknown>) => void;
}

/**
 * Create a logger for a specific command
 */
export function createCommandLogger(commandName: string): CommandLogger {
  return {
    info: (message, data) => logInfo(`[${commandName}] ${message}`, data),
    warn: (message, data) => logWarn(`[${commandName}] ${message}`, data),
    error: (message, data) => logError(`[${commandName}] ${message}`, data),
    debug: (message, data) => logDebug(`[${commandName}] ${message}`, data),
    command: (cmd, args) => logCommand(`[${commandName}] ${cmd}`, args),
  };
}
