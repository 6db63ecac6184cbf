/**
 * Utilities for executing system commands
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

const COMMAND_TIMEOUT_MS = 30000;

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Execute a command without a shell and return the result
 */
export async function executeCommand(
  command: string,
  args: readonly string[] = []
): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: COMMAND_TIMEOUT_MS,
      maxBuffer: 10 * 1024 * 1024, // 10MB
    });

    return {
      stdout: stdout.trim(),
      stderr: stderr.trim(),
      exitCode: 0,
    };
  } catch (error: unknown) {
    const failure = error instanceof Error ? error : new Error(String(error));
    const details: { message: string; stdout?: unknown; stderr?: unknown; code?: unknown } = failure;
    return {
      stdout: typeof details.stdout === 'string' ? details.stdout.trim() : '',
      stderr: typeof details.stderr === 'string' ? details.stderr.trim() : failure.message,
      exitCode: typeof details.code === 'number' ? details.code : 1,
    };
  }
}

/**
 * Platform command that opens a file with its default application
 */
export function openerCommand(
  target: string,
  platform: NodeJS.Platform = process.platform
): { command: string; args: string[] } {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [target] };
    case 'win32':
      return { command: 'cmd', args: ['/c', 'start', '""', target] };
    default:
      return { command: 'xdg-open', args: [target] };
  }
}

/**
 * Open a file in the default viewer (a browser for HTML pages)
 */
export async function openInViewer(target: string): Promise<ExecResult> {
  const { command, args } = openerCommand(target);
  return executeCommand(command, args);
}
