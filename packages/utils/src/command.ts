/**
 * Command Execution Wrapper
 * 
 * Wrapper for executing external tools (pip, zip) with:
 * - Timeout handling
 * - Output capture
 * - Abort signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  timeout?: number; // milliseconds
  signal?: AbortSignal;
}

// Per stream; output beyond this is dropped
const MAX_OUTPUT_SIZE = 10 * 1024 * 1024;

/**
 * Signature shared by executeCommand and anything standing in for it
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command without a shell
 * 
 * @param command - The executable to run
 * @param args - Command arguments
 * @param options - Execution options
 * @returns Promise resolving to CommandResult
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    timeout = 600000, // 10 minutes default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      killTimer = setTimeout(() => child.kill('SIGKILL'), 10000);
    }, timeout);

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < MAX_OUTPUT_SIZE) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < MAX_OUTPUT_SIZE) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);
      clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // Spawn errors (ENOENT when the tool is not on PATH)
    child.on('error', (error) => {
      clearTimeout(timeoutId);
      clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}

/**
 * Render a command line for logs and error messages
 */
export function formatCommandLine(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}
