/**
 * External Tool Invocation
 * 
 * Runs pip/zip through the command wrapper and turns any failure
 * into a CommandExecutionError, or a BuildAbortedError once the
 * signal in options has fired.
 */

import { BuildAbortedError, CommandExecutionError } from '@pylayer/core';
import {
  formatCommandLine,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  type Logger,
} from '@pylayer/utils';

export async function runTool(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: CommandOptions,
  log: Logger
): Promise<CommandResult> {
  const commandLine = formatCommandLine(command, args);
  log.debug({ command: commandLine, cwd: options.cwd }, 'Running command');

  if (options.signal?.aborted) {
    throw new BuildAbortedError(command);
  }

  let result: CommandResult;
  try {
    result = await runner(command, args, options);
  } catch (error) {
    if (options.signal?.aborted) {
      throw new BuildAbortedError(command);
    }
    // Spawn failures: executable missing or not runnable
    const message = error instanceof Error ? error.message : String(error);
    throw new CommandExecutionError(commandLine, 127, message);
  }

  if (options.signal?.aborted) {
    throw new BuildAbortedError(command);
  }

  if (result.timedOut) {
    throw new CommandExecutionError(
      commandLine,
      result.exitCode,
      `Timed out after ${options.timeout ?? 0}ms\n${result.stderr}`
    );
  }

  if (result.exitCode !== 0) {
    log.debug({ command: commandLine, stderr: result.stderr }, 'Command failed');
    throw new CommandExecutionError(commandLine, result.exitCode, result.stderr || result.stdout);
  }

  log.debug({ command: commandLine, duration: result.duration }, 'Command finished');
  return result;
}
