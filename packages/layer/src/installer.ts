/**
 * Pip Installer
 * 
 * Installs packages into a target directory with `pip install -t`.
 */

import { getBinaryPath } from '@pylayer/core';
import { createLogger, executeCommand, type CommandRunner, type Logger } from '@pylayer/utils';
import { runTool } from './tool.js';

export interface InstallRequest {
  libraries: string[];
  requirementsFile?: string;
  targetDir: string;
  signal?: AbortSignal;
}

export interface Installer {
  install(request: InstallRequest): Promise<void>;
}

export interface PipInstallerOptions {
  pipPath?: string;
  timeout?: number;
  runner?: CommandRunner;
}

export class PipInstaller implements Installer {
  private pipPath: string;
  private timeout: number;
  private runner: CommandRunner;
  private log: Logger;

  constructor(options: PipInstallerOptions = {}) {
    this.pipPath = options.pipPath ?? getBinaryPath('pip');
    this.timeout = options.timeout ?? 600000;
    this.runner = options.runner ?? executeCommand;
    this.log = createLogger({ component: 'installer' });
  }

  /**
   * Install each library, then the requirements file, into targetDir
   */
  async install(request: InstallRequest): Promise<void> {
    const { libraries, requirementsFile, targetDir, signal } = request;

    for (const library of libraries) {
      this.log.info({ library }, 'Installing library');
      await this.pip(['install', library, '-t', targetDir], signal);
    }

    if (requirementsFile) {
      this.log.info({ requirementsFile }, 'Installing requirements file');
      await this.pip(['install', '-r', requirementsFile, '-t', targetDir], signal);
    }
  }

  private async pip(args: string[], signal?: AbortSignal): Promise<void> {
    await runTool(this.runner, this.pipPath, args, { timeout: this.timeout, signal }, this.log);
  }
}
