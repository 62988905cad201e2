/**
 * Zip Archiver
 * 
 * Compresses the build tree into a layer archive by shelling out to zip.
 * The archive is created from inside sourceDir so entries keep the
 * runtime prefix (python/...) as their first path segment.
 */

import { dirname, resolve } from 'node:path';
import { getBinaryPath } from '@pylayer/core';
import {
  createLogger,
  ensureDir,
  executeCommand,
  getFileSizeBytes,
  removePath,
  type CommandRunner,
  type Logger,
} from '@pylayer/utils';
import { runTool } from './tool.js';

export interface ArchiveRequest {
  sourceDir: string;
  entry: string;
  outputPath: string;
  signal?: AbortSignal;
}

export interface ArchiveResult {
  path: string;
  size: number;
}

export interface Archiver {
  archive(request: ArchiveRequest): Promise<ArchiveResult>;
}

export interface ZipArchiverOptions {
  zipPath?: string;
  timeout?: number;
  runner?: CommandRunner;
}

export class ZipArchiver implements Archiver {
  private zipPath: string;
  private timeout: number;
  private runner: CommandRunner;
  private log: Logger;

  constructor(options: ZipArchiverOptions = {}) {
    this.zipPath = options.zipPath ?? getBinaryPath('zip');
    this.timeout = options.timeout ?? 300000;
    this.runner = options.runner ?? executeCommand;
    this.log = createLogger({ component: 'archiver' });
  }

  async archive(request: ArchiveRequest): Promise<ArchiveResult> {
    const outputPath = resolve(request.outputPath);

    await ensureDir(dirname(outputPath));
    // zip updates an existing archive in place; start from nothing
    await removePath(outputPath);

    this.log.info({ outputPath, entry: request.entry }, 'Creating layer archive');

    await runTool(
      this.runner,
      this.zipPath,
      ['-q', '-r', outputPath, request.entry],
      { cwd: request.sourceDir, timeout: this.timeout, signal: request.signal },
      this.log
    );

    const size = await getFileSizeBytes(outputPath);
    this.log.info({ outputPath, size }, 'Layer archive created');

    return { path: outputPath, size };
  }
}
