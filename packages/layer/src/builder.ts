/**
 * Layer Builder
 * 
 * Runs the build pipeline for one layer:
 * validate -> temp dir -> pip install -> zip -> (publish) -> cleanup
 * 
 * The temp dir is removed on every exit path, including an abort through
 * BuildOptions.signal. The archive is written outside it, so a failed
 * publish leaves the archive for a manual retry.
 */

import { EventEmitter } from 'node:events';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  BuildAbortedError,
  MissingInputError,
  ValidationError,
  getLayerPathPrefix,
  layerBuildConfigSchema,
  type LayerBuildConfig,
  type LayerBuildInput,
  type LayerBuildResult,
  type PublishResult,
} from '@pylayer/core';
import { createLogger, createTempDir, ensureDir, removePath, type Logger } from '@pylayer/utils';
import { PipInstaller, type Installer } from './installer.js';
import { ZipArchiver, type Archiver } from './archiver.js';
import { LambdaLayerPublisher, type Publisher } from './publisher.js';
import { readRequirementsFile } from './requirements.js';

export type BuildStep = 'install' | 'archive' | 'publish';

export interface BuildStepEvent {
  step: BuildStep;
  status: 'start' | 'done';
  detail?: string;
}

export interface BuildOptions {
  signal?: AbortSignal;
}

export interface LayerBuilderOptions {
  installer?: Installer;
  archiver?: Archiver;
  createPublisher?: (region: string) => Publisher;
  tempPrefix?: string;
}

export class LayerBuilder extends EventEmitter {
  private installer: Installer;
  private archiver: Archiver;
  private createPublisher: (region: string) => Publisher;
  private tempPrefix: string;
  private log: Logger;

  constructor(options: LayerBuilderOptions = {}) {
    super();
    this.installer = options.installer ?? new PipInstaller();
    this.archiver = options.archiver ?? new ZipArchiver();
    this.createPublisher = options.createPublisher ?? ((region) => new LambdaLayerPublisher({ region }));
    this.tempPrefix = options.tempPrefix ?? 'pylayer-';
    this.log = createLogger({ component: 'builder' });
  }

  /**
   * Build the layer archive and publish it unless config.upload is false
   */
  async build(input: LayerBuildInput, options: BuildOptions = {}): Promise<LayerBuildResult> {
    const { signal } = options;
    const startTime = Date.now();
    const config = this.validate(input);
    const prefix = getLayerPathPrefix(config.runtime);

    // Resolved before anything touches the disk
    const requirements = config.requirementsFile
      ? await readRequirementsFile(config.requirementsFile)
      : [];
    const libraries = [...config.libraries, ...requirements];
    const description = config.description ?? describeLayer(config.libraries, requirements);

    // An archive from an earlier run must not pass for this run's output
    const outputPath = join(config.outputDir, `${config.layerName}.zip`);
    await removePath(outputPath);

    throwIfAborted(signal);
    const tempDir = await createTempDir(this.tempPrefix);
    this.log.debug({ tempDir }, 'Created build directory');

    try {
      const packageDir = join(tempDir, prefix);
      await ensureDir(packageDir);

      this.emitStep({ step: 'install', status: 'start', detail: libraries.join(', ') });
      await this.installer.install({
        libraries: config.libraries,
        requirementsFile: config.requirementsFile,
        targetDir: packageDir,
        signal,
      });
      throwIfAborted(signal, 'install');
      this.emitStep({ step: 'install', status: 'done' });

      this.emitStep({ step: 'archive', status: 'start' });
      const archive = await this.archiver.archive({
        sourceDir: tempDir,
        entry: prefix,
        outputPath,
        signal,
      });
      throwIfAborted(signal, 'archive');
      this.emitStep({ step: 'archive', status: 'done', detail: archive.path });

      let published: PublishResult | undefined;
      if (config.upload) {
        throwIfAborted(signal, 'publish');
        this.emitStep({ step: 'publish', status: 'start', detail: config.region });
        const publisher = this.createPublisher(config.region);
        published = await publisher.publish({
          layerName: config.layerName,
          zipFile: await readFile(archive.path),
          runtime: config.runtime,
          description,
          archivePath: archive.path,
        });
        this.emitStep({ step: 'publish', status: 'done', detail: published.layerVersionArn });
      } else {
        this.log.info({ archivePath: archive.path }, 'Upload skipped');
      }

      return {
        layerName: config.layerName,
        archivePath: archive.path,
        archiveSize: archive.size,
        libraries,
        published,
        duration: Date.now() - startTime,
      };
    } finally {
      await removePath(tempDir);
      this.log.debug({ tempDir }, 'Removed build directory');
    }
  }

  private validate(input: LayerBuildInput): LayerBuildConfig {
    const parsed = layerBuildConfigSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ValidationError(
        issue?.path.join('.') || 'config',
        issue?.message ?? 'Invalid configuration'
      );
    }

    const config = parsed.data;
    if (config.libraries.length === 0 && !config.requirementsFile) {
      throw new MissingInputError();
    }
    return config;
  }

  private emitStep(event: BuildStepEvent): void {
    this.emit('step', event);
  }
}

function throwIfAborted(signal: AbortSignal | undefined, step?: string): void {
  if (signal?.aborted) {
    throw new BuildAbortedError(step);
  }
}

export function describeLayer(libraries: string[], requirements: string[] = []): string {
  const names = libraries.length > 0 ? libraries : requirements;
  if (names.length === 0) {
    return 'Lambda layer for multiple libraries';
  }

  const description = `Lambda layer for ${names.join(', ')}`;
  // Lambda caps descriptions at 256 characters
  return description.length > 256 ? `${description.slice(0, 253)}...` : description;
}
