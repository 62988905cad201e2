/**
 * Create Command
 * 
 * Builds a layer archive from pip packages and publishes it
 * as a new Lambda layer version unless --no-upload is given.
 */

import ora from 'ora';
import chalk from 'chalk';
import {
  CommandExecutionError,
  PyLayerError,
  UploadError,
  type LayerBuildResult,
} from '@pylayer/core';
import { LayerBuilder, PipInstaller, ZipArchiver, type BuildStepEvent } from '@pylayer/layer';
import { formatBytes, formatDuration } from '@pylayer/utils';
import { config } from '../config/index.js';
import { resolveLibraries, type Ask } from '../lib/prompt.js';
import {
  printDetail,
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';

export interface CreateOptions {
  libraries?: string[];
  requirementsFile?: string;
  layerName: string;
  runtime: string;
  region: string;
  upload: boolean;
  outputDir: string;
  description?: string;
  json?: boolean;
}

export interface CreateContext {
  builder: LayerBuilder;
  interactive: boolean;
  ask?: Ask;
  signal?: AbortSignal;
}

const stepLabels: Record<BuildStepEvent['step'], string> = {
  install: 'Installing packages',
  archive: 'Creating archive',
  publish: 'Publishing layer version',
};

/**
 * Resolve inputs and run the build
 */
export async function runCreate(
  options: CreateOptions,
  context: CreateContext
): Promise<LayerBuildResult> {
  const libraries = await resolveLibraries(
    { libraries: options.libraries, requirementsFile: options.requirementsFile },
    { interactive: context.interactive, ask: context.ask }
  );

  return context.builder.build({
    libraries,
    requirementsFile: options.requirementsFile,
    layerName: options.layerName,
    runtime: options.runtime,
    region: options.region,
    upload: options.upload,
    outputDir: options.outputDir,
    description: options.description,
  }, { signal: context.signal });
}

export function createBuilder(): LayerBuilder {
  return new LayerBuilder({
    installer: new PipInstaller({ timeout: config.installTimeout }),
    archiver: new ZipArchiver({ timeout: config.zipTimeout }),
  });
}

export async function createCommand(options: CreateOptions): Promise<void> {
  const builder = createBuilder();
  const spinner = ora({ text: 'Preparing build...', isSilent: options.json === true });

  // First Ctrl-C stops the running tool and lets the build clean up;
  // a second one exits at once
  const controller = new AbortController();
  const onSignal = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    spinner.text = 'Stopping, removing build directory...';
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  builder.on('step', (event: BuildStepEvent) => {
    const label = stepLabels[event.step];
    if (event.status === 'start') {
      spinner.start(event.detail ? `${label} (${event.detail})...` : `${label}...`);
    } else {
      spinner.succeed(label);
    }
  });

  try {
    const result = await runCreate(options, {
      builder,
      interactive: process.stdin.isTTY === true && options.json !== true,
      signal: controller.signal,
    });

    if (options.json) {
      printJson(result);
      return;
    }

    printResult(result);
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail();
    }
    reportError(error);
    process.exit(error instanceof PyLayerError ? error.exitCode : 1);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

function printResult(result: LayerBuildResult): void {
  printHeader(`Layer ${result.layerName}`);
  printKeyValue('Archive', result.archivePath);
  printKeyValue('Size', formatBytes(result.archiveSize));
  printKeyValue('Packages', result.libraries.join(', '));
  printKeyValue('Took', formatDuration(result.duration));

  if (result.published) {
    printKeyValue('Layer ARN', result.published.layerArn);
    printKeyValue('Version', result.published.version);
    console.log();
    printSuccess(`Published ${chalk.cyan(result.published.layerVersionArn)}`);
  } else {
    console.log();
    printSuccess(`Lambda layer package created at: ${result.archivePath}`);
  }
}

function reportError(error: unknown): void {
  if (error instanceof UploadError) {
    printError(error.message);
    const archivePath = error.details?.['archivePath'];
    if (typeof archivePath === 'string') {
      printWarning(`Archive kept at ${archivePath}; rerun the upload once the problem is fixed`);
    }
    return;
  }

  if (error instanceof CommandExecutionError) {
    printError(error.message);
    if (error.stderr) {
      printDetail(error.stderr.trim());
    }
    return;
  }

  printError(error instanceof Error ? error.message : 'Unknown error');
}
