/**
 * Command-line surface: flags, defaults and the action they feed.
 */

import { Command } from 'commander';
import { DEFAULT_REGION, DEFAULT_RUNTIME } from '@pylayer/core';
import type { CreateOptions } from './commands/create.js';

export interface CliOptions extends CreateOptions {
  debug?: boolean;
}

export type CliAction = (options: CliOptions) => Promise<void>;

export function createProgram(action: CliAction): Command {
  return new Command()
    .name('pylayer')
    .description('Create an AWS Lambda layer from pip libraries')
    .version('1.0.0')
    .option('--libraries <names...>', 'The names of the pip libraries to include in the layer')
    .option('--requirements-file <path>', 'A requirements.txt file with additional libraries')
    .requiredOption('--layer-name <name>', 'The name of the Lambda layer')
    .option('--runtime <runtime>', 'The runtime for the Lambda layer', DEFAULT_RUNTIME)
    .option('--region <region>', 'The AWS region to create the Lambda layer in', DEFAULT_REGION)
    .option('--no-upload', 'Build the archive without uploading it to AWS')
    .option('-o, --output-dir <dir>', 'Directory to write the layer archive to', '.')
    .option('-d, --description <text>', 'Description for the published layer version')
    .option('--json', 'Output the result in JSON format')
    .option('--debug', 'Enable debug output')
    .action(action);
}
