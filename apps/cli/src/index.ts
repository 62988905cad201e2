#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Packages pip libraries into an AWS Lambda layer archive and
 * optionally publishes it as a new layer version.
 */

import chalk from 'chalk';
import { setLogLevel } from '@pylayer/utils';
import { config } from './config/index.js';
import { createCommand } from './commands/create.js';
import { createProgram } from './program.js';

const program = createProgram(async (options) => {
  setLogLevel(options.debug ? 'debug' : config.logLevel);
  await createCommand(options);
});

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.missingMandatoryOptionValue') {
    console.log('Run', chalk.cyan('pylayer --help'), 'for usage');
  }
  process.exit(1);
});

await program.parseAsync();
