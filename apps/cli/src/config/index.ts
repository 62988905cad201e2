/**
 * CLI Configuration
 * 
 * Environment-driven settings. A .env file in the working directory
 * is loaded first; real environment variables win over it.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  PYLAYER_DEBUG: z.string().optional(),
  PYLAYER_INSTALL_TIMEOUT: z.string().regex(/^\d+$/).transform(Number).default('600000'),
  PYLAYER_ZIP_TIMEOUT: z.string().regex(/^\d+$/).transform(Number).default('300000'),
});

export interface CliConfig {
  logLevel: string;
  debug: boolean;
  installTimeout: number;
  zipTimeout: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.parse(env);
  const debug = parsed.PYLAYER_DEBUG === 'true';

  return {
    // Only warnings reach the terminal unless asked for
    logLevel: parsed.LOG_LEVEL ?? (debug ? 'debug' : 'warn'),
    debug,
    installTimeout: parsed.PYLAYER_INSTALL_TIMEOUT,
    zipTimeout: parsed.PYLAYER_ZIP_TIMEOUT,
  };
}

export const config = loadConfig();
