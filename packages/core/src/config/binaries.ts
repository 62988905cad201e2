/**
 * Binary Configuration
 * 
 * Resolves the external tools the build shells out to.
 * 
 * Priority order:
 * 1. Environment variables (PIP_PATH, ZIP_PATH)
 * 2. System PATH
 */

import { existsSync } from 'node:fs';
import { isAbsolute } from 'node:path';

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
}

export interface BinariesConfig {
  pip: BinaryConfig;
  zip: BinaryConfig;
}

function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  const envPath = env[envVar];

  // A bare name (pip3) is left for PATH lookup; an absolute path must exist
  if (envPath && (!isAbsolute(envPath) || existsSync(envPath))) {
    return { name, envVar, resolvedPath: envPath };
  }

  return { name, envVar, resolvedPath: name + getExeExt() };
}

export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    pip: resolveBinaryPath('pip', 'PIP_PATH', env),
    zip: resolveBinaryPath('zip', 'ZIP_PATH', env),
  };
}

let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

export function getBinaryPath(name: keyof BinariesConfig): string {
  return binaries()[name].resolvedPath;
}
