/**
 * Lambda Runtimes
 * 
 * Maps a runtime identifier to the directory inside a layer archive
 * from which that runtime imports packages.
 */

import { ValidationError } from './errors/index.js';

export const DEFAULT_RUNTIME = 'python3.10';

const PYTHON_RUNTIME = /^python3\.\d+$/;

export function isPythonRuntime(runtime: string): boolean {
  return PYTHON_RUNTIME.test(runtime);
}

/**
 * Lambda adds /opt/python to sys.path for every python3.x runtime
 */
export function getLayerPathPrefix(runtime: string): string {
  if (!isPythonRuntime(runtime)) {
    throw new ValidationError(
      'runtime',
      `${runtime} is not a Python runtime (expected e.g. ${DEFAULT_RUNTIME})`
    );
  }
  return 'python';
}
