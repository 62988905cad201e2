/**
 * @pylayer/core
 * 
 * Core package containing:
 * - Error handling
 * - Layer build configuration and result types
 * - Runtime layout rules
 * - External binary resolution
 */

// Errors
export {
  PyLayerError,
  ValidationError,
  MissingInputError,
  CommandExecutionError,
  UploadError,
  BuildAbortedError,
} from './errors/index.js';

// Types
export {
  layerBuildConfigSchema,
  DEFAULT_REGION,
  type LayerBuildConfig,
  type LayerBuildInput,
  type LayerBuildResult,
  type PublishResult,
} from './types/layer.js';

// Runtimes
export {
  DEFAULT_RUNTIME,
  isPythonRuntime,
  getLayerPathPrefix,
} from './runtime.js';

// Binaries
export {
  getBinariesConfig,
  binaries,
  getBinaryPath,
  type BinaryConfig,
  type BinariesConfig,
} from './config/binaries.js';
