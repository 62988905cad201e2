/**
 * @pylayer/layer
 * 
 * Layer build pipeline.
 * 
 * Responsibilities:
 * - Install pip packages into the runtime's layer directory
 * - Zip the tree into a layer archive
 * - Publish the archive as a Lambda layer version
 */

export {
  LayerBuilder,
  describeLayer,
  type BuildStep,
  type BuildStepEvent,
  type BuildOptions,
  type LayerBuilderOptions,
} from './builder.js';

export { PipInstaller, type Installer, type InstallRequest, type PipInstallerOptions } from './installer.js';

export { ZipArchiver, type Archiver, type ArchiveRequest, type ArchiveResult, type ZipArchiverOptions } from './archiver.js';

export {
  LambdaLayerPublisher,
  DIRECT_UPLOAD_LIMIT,
  type Publisher,
  type PublishRequest,
  type LayerVersionApi,
  type LambdaLayerPublisherOptions,
} from './publisher.js';

export { parseRequirements, readRequirementsFile } from './requirements.js';
