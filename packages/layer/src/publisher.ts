/**
 * Lambda Layer Publisher
 * 
 * Publishes a layer archive as a new Lambda layer version.
 * Credentials come from the AWS SDK default provider chain.
 */

import {
  Lambda,
  type PublishLayerVersionCommandInput,
  type PublishLayerVersionCommandOutput,
} from '@aws-sdk/client-lambda';
import { UploadError, type PublishResult } from '@pylayer/core';
import { createLogger, formatBytes, type Logger } from '@pylayer/utils';

/**
 * Direct (non-S3) uploads above this size are rejected by Lambda
 */
export const DIRECT_UPLOAD_LIMIT = 50 * 1024 * 1024;

export interface LayerVersionApi {
  publishLayerVersion(
    input: PublishLayerVersionCommandInput
  ): Promise<PublishLayerVersionCommandOutput>;
}

export interface PublishRequest {
  layerName: string;
  zipFile: Uint8Array;
  runtime: string;
  description: string;
  archivePath?: string;
}

export interface Publisher {
  publish(request: PublishRequest): Promise<PublishResult>;
}

export interface LambdaLayerPublisherOptions {
  region: string;
  api?: LayerVersionApi;
}

export class LambdaLayerPublisher implements Publisher {
  private api: LayerVersionApi;
  private log: Logger;

  constructor(options: LambdaLayerPublisherOptions) {
    this.api = options.api ?? new Lambda({ region: options.region });
    this.log = createLogger({ component: 'publisher', region: options.region });
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    const { layerName, zipFile, runtime, description, archivePath } = request;

    if (zipFile.byteLength > DIRECT_UPLOAD_LIMIT) {
      this.log.warn(
        { layerName, size: zipFile.byteLength },
        `Archive is ${formatBytes(zipFile.byteLength)}, above the ${formatBytes(DIRECT_UPLOAD_LIMIT)} direct upload limit`
      );
    }

    this.log.info({ layerName, runtime, size: zipFile.byteLength }, 'Publishing layer version');

    let response: PublishLayerVersionCommandOutput;
    try {
      response = await this.api.publishLayerVersion({
        LayerName: layerName,
        Description: description,
        Content: { ZipFile: zipFile },
        CompatibleRuntimes: [runtime],
      });
    } catch (error) {
      if (error instanceof Error) {
        throw new UploadError(layerName, error.message, error.name, archivePath);
      }
      throw new UploadError(layerName, String(error), undefined, archivePath);
    }

    const { LayerArn, LayerVersionArn, Version } = response;
    if (!LayerVersionArn) {
      throw new UploadError(layerName, 'Response did not include a LayerVersionArn', undefined, archivePath);
    }

    // LayerVersionArn is the layer ARN with ":<version>" appended
    const versionSuffix = /:(\d+)$/.exec(LayerVersionArn);
    const result: PublishResult = {
      layerArn: LayerArn ?? LayerVersionArn.replace(/:\d+$/, ''),
      layerVersionArn: LayerVersionArn,
      version: Version ?? (versionSuffix ? Number(versionSuffix[1]) : 0),
    };

    this.log.info({ layerVersionArn: result.layerVersionArn, version: result.version }, 'Layer version published');
    return result;
  }
}
