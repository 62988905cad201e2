import { describe, it, expect } from 'vitest';
import { layerBuildConfigSchema } from './layer.js';

describe('layerBuildConfigSchema', () => {
  it('applies defaults', () => {
    const config = layerBuildConfigSchema.parse({ layerName: 'deps', libraries: ['requests'] });
    expect(config).toEqual({
      libraries: ['requests'],
      layerName: 'deps',
      runtime: 'python3.10',
      region: 'us-east-1',
      upload: true,
      outputDir: '.',
    });
  });

  it('rejects layer names with path separators', () => {
    const result = layerBuildConfigSchema.safeParse({ layerName: '../deps' });
    expect(result.success).toBe(false);
  });

  it('rejects non-python runtimes', () => {
    const result = layerBuildConfigSchema.safeParse({ layerName: 'deps', runtime: 'nodejs20.x' });
    expect(result.success).toBe(false);
  });

  it('drops nothing from the library list', () => {
    const config = layerBuildConfigSchema.parse({
      layerName: 'deps',
      libraries: ['requests', 'boto3==1.34.0'],
    });
    expect(config.libraries).toEqual(['requests', 'boto3==1.34.0']);
  });
});
