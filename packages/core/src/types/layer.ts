/**
 * Layer Build Types
 */

import { z } from 'zod';
import { DEFAULT_RUNTIME, isPythonRuntime } from '../runtime.js';

export const DEFAULT_REGION = 'us-east-1';

export const layerBuildConfigSchema = z.object({
  libraries: z.array(z.string().trim().min(1)).default([]),
  requirementsFile: z.string().min(1).optional(),
  layerName: z
    .string()
    .min(1, 'Layer name is required')
    .max(64)
    .regex(/^[a-zA-Z0-9_-]+$/, 'Layer name may only contain letters, digits, hyphens and underscores'),
  runtime: z
    .string()
    .default(DEFAULT_RUNTIME)
    .refine(isPythonRuntime, { message: 'Runtime must be a Python runtime such as python3.10' }),
  region: z.string().min(1).default(DEFAULT_REGION),
  upload: z.boolean().default(true),
  outputDir: z.string().min(1).default('.'),
  description: z.string().max(256).optional(),
});

export type LayerBuildConfig = z.infer<typeof layerBuildConfigSchema>;
export type LayerBuildInput = z.input<typeof layerBuildConfigSchema>;

export interface PublishResult {
  layerArn: string;
  layerVersionArn: string;
  version: number;
}

export interface LayerBuildResult {
  layerName: string;
  archivePath: string;
  archiveSize: number;
  libraries: string[];
  published?: PublishResult;
  duration: number;
}
