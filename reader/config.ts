import dotenv from 'dotenv';
import * as path from 'path';
import { z } from 'zod';
import type { FilterOptions } from './types';

dotenv.config();

export const DEFAULT_DATASET_DIR = path.resolve(__dirname, '..', 'dataset');

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  NARRATION_DATASET_DIR: z.string().min(1).optional(),
  NARRATION_OUTPUT_SUFFIX: z.string().min(1).default('.narration.txt'),
  NARRATION_HEADING_ENDS_TOC: flag,
  NARRATION_OVERWRITE: flag,
});

export interface NarrationConfig {
  datasetDir: string;
  outputSuffix: string;
  overwrite: boolean;
  filter: FilterOptions;
}

/**
 * Reads the configuration from environment variables (and `.env`)
 * @param env - Variables to read (default: process.env)
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): NarrationConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const keys = result.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new Error(`Invalid configuration: ${keys}`);
  }

  const parsed = result.data;
  return {
    datasetDir: parsed.NARRATION_DATASET_DIR ?? DEFAULT_DATASET_DIR,
    outputSuffix: parsed.NARRATION_OUTPUT_SUFFIX,
    overwrite: parsed.NARRATION_OVERWRITE,
    filter: { headingEndsToc: parsed.NARRATION_HEADING_ENDS_TOC },
  };
}
