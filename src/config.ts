/**
 * Extraction Configuration
 *
 * Defaults reproduce the fixed paths and model of the course
 * setup; every value can be overridden through the environment (a `.env`
 * file is loaded by the CLI) or by explicit overrides.
 *
 * @module config
 */

import { z } from 'zod';
import { PipelineError } from './utils/errors.js';
import { formatIssues } from './utils/validation.js';

export const DEFAULT_MODEL = 'gpt-5-nano';

/** Magnification of 3.5-4.0 keeps small table text legible */
export const DEFAULT_ZOOM = 3.5;

export const ExtractConfigSchema = z.object({
  // Inference service
  model: z.string().min(1).default(DEFAULT_MODEL),
  baseUrl: z.string().url().optional(),

  // Input files
  apiKeyPath: z.string().min(1).default('./course_api_key.txt'),
  apiKeyPrefix: z.string().min(1).default('sk-'),
  schemaPath: z.string().min(1).default('./structure.json'),
  jobsPath: z.string().min(1).default('./jobs.json'),

  // Rasterization
  zoom: z.number().positive().max(10).default(DEFAULT_ZOOM),
  pageIndex: z.number().int().min(0).default(0),
});

export type ExtractConfig = z.infer<typeof ExtractConfigSchema>;

type Env = Record<string, string | undefined>;

function parseNumberEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new PipelineError('CONFIGURATION_ERROR', `Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

function stringEnv(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw === '' ? undefined : raw;
}

/**
 * Load extraction configuration.
 *
 * Environment variables:
 *   EXTRACT_MODEL          — model identifier (default: gpt-5-nano)
 *   OPENAI_BASE_URL        — inference endpoint (default: SDK default)
 *   EXTRACT_API_KEY_PATH   — credential file (default: ./course_api_key.txt)
 *   EXTRACT_API_KEY_PREFIX — required credential prefix (default: sk-)
 *   EXTRACT_SCHEMA_PATH    — schema descriptor (default: ./structure.json)
 *   EXTRACT_JOBS_PATH      — job list (default: ./jobs.json)
 *   EXTRACT_ZOOM           — page magnification (default: 3.5)
 *   EXTRACT_PAGE_INDEX     — zero-based page to render (default: 0)
 */
export function loadExtractConfig(overrides: Partial<ExtractConfig> = {}, env: Env = process.env): ExtractConfig {
  const envConfig = {
    model: stringEnv(env, 'EXTRACT_MODEL'),
    baseUrl: stringEnv(env, 'OPENAI_BASE_URL'),
    apiKeyPath: stringEnv(env, 'EXTRACT_API_KEY_PATH'),
    apiKeyPrefix: stringEnv(env, 'EXTRACT_API_KEY_PREFIX'),
    schemaPath: stringEnv(env, 'EXTRACT_SCHEMA_PATH'),
    jobsPath: stringEnv(env, 'EXTRACT_JOBS_PATH'),
    zoom: parseNumberEnv(env, 'EXTRACT_ZOOM'),
    pageIndex: parseNumberEnv(env, 'EXTRACT_PAGE_INDEX'),
  };

  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const result = ExtractConfigSchema.safeParse({ ...envConfig, ...definedOverrides });
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new PipelineError('CONFIGURATION_ERROR', `Invalid configuration: ${issues.join('; ')}`, {
      issues,
    });
  }
  return result.data;
}
