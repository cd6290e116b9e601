/**
 * Job list loading
 *
 * `jobs.json` is an ordered array of `{ inputPath, outputPath }`. Relative
 * paths are resolved against the directory holding the jobs file.
 *
 * @module services/jobs/jobs
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { ExtractionJob } from '../../models/job.js';
import { PipelineError, missingFileError } from '../../utils/errors.js';
import { formatIssues } from '../../utils/validation.js';

export const JobListSchema = z
  .array(
    z.object({
      inputPath: z.string().min(1, 'inputPath is required'),
      outputPath: z.string().min(1, 'outputPath is required'),
    })
  )
  .min(1, 'Job list must contain at least one job');

/**
 * Load and validate the job list.
 *
 * @throws PipelineError MISSING_FILE or CONFIGURATION_ERROR
 */
export function loadJobs(jobsPath: string): ExtractionJob[] {
  if (!fs.existsSync(jobsPath)) {
    throw missingFileError('Job list', jobsPath);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(jobsPath, 'utf-8'));
  } catch (error) {
    throw new PipelineError(
      'CONFIGURATION_ERROR',
      `Job list is not valid JSON: ${jobsPath} - ${error instanceof Error ? error.message : String(error)}`,
      { path: jobsPath }
    );
  }

  const result = JobListSchema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new PipelineError('CONFIGURATION_ERROR', `Invalid job list ${jobsPath}: ${issues.join('; ')}`, {
      path: jobsPath,
      issues,
    });
  }

  const baseDir = path.dirname(jobsPath);
  return result.data.map((job) => ({
    inputPath: path.resolve(baseDir, job.inputPath),
    outputPath: path.resolve(baseDir, job.outputPath),
  }));
}
