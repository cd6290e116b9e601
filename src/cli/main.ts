/**
 * CLI entry logic
 *
 * `main` wires config, credentials, schema and jobs into the pipeline and
 * runs it. `runCli` is the single place where an error becomes a
 * diagnostic and an exit status; nothing below it exits the process.
 *
 * @module cli/main
 */

import dotenv from 'dotenv';
import { loadExtractConfig } from '../config.js';
import { loadApiKey } from '../services/credentials/key-loader.js';
import { loadSchemaFormat } from '../services/schema/schema-loader.js';
import { loadJobs } from '../services/jobs/jobs.js';
import { JobDriver, type LineWriter } from '../services/jobs/driver.js';
import { ConsistencyRunner, type PageRenderer } from '../services/consistency/runner.js';
import { ExtractionService } from '../services/extraction/service.js';
import { PageRasterizer } from '../services/images/page-rasterizer.js';
import { OpenAIInferenceClient, type InferenceClient, type OpenAIClientOptions } from '../services/openai/index.js';
import { PipelineError, formatErrorForCli } from '../utils/errors.js';
import { parseRepeatCount } from './args.js';

export interface MainOptions {
  env?: Record<string, string | undefined>;
  createInferenceClient?: (options: OpenAIClientOptions) => InferenceClient;
  renderer?: PageRenderer;
  write?: LineWriter;
}

/**
 * Run every configured job.
 *
 * @returns Exit code (0); failures are thrown
 */
export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const repeat = parseRepeatCount(argv);
  const config = loadExtractConfig({}, options.env ?? process.env);

  const apiKey = loadApiKey(config.apiKeyPath, config.apiKeyPrefix);
  const schema = loadSchemaFormat(config.schemaPath);
  const jobs = loadJobs(config.jobsPath);

  const createClient =
    options.createInferenceClient ?? ((clientOptions) => new OpenAIInferenceClient(clientOptions));
  const client = createClient({ apiKey, model: config.model, baseUrl: config.baseUrl });

  const runner = new ConsistencyRunner({
    renderer: options.renderer ?? new PageRasterizer({ pageIndex: config.pageIndex, zoom: config.zoom }),
    extractor: new ExtractionService(client),
    schema,
  });

  const driver = new JobDriver(
    runner,
    { model: config.model, apiKeyPath: config.apiKeyPath, schemaPath: config.schemaPath },
    options.write
  );
  await driver.runAll(jobs, repeat);
  return 0;
}

/**
 * Top-level boundary: load `.env`, run, and map any error to exit code 1.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  dotenv.config({ quiet: true });
  try {
    return await main(argv);
  } catch (error) {
    const pipelineError = PipelineError.fromUnknown(error);
    console.error(formatErrorForCli(pipelineError));
    return 1;
  }
}
