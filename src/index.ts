/**
 * pdf-table-extract
 *
 * Library surface of the extraction pipeline. The command-line entry point
 * lives in bin.ts.
 *
 * @module index
 */

export * from './models/index.js';
export { loadExtractConfig, ExtractConfigSchema, DEFAULT_MODEL, DEFAULT_ZOOM, type ExtractConfig } from './config.js';
export { loadApiKey, DEFAULT_KEY_PREFIX } from './services/credentials/key-loader.js';
export { loadSchemaFormat, type SchemaContract } from './services/schema/schema-loader.js';
export {
  PageRasterizer,
  toDataUrl,
  type RenderOptions,
  type RenderedPage,
} from './services/images/page-rasterizer.js';
export * from './services/openai/index.js';
export {
  ExtractionService,
  parseResponseJson,
  validateExtraction,
  type TableExtractor,
} from './services/extraction/service.js';
export { writeRecordsCsv, renderCsv, escapeCsv, type CsvWriteResult } from './services/csv/writer.js';
export {
  ConsistencyRunner,
  runOutputPath,
  type ConsistencyRunnerDeps,
  type PageRenderer,
} from './services/consistency/runner.js';
export { loadJobs, JobListSchema } from './services/jobs/jobs.js';
export { JobDriver, formatRunLine, type DriverSettings, type JobRunner, type LineWriter } from './services/jobs/driver.js';
export { main, runCli, type MainOptions } from './cli/main.js';
export { parseRepeatCount, USAGE } from './cli/args.js';
export { PipelineError, formatErrorForCli, type ErrorCategory } from './utils/errors.js';
export { ValidationError, validateInput } from './utils/validation.js';
export { computeHash, hashFile, isValidHashFormat, shortHash } from './utils/hash.js';
