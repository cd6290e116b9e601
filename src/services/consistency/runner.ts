/**
 * Consistency Runner
 *
 * Runs the rasterize → extract → write pipeline for one job, once or N
 * times. With N > 1 every run writes its own `.run{i}.csv` file and the
 * runs are compared by content hash: all identical promotes the last run
 * to the canonical path, any difference leaves only the run files behind.
 * No majority vote.
 *
 * @module services/consistency/runner
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ConsistencyReport, ExtractionJob, RunOutcome } from '../../models/job.js';
import type { SchemaContract } from '../schema/schema-loader.js';
import type { TableExtractor } from '../extraction/service.js';
import type { RenderOptions } from '../images/page-rasterizer.js';
import { writeRecordsCsv } from '../csv/writer.js';
import { hashFile } from '../../utils/hash.js';
import { invalidArgumentError } from '../../utils/errors.js';

/**
 * Page-to-image capability
 */
export interface PageRenderer {
  renderPageToDataUrl(pdfPath: string, options?: RenderOptions): Promise<string>;
}

export interface ConsistencyRunnerDeps {
  renderer: PageRenderer;
  extractor: TableExtractor;
  schema: SchemaContract;
  renderOptions?: RenderOptions;
}

/**
 * Path of the i-th (1-based) run file for a canonical output path.
 *
 * @example
 * runOutputPath('./out/table.csv', 2) // './out/table.run2.csv'
 */
export function runOutputPath(outputPath: string, runIndex: number): string {
  if (outputPath.endsWith('.csv')) {
    return `${outputPath.slice(0, -'.csv'.length)}.run${runIndex}.csv`;
  }
  return `${outputPath}.run${runIndex}.csv`;
}

export class ConsistencyRunner {
  constructor(private readonly deps: ConsistencyRunnerDeps) {}

  /**
   * Process a job `repeat` times and decide consistency.
   *
   * @throws PipelineError INVALID_ARGUMENT if repeat is not a positive integer;
   *   any run failure propagates unchanged
   */
  async run(job: ExtractionJob, repeat: number): Promise<ConsistencyReport> {
    if (!Number.isInteger(repeat) || repeat < 1) {
      throw invalidArgumentError(`Repeat count must be a positive integer, got ${repeat}`, { repeat });
    }

    if (repeat === 1) {
      const outcome = await this.runOnce(job, job.outputPath, 1);
      return { job, status: 'single', runs: [outcome], canonicalPath: job.outputPath };
    }

    const runs: RunOutcome[] = [];
    for (let i = 1; i <= repeat; i++) {
      const outcome = await this.runOnce(job, runOutputPath(job.outputPath, i), i);
      runs.push(outcome);
    }

    const distinct = new Set(runs.map((r) => r.hash));
    if (distinct.size !== 1) {
      return { job, status: 'inconsistent', runs, canonicalPath: null };
    }

    const last = runs[runs.length - 1];
    fs.renameSync(last.outputPath, job.outputPath);
    return { job, status: 'consistent', runs, canonicalPath: job.outputPath };
  }

  /**
   * One pass: rasterize, extract, write, hash.
   */
  async runOnce(job: ExtractionJob, outputPath: string, runIndex: number): Promise<RunOutcome> {
    const image = await this.deps.renderer.renderPageToDataUrl(job.inputPath, this.deps.renderOptions);
    const extracted = await this.deps.extractor.extract(
      image,
      this.deps.schema,
      path.basename(job.inputPath)
    );
    const written = writeRecordsCsv(outputPath, extracted);
    const hash = await hashFile(outputPath);
    return { runIndex, outputPath, hash, rowCount: written.rowCount };
  }
}
