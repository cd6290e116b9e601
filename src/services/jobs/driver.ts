/**
 * Job Driver
 *
 * Walks the job list strictly in order, hands each job to the consistency
 * runner and prints progress. The first error stops the remaining jobs.
 *
 * @module services/jobs/driver
 */

import * as path from 'path';
import type { ConsistencyReport, ExtractionJob, RunOutcome } from '../../models/job.js';
import { shortHash } from '../../utils/hash.js';

const RULE = '-'.repeat(60);

/**
 * Minimal runner surface the driver needs
 */
export interface JobRunner {
  run(job: ExtractionJob, repeat: number): Promise<ConsistencyReport>;
}

/**
 * Values echoed in the settings header
 */
export interface DriverSettings {
  model: string;
  apiKeyPath: string;
  schemaPath: string;
}

export type LineWriter = (line: string) => void;

/**
 * Progress line for one run of a multi-run check
 */
export function formatRunLine(outcome: RunOutcome): string {
  return `  run ${outcome.runIndex}: ${path.basename(outcome.outputPath)} rows=${outcome.rowCount} sha256=${shortHash(outcome.hash)}...`;
}

export class JobDriver {
  constructor(
    private readonly runner: JobRunner,
    private readonly settings: DriverSettings,
    private readonly write: LineWriter = (line) => console.log(line)
  ) {}

  async runAll(jobs: ExtractionJob[], repeat: number): Promise<ConsistencyReport[]> {
    this.printHeader(repeat);

    const reports: ConsistencyReport[] = [];
    for (const job of jobs) {
      this.write(`PDF: ${job.inputPath}`);
      const report = await this.runner.run(job, repeat);
      this.printReport(report);
      this.write(RULE);
      reports.push(report);
    }

    this.write('Done.');
    return reports;
  }

  private printHeader(repeat: number): void {
    this.write(`MODEL: ${this.settings.model}`);
    this.write(`API KEY PATH: ${this.settings.apiKeyPath}`);
    this.write(`SCHEMA PATH: ${this.settings.schemaPath}`);
    this.write(`TEST RUNS PER PDF: ${repeat}`);
    this.write(RULE);
  }

  private printReport(report: ConsistencyReport): void {
    if (report.status !== 'single') {
      for (const run of report.runs) {
        this.write(formatRunLine(run));
      }
    }

    switch (report.status) {
      case 'single': {
        const [run] = report.runs;
        this.write(`  wrote: ${run.outputPath}`);
        this.write(`  rows: ${run.rowCount}`);
        this.write(`  sha256: ${shortHash(run.hash)}...`);
        break;
      }
      case 'consistent':
        this.write('  CONSISTENT');
        this.write(`  final saved as: ${report.job.outputPath}`);
        break;
      case 'inconsistent':
        this.write('  INCONSISTENT (hashes differ)');
        this.write(`  row_counts: [${report.runs.map((r) => r.rowCount).join(', ')}]`);
        this.write('  Keep the .run*.csv files while you tune zoom/model/prompt.');
        console.error(`[WARN] [JobDriver] Extraction for ${report.job.inputPath} is not reproducible`);
        break;
    }
  }
}
