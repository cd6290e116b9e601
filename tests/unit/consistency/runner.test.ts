/**
 * Unit tests for ConsistencyRunner
 *
 * Rendering and extraction are faked; CSV writing and hashing are real.
 *
 * @see src/services/consistency/runner.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  ConsistencyRunner,
  runOutputPath,
  type PageRenderer,
} from '../../../src/services/consistency/runner.js';
import type { TableExtractor } from '../../../src/services/extraction/service.js';
import type { RenderOptions } from '../../../src/services/images/page-rasterizer.js';
import type { SchemaContract } from '../../../src/services/schema/schema-loader.js';
import type { ExtractionResult } from '../../../src/models/record.js';
import type { ExtractionJob } from '../../../src/models/job.js';
import { renderCsv } from '../../../src/services/csv/writer.js';
import { computeHash } from '../../../src/utils/hash.js';
import { PipelineError } from '../../../src/utils/errors.js';
import { makeRecord, makeResult, TWO_ROWS } from '../../fixtures/records.js';

const IMAGE = 'data:image/png;base64,AAAA';
const SCHEMA: SchemaContract = { type: 'json_object' };

class FakeRenderer implements PageRenderer {
  readonly calls: Array<{ pdfPath: string; options?: RenderOptions }> = [];

  async renderPageToDataUrl(pdfPath: string, options?: RenderOptions): Promise<string> {
    this.calls.push({ pdfPath, options });
    return IMAGE;
  }
}

/** Returns the queued results in order, repeating the last one */
class QueuedExtractor implements TableExtractor {
  readonly fileNames: string[] = [];
  private calls = 0;

  constructor(private readonly results: ExtractionResult[]) {}

  async extract(_image: string, _schema: SchemaContract, expectedFileName: string): Promise<ExtractionResult> {
    this.fileNames.push(expectedFileName);
    const result = this.results[Math.min(this.calls, this.results.length - 1)];
    this.calls++;
    return result;
  }
}

describe('runOutputPath', () => {
  it('should insert the run index before .csv', () => {
    expect(runOutputPath('./out/table.csv', 2)).toBe('./out/table.run2.csv');
  });

  it('should append when the path has no .csv suffix', () => {
    expect(runOutputPath('./out/table', 1)).toBe('./out/table.run1.csv');
  });

  it('should only replace the trailing suffix', () => {
    expect(runOutputPath('a.csv.d/table.csv', 3)).toBe('a.csv.d/table.run3.csv');
  });
});

describe('ConsistencyRunner', () => {
  let testDir: string;
  let job: ExtractionJob;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'consistency-test-'));
    job = {
      inputPath: path.join(testDir, 'sample_dictionary.pdf'),
      outputPath: path.join(testDir, 'out', 'sample.csv'),
    };
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function createRunner(extractor: TableExtractor, renderer: PageRenderer = new FakeRenderer()): ConsistencyRunner {
    return new ConsistencyRunner({ renderer, extractor, schema: SCHEMA });
  }

  it('should write a single run straight to the canonical path', async () => {
    const report = await createRunner(new QueuedExtractor([TWO_ROWS])).run(job, 1);

    expect(report.status).toBe('single');
    expect(report.canonicalPath).toBe(job.outputPath);
    expect(report.runs).toEqual([
      { runIndex: 1, outputPath: job.outputPath, hash: computeHash(renderCsv(TWO_ROWS)), rowCount: 2 },
    ]);
    expect(fs.readFileSync(job.outputPath, 'utf-8')).toBe(renderCsv(TWO_ROWS));
  });

  it('should promote the last run when all runs match', async () => {
    const report = await createRunner(new QueuedExtractor([TWO_ROWS])).run(job, 3);

    expect(report.status).toBe('consistent');
    expect(report.canonicalPath).toBe(job.outputPath);
    expect(report.runs.map((r) => r.runIndex)).toEqual([1, 2, 3]);
    expect(new Set(report.runs.map((r) => r.hash)).size).toBe(1);

    expect(fs.readFileSync(job.outputPath, 'utf-8')).toBe(renderCsv(TWO_ROWS));
    expect(fs.existsSync(runOutputPath(job.outputPath, 1))).toBe(true);
    expect(fs.existsSync(runOutputPath(job.outputPath, 2))).toBe(true);
    expect(fs.existsSync(runOutputPath(job.outputPath, 3))).toBe(false);
  });

  it('should keep every run file and no canonical file when runs differ', async () => {
    const variant = makeResult([makeRecord()]);
    const extractor = new QueuedExtractor([TWO_ROWS, TWO_ROWS, variant]);

    const report = await createRunner(extractor).run(job, 3);

    expect(report.status).toBe('inconsistent');
    expect(report.canonicalPath).toBeNull();
    expect(report.runs.map((r) => r.rowCount)).toEqual([2, 2, 1]);
    expect(fs.existsSync(job.outputPath)).toBe(false);
    for (const i of [1, 2, 3]) {
      expect(fs.existsSync(runOutputPath(job.outputPath, i))).toBe(true);
    }
  });

  it('should treat one differing run out of two as inconsistent', async () => {
    const extractor = new QueuedExtractor([TWO_ROWS, makeResult([])]);
    const report = await createRunner(extractor).run(job, 2);
    expect(report.status).toBe('inconsistent');
  });

  it('should replace an existing canonical file when consistent', async () => {
    fs.mkdirSync(path.dirname(job.outputPath), { recursive: true });
    fs.writeFileSync(job.outputPath, 'stale');

    await createRunner(new QueuedExtractor([TWO_ROWS])).run(job, 2);

    expect(fs.readFileSync(job.outputPath, 'utf-8')).toBe(renderCsv(TWO_ROWS));
  });

  it('should pass the PDF base name and render options through', async () => {
    const renderer = new FakeRenderer();
    const extractor = new QueuedExtractor([TWO_ROWS]);
    const runner = new ConsistencyRunner({
      renderer,
      extractor,
      schema: SCHEMA,
      renderOptions: { pageIndex: 0, zoom: 4 },
    });

    await runner.run(job, 2);

    expect(extractor.fileNames).toEqual(['sample_dictionary.pdf', 'sample_dictionary.pdf']);
    expect(renderer.calls).toEqual([
      { pdfPath: job.inputPath, options: { pageIndex: 0, zoom: 4 } },
      { pdfPath: job.inputPath, options: { pageIndex: 0, zoom: 4 } },
    ]);
  });

  it.each([0, -1, 1.5, Number.NaN])('should reject repeat count %s', async (repeat) => {
    const promise = createRunner(new QueuedExtractor([TWO_ROWS])).run(job, repeat);
    await expect(promise).rejects.toMatchObject({ category: 'INVALID_ARGUMENT' });
  });

  it('should stop at the first failing run', async () => {
    const failure = new PipelineError('MALFORMED_RESPONSE', 'Model did not return valid JSON');
    let calls = 0;
    const extractor: TableExtractor = {
      extract: async () => {
        calls++;
        if (calls === 2) throw failure;
        return TWO_ROWS;
      },
    };

    await expect(createRunner(extractor).run(job, 3)).rejects.toBe(failure);
    expect(calls).toBe(2);
    expect(fs.existsSync(runOutputPath(job.outputPath, 1))).toBe(true);
    expect(fs.existsSync(job.outputPath)).toBe(false);
  });
});
