/**
 * Job and run interfaces
 *
 * An ExtractionJob is read-only configuration; RunOutcome and
 * ConsistencyReport only live for the duration of one job.
 */

/**
 * A configured (input PDF, output CSV) pair
 */
export interface ExtractionJob {
  /** PDF to read */
  inputPath: string;
  /** Canonical CSV path */
  outputPath: string;
}

/**
 * Result of one rasterize → infer → validate → write pass
 */
export interface RunOutcome {
  /** 1-based run number; always 1 for a single run */
  runIndex: number;
  /** CSV the run wrote */
  outputPath: string;
  /** 'sha256:' + hex digest of the CSV bytes */
  hash: string;
  /** Number of data records written */
  rowCount: number;
}

export type ConsistencyStatus = 'single' | 'consistent' | 'inconsistent';

/**
 * Outcome of processing one job once or N times
 */
export interface ConsistencyReport {
  job: ExtractionJob;
  status: ConsistencyStatus;
  runs: RunOutcome[];
  /** Canonical output path, or null when the runs diverged */
  canonicalPath: string | null;
}
