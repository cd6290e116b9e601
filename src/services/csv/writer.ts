/**
 * CSV Writer
 *
 * Writes extraction results with a fixed header and one row per record, in
 * record order. Values are written as-is apart from CSV quoting.
 *
 * @module services/csv/writer
 */

import * as fs from 'fs';
import * as path from 'path';
import { CSV_COLUMNS, type DataRecord, type ExtractionResult } from '../../models/record.js';

const LINE_TERMINATOR = '\r\n';

export interface CsvWriteResult {
  path: string;
  rowCount: number;
}

/**
 * Escape a value for CSV
 * - Wrap in quotes if contains comma, quote, or newline
 * - Escape quotes by doubling them
 */
export function escapeCsv(value: string): string {
  if (
    value.includes(',') ||
    value.includes('"') ||
    value.includes('\n') ||
    value.includes('\r')
  ) {
    return '"' + value.replace(/"/g, '""') + '"';
  }
  return value;
}

function toRow(record: DataRecord): string {
  return CSV_COLUMNS.map((column) => escapeCsv(String(record[column]))).join(',');
}

/**
 * Render records as CSV text: header plus one CRLF-terminated line per record.
 */
export function renderCsv(result: ExtractionResult): string {
  const lines = [CSV_COLUMNS.join(','), ...result.data_records.map(toRow)];
  return lines.map((line) => line + LINE_TERMINATOR).join('');
}

/**
 * Write records to `outPath`, replacing any existing file.
 */
export function writeRecordsCsv(outPath: string, result: ExtractionResult): CsvWriteResult {
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, renderCsv(result), 'utf-8');
  return { path: outPath, rowCount: result.data_records.length };
}
