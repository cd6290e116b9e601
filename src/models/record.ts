/**
 * Data record interfaces for table extraction
 *
 * One DataRecord per table row of a data-dictionary page. The zod schemas
 * are the validation gate between the inference response and the CSV writer.
 */

import { z } from 'zod';

/**
 * Sentinel written for a blank comments cell
 */
export const BLANK_COMMENT = 'na';

/**
 * Fixed CSV column order
 */
export const CSV_COLUMNS = [
  'file_name',
  'key',
  'item',
  'data_type',
  'format',
  'length',
  'start',
  'end',
  'comments',
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export const DataRecordSchema = z.object({
  file_name: z.string(),
  key: z.string(),
  item: z.string(),
  data_type: z.string(),
  format: z.string(),
  length: z.number().int(),
  start: z.number().int(),
  end: z.number().int(),
  comments: z.string().transform((value) => (value.trim() === '' ? BLANK_COMMENT : value)),
});

export const ExtractionResultSchema = z.object({
  data_records: z.array(DataRecordSchema),
});

/**
 * One extracted table row
 */
export type DataRecord = z.output<typeof DataRecordSchema>;

/**
 * Ordered rows extracted from a single page
 */
export type ExtractionResult = z.output<typeof ExtractionResultSchema>;
