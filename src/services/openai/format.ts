/**
 * Responses API output-format narrowing
 *
 * The schema contract is loaded opaquely; right before the call it is
 * checked against the text formats the Responses API accepts. Unknown keys
 * are passed through untouched.
 *
 * @module services/openai/format
 */

import { z } from 'zod';
import { PipelineError } from '../../utils/errors.js';
import { formatIssues } from '../../utils/validation.js';

export const TextFormatSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text') }).passthrough(),
  z.object({ type: z.literal('json_object') }).passthrough(),
  z
    .object({
      type: z.literal('json_schema'),
      name: z.string().min(1),
      schema: z.record(z.unknown()),
      strict: z.boolean().nullable().optional(),
      description: z.string().optional(),
    })
    .passthrough(),
]);

export type TextFormat = z.infer<typeof TextFormatSchema>;

/**
 * Narrow an opaque schema contract to a Responses API text format.
 *
 * @throws PipelineError MALFORMED_SCHEMA if the contract is not one
 */
export function toTextFormat(contract: Record<string, unknown>): TextFormat {
  const result = TextFormatSchema.safeParse(contract);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new PipelineError(
      'MALFORMED_SCHEMA',
      `Schema 'format' is not a valid output format: ${issues.join('; ')}`,
      { issues }
    );
  }
  return result.data;
}
