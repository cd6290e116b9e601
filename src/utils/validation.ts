/**
 * Zod validation helpers
 *
 * @module utils/validation
 */

import { z } from 'zod';

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Flatten zod issues into `path: message` strings
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => {
    const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
    return `${path}${e.message}`;
  });
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError listing every failing path
 */
export function validateInput<Output, Input = Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  input: unknown
): Output {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ValidationError(issues.join('; '), issues);
  }
  return result.data;
}
