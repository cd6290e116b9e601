/**
 * Pipeline Error Handling
 *
 * FAIL FAST: every component throws a PipelineError the moment a condition
 * is detected. Nothing is retried or salvaged; the CLI boundary is the only
 * place that turns an error into an exit status.
 *
 * @module utils/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for pipeline failures
 */
export type ErrorCategory =
  // Input files
  | 'MISSING_FILE'
  | 'MALFORMED_CREDENTIAL'
  | 'MALFORMED_SCHEMA'

  // Rasterization
  | 'PAGE_OUT_OF_RANGE'
  | 'RASTERIZE_FAILED'

  // Inference / extraction
  | 'INFERENCE_FAILED'
  | 'MALFORMED_RESPONSE'
  | 'SCHEMA_VALIDATION_FAILED'

  // Invocation
  | 'INVALID_ARGUMENT'
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

/**
 * Map error class names raised outside PipelineError to categories.
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'SCHEMA_VALIDATION_FAILED',
  SyntaxError: 'MALFORMED_RESPONSE',
  ZodError: 'CONFIGURATION_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * PipelineError - Structured error class for every fatal pipeline condition
 */
export class PipelineError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PipelineError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): PipelineError {
    if (error instanceof PipelineError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      return new PipelineError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new PipelineError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Render an error as the human-readable text printed on stderr.
 *
 * Only the `hint` detail is appended; raw model output and parsed JSON are
 * already part of the message for the categories that carry them.
 */
export function formatErrorForCli(error: PipelineError): string {
  const lines = [`ERROR: ${error.message}`];
  const hint = error.details?.hint;
  if (typeof hint === 'string' && hint.length > 0) {
    lines.push(hint);
  }
  return lines.join('\n');
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create missing file error
 */
export function missingFileError(what: string, filePath: string, hint?: string): PipelineError {
  return new PipelineError('MISSING_FILE', `${what} not found: ${filePath}`, {
    path: filePath,
    ...(hint && { hint }),
  });
}

/**
 * Create invalid argument error
 */
export function invalidArgumentError(message: string, details?: Record<string, unknown>): PipelineError {
  return new PipelineError('INVALID_ARGUMENT', message, details);
}
