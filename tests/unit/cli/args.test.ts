/**
 * Unit tests for command-line argument parsing
 *
 * @see src/cli/args.ts
 */

import { describe, it, expect } from 'vitest';
import { USAGE, parseRepeatCount } from '../../../src/cli/args.js';
import { PipelineError } from '../../../src/utils/errors.js';

describe('parseRepeatCount', () => {
  it('should default to one run without arguments', () => {
    expect(parseRepeatCount([])).toBe(1);
  });

  it('should read the run count from --test', () => {
    expect(parseRepeatCount(['--test', '3'])).toBe(3);
  });

  it('should accept --test 1', () => {
    expect(parseRepeatCount(['--test', '1'])).toBe(1);
  });

  it.each([[['--test']], [['3']], [['--runs', '3']], [['--test', '3', '--verbose']]])(
    'should ignore other argument forms %j',
    (argv) => {
      expect(parseRepeatCount(argv)).toBe(1);
    }
  );

  it.each(['0', '-2', 'abc', '2.5', ''])('should reject run count "%s"', (raw) => {
    try {
      parseRepeatCount(['--test', raw]);
    } catch (error) {
      expect(error).toBeInstanceOf(PipelineError);
      expect(error instanceof PipelineError && error.category).toBe('INVALID_ARGUMENT');
      expect(error instanceof PipelineError && error.details).toEqual({ hint: USAGE });
      return;
    }
    throw new Error('expected parseRepeatCount to throw');
  });
});
